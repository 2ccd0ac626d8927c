/**
 * rerec compiler public API
 *
 * Rerechan02 source → C11 translation unit, in four phases sharing one
 * CompilationContext:
 * - tokenize: source → TokenStore
 * - parse: tokens → Program AST
 * - check: AST → SemanticModel (scopes, bindings, types)
 * - emit: AST + SemanticModel → C text
 */

import { check } from './check/checker.ts'
import { CompileError, type CompileResult, emit, InternalCompilerError } from './codegen/index.ts'
import { CompilationContext } from './core/context.ts'
import { tokenize } from './lex/tokenizer.ts'
import { parse } from './parse/parser.ts'

export {
	BuiltinName,
	BuiltinTypeId,
	type CallTarget,
	type CheckResult,
	check,
	type FuncId,
	type ScopeId,
	SemanticModel,
	STD_MODULES,
	type SymbolId,
	type TypeId,
	typeName,
} from './check/index.ts'
export {
	ABI_MARKER,
	CompileError,
	type CompileResult,
	type CompileWarning,
	emit,
	InternalCompilerError,
	RUNTIME_ABI_VERSION,
	RUNTIME_PROTOTYPES,
	RuntimeFunction,
} from './codegen/index.ts'
// CompileOptions is exported from the compile function definition below
export {
	type AstNode,
	CompilationContext,
	type Diagnostic,
	DiagnosticSeverity,
	formatAst,
	type NodeId,
	NodeKind,
	type ProgramNode,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	walkPreorder,
} from './core/index.ts'
export { type Lexeme, LexError, lex, Scanner, type TokenizeOptions, type TokenizeResult, tokenize } from './lex/index.ts'
export { matchOnly, type ParseResult, parse } from './parse/parser.ts'
export { RUNTIME_FILES, type RuntimeFile, runtimeSourcePath } from './runtime.ts'

/**
 * Result of compile: the C code plus the context every phase filled in.
 */
export interface CompileOutput extends CompileResult {
	readonly context: CompilationContext
}

/**
 * Options for the compile function.
 */
export interface CompileOptions {
	/** Path to the source file (for error messages and the generated header) */
	filename?: string
}

/**
 * Chain the phases, stopping after the first one that reports an error.
 */
function runPhases(context: CompilationContext): CompileOutput {
	// Phase 1: Tokenization
	const tokenResult = tokenize(context)
	if (!tokenResult.succeeded) {
		throw new CompileError(context.formatAllDiagnostics())
	}

	// Phase 2: Parsing
	const parseResult = parse(context)
	if (!parseResult.succeeded) {
		throw new CompileError(context.formatAllDiagnostics())
	}

	// Phase 3: Checking (semantic analysis)
	const checkResult = check(context)
	if (!checkResult.succeeded) {
		throw new CompileError(context.formatAllDiagnostics())
	}

	// Phase 4: Emission
	return { ...emit(context), context }
}

/**
 * Compile Rerechan02 source to C.
 *
 * This is the main entry point for compilation. It chains all phases:
 * 1. Tokenization (source → tokens)
 * 2. Parsing (tokens → AST nodes)
 * 3. Checking (name resolution, type checking, reachability)
 * 4. Emission (AST → C)
 *
 * A stage contract violation in any phase is reported as RRGEN001.
 *
 * @param source - Rerechan02 source code
 * @param options - Compilation options
 * @returns The C translation unit, any warnings and the compilation context
 * @throws {CompileError} If any phase reports an error; the message holds every diagnostic
 */
export function compile(source: string, options: CompileOptions = {}): CompileOutput {
	const context = new CompilationContext(source, options.filename)
	try {
		return runPhases(context)
	} catch (error) {
		if (!(error instanceof InternalCompilerError)) throw error
		context.emit('RRGEN001', 1, 1, { detail: error.message })
		throw new CompileError(context.formatAllDiagnostics())
	}
}
