/**
 * Check phase: semantic analysis between Parse and Codegen.
 *
 * Performs:
 * - Scope construction (builtin → module → function → blocks)
 * - Name resolution (every identifier bound to one symbol)
 * - Type checking (operators, calls, bindings, returns)
 * - Entry point and import validation
 * - Reachability analysis (unreachable code warnings, missing returns)
 *
 * Results are recorded in a SemanticModel on the context; the AST is not modified.
 */

import type { CompilationContext } from '../core/context.ts'
import type { FuncDeclNode } from '../core/nodes.ts'
import { checkEntryPoint, checkImports, declareBuiltins, declareFunction } from './declarations.ts'
import { blockReturns } from './flow.ts'
import { SemanticModel } from './model.ts'
import { type CheckerState, declareSymbol, popScope, pushScope } from './state.ts'
import { checkStatements } from './statements.ts'
import { BuiltinTypeId, type CheckResult, type FuncId, ScopeKind, SymbolKind, typeName } from './types.ts'

/**
 * Check one function body in its own scope, parameters first.
 */
function checkFunctionBody(func: FuncDeclNode, funcId: FuncId, state: CheckerState): void {
	const { context, model } = state
	const signature = model.funcs.get(funcId)

	pushScope(state, ScopeKind.Function)
	state.currentFunction = { nameId: func.name.nameId, returnType: signature.returnType }

	func.params.forEach((param, index) => {
		const type = signature.params[index]?.[0] ?? BuiltinTypeId.Invalid
		declareSymbol(state, param.id, param.name.id, {
			funcId: null,
			kind: SymbolKind.Parameter,
			mutable: false,
			nameId: param.name.nameId,
			typeId: type,
		})
	})

	checkStatements(func.body.statements, state)

	const { returnType } = signature
	if (
		returnType !== BuiltinTypeId.Void &&
		returnType !== BuiltinTypeId.Invalid &&
		!blockReturns(func.body, model)
	) {
		context.emitAtNode('RRTYPE007', func.name.id, {
			name: context.strings.get(func.name.nameId),
			type: typeName(returnType),
		})
	}

	state.currentFunction = null
	popScope(state)
}

/**
 * Perform semantic checking on a parsed program.
 *
 * Algorithm:
 * 1. Create the builtin scope and declare builtins
 * 2. Create the module scope, record imports
 * 3. Declare every function signature (so bodies may call any function)
 * 4. Validate the entry point
 * 5. Check each body in source order
 */
export function check(context: CompilationContext): CheckResult {
	const model = new SemanticModel()
	context.model = model

	const program = context.program
	if (program === null) {
		return { succeeded: !context.hasErrors() }
	}

	const builtinScope = model.scopes.create(ScopeKind.Builtin, null)
	const state: CheckerState = {
		context,
		currentFunction: null,
		currentScope: builtinScope,
		loopDepth: 0,
		model,
	}

	declareBuiltins(state, builtinScope)
	pushScope(state, ScopeKind.Module)

	checkImports(program.imports, state)
	const funcIds = program.funcs.map((func) => declareFunction(func, state))
	checkEntryPoint(program, state)

	program.funcs.forEach((func, index) => {
		const funcId = funcIds[index]
		if (funcId !== undefined) checkFunctionBody(func, funcId, state)
	})

	return { succeeded: !context.hasErrors() }
}
