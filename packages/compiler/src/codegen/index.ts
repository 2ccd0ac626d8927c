import type { SemanticModel } from '../check/model.ts'
import { BuiltinTypeId } from '../check/types.ts'
import { type CompilationContext, DiagnosticSeverity } from '../core/context.ts'
import type { ProgramNode } from '../core/nodes.ts'
import { ABI_MARKER, prototypesFor, RuntimeFunction, STRING_TYPEDEF } from './abi.ts'
import { InternalCompilerError } from './errors.ts'
import { cStringLiteral, utf8 } from './literals.ts'
import { cType, FunctionLowering, type LoweringUnit } from './lower.ts'
import { functionName, NameTable } from './names.ts'
import { CWriter } from './writer.ts'

export { CompileError, InternalCompilerError } from './errors.ts'
export { ABI_MARKER, RUNTIME_ABI_VERSION, RUNTIME_PROTOTYPES, RuntimeFunction } from './abi.ts'

export interface CompileWarning {
	code: string
	message: string
	line: number
	column: number
	formattedMessage: string
}

export interface CompileResult {
	/** One C11 translation unit */
	code: string
	warnings: CompileWarning[]
}

const STANDARD_INCLUDES = ['stdbool.h', 'stddef.h', 'stdint.h'] as const

function extractWarnings(context: CompilationContext): CompileWarning[] {
	return context
		.getDiagnostics()
		.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
		.map((d) => ({
			code: d.def.code,
			column: d.column,
			formattedMessage: context.formatDiagnostic(d),
			line: d.line,
			message: d.message,
		}))
}

/** Text safe inside a C block comment. */
function commentText(text: string): string {
	return text.replaceAll('*/', '* /')
}

function writePrototypes(writer: CWriter, program: ProgramNode, unit: LoweringUnit): void {
	const { context, model } = unit
	for (const func of program.funcs) {
		const symbol = model.symbols.get(model.declarationOf(func.id))
		if (symbol.funcId === null) {
			throw new InternalCompilerError(`function ${func.id} has no signature`)
		}
		const signature = model.funcs.get(symbol.funcId)
		const params = signature.params.map(([type]) => {
			if (type === undefined) throw new InternalCompilerError(`function ${func.id} has an untyped parameter`)
			return cType(type)
		})
		const name = functionName(context.strings.get(func.name.nameId))
		const paramList = params.length === 0 ? 'void' : params.join(', ')
		writer.line(`static ${cType(signature.returnType)} ${name}(${paramList});`)
	}
}

function writeMain(writer: CWriter, context: CompilationContext, model: SemanticModel): void {
	if (model.entry === null) {
		throw new InternalCompilerError('no entry point was resolved')
	}
	const entry = model.funcs.get(model.entry)
	const entryName = functionName(context.strings.get(entry.nameId))

	writer.open('int main(int argc, char **argv) {')
	writer.line(`${RuntimeFunction.RuntimeInit}(argc, argv, ${cStringLiteral(utf8(context.filename))});`)
	writer.line(`(void)${ABI_MARKER};`)
	if (entry.returnType === BuiltinTypeId.Void) {
		writer.line(`${entryName}();`)
		writer.line(`return ${RuntimeFunction.RuntimeShutdown}(0);`)
	} else {
		writer.line(`const int64_t status = ${entryName}();`)
		writer.line(`return ${RuntimeFunction.RuntimeShutdown}((int)status);`)
	}
	writer.close()
}

/**
 * Emit C11 from a checked program.
 *
 * Layout: header comment, standard includes, the runtime interface the
 * program uses, user function prototypes, user function definitions and
 * finally `main`, which wraps the entry function in runtime setup and
 * teardown.
 *
 * @throws {InternalCompilerError} If the context does not hold an error-free checked program
 */
export function emit(context: CompilationContext): CompileResult {
	const { model, program } = context
	if (program === null || model === null) {
		throw new InternalCompilerError('emit requires a parsed and checked program')
	}
	if (context.hasErrors()) {
		throw new InternalCompilerError('emit requires a program without errors')
	}

	const writer = new CWriter()
	const unit: LoweringUnit = {
		context,
		model,
		names: new NameTable(),
		used: new Set([RuntimeFunction.RuntimeInit, RuntimeFunction.RuntimeShutdown]),
	}

	// Lower the bodies first; they decide which runtime functions are declared
	const lowering = new FunctionLowering(unit, writer)
	const definitions = writer.capture(() => {
		for (const func of program.funcs) {
			lowering.func(func)
			writer.line()
		}
	}, 0)

	const moduleName = context.strings.get(program.module.name.nameId)
	writer.line(`/* module ${commentText(moduleName)}, from ${commentText(context.filename)} */`)
	writer.line()
	for (const header of STANDARD_INCLUDES) writer.line(`#include <${header}>`)
	writer.line()
	writer.line(STRING_TYPEDEF)
	writer.line()
	writer.line(`extern const int ${ABI_MARKER};`)
	for (const prototype of prototypesFor(unit.used)) writer.line(prototype)
	writer.line()
	writePrototypes(writer, program, unit)
	writer.line()
	writer.append(definitions.lines)
	writeMain(writer, context, model)

	return { code: writer.toString(), warnings: extractWarnings(context) }
}
