/**
 * Module-level declarations: builtins, imports, function signatures and
 * the entry point.
 */

import type { FuncDeclNode, ImportDeclNode, ProgramNode, TypeRefNode } from '../core/nodes.ts'
import { BUILTINS, isStdModule, STD_MODULES } from './builtins.ts'
import { type CheckerState, declareSymbol } from './state.ts'
import { BuiltinTypeId, type FuncId, type Scope, SymbolKind, type TypeId, typeFromName } from './types.ts'

/**
 * Declare every builtin function into the builtin scope.
 */
export function declareBuiltins(state: CheckerState, scope: Scope): void {
	const { context, model } = state
	for (const builtin of BUILTINS) {
		const nameId = context.strings.intern(builtin.name)
		const funcId = model.funcs.add({
			builtin: builtin.name,
			declNodeId: null,
			nameId,
			params: builtin.params,
			returnType: builtin.returnType,
		})
		model.symbols.add(
			{
				declNodeId: null,
				depth: scope.depth,
				funcId,
				kind: SymbolKind.Function,
				mutable: false,
				nameId,
				scopeId: scope.id,
				typeId: builtin.returnType,
			},
			scope
		)
	}
}

function importPath(decl: ImportDeclNode, state: CheckerState): string {
	return decl.path.map((segment) => state.context.strings.get(segment.nameId)).join('.')
}

/**
 * Record the imported standard modules.
 * Unknown modules are errors; repeated imports are warnings.
 */
export function checkImports(imports: readonly ImportDeclNode[], state: CheckerState): void {
	for (const decl of imports) {
		const path = importPath(decl, state)
		if (!isStdModule(path)) {
			state.context.emitAtNode('RRRES003', decl.id, {
				available: STD_MODULES.map((m) => `\`${m}\``).join(', '),
				path,
			})
			continue
		}
		if (state.model.imports.has(path)) {
			state.context.emitAtNode('RRRES050', decl.id, { path })
			continue
		}
		state.model.imports.add(path)
	}
}

/**
 * Resolve a written type. `void` is only allowed where `allowVoid` is set.
 */
export function resolveTypeRef(ref: TypeRefNode, state: CheckerState, allowVoid: boolean): TypeId {
	const type = typeFromName(ref.name)
	if (type === BuiltinTypeId.Void && !allowVoid) {
		state.context.emitAtNode('RRTYPE011', ref.id)
		return BuiltinTypeId.Invalid
	}
	return type
}

/**
 * Declare a function's signature in the module scope, before any body is checked.
 */
export function declareFunction(func: FuncDeclNode, state: CheckerState): FuncId {
	const params = func.params.map((p): readonly TypeId[] => [resolveTypeRef(p.type, state, false)])
	const returnType = func.returnType ? resolveTypeRef(func.returnType, state, true) : BuiltinTypeId.Void

	const funcId = state.model.funcs.add({
		builtin: null,
		declNodeId: func.id,
		nameId: func.name.nameId,
		params,
		returnType,
	})

	declareSymbol(state, func.id, func.name.id, {
		funcId,
		kind: SymbolKind.Function,
		mutable: false,
		nameId: func.name.nameId,
		typeId: returnType,
	})

	return funcId
}

/**
 * The module must declare `func main()` without parameters, returning `int` or nothing.
 */
export function checkEntryPoint(program: ProgramNode, state: CheckerState): void {
	const { context, model } = state
	const mainId = context.strings.intern('main')
	const symbolId = state.currentScope.symbols.get(mainId)
	const symbol = symbolId === undefined ? undefined : model.symbols.get(symbolId)

	if (symbol === undefined || symbol.funcId === null || symbol.declNodeId === null) {
		context.emitAtNode('RRRES004', program.module.id)
		return
	}

	const signature = model.funcs.get(symbol.funcId)
	const validResult =
		signature.returnType === BuiltinTypeId.Int || signature.returnType === BuiltinTypeId.Void
	if (signature.params.length > 0 || !validResult) {
		const decl = program.funcs.find((f) => f.id === symbol.declNodeId)
		context.emitAtNode('RRRES006', decl ? decl.name.id : program.module.id)
		return
	}

	model.entry = symbol.funcId
}
