/**
 * Checker state management types and functions.
 *
 * Tracks the scope chain, the enclosing function and loop nesting while the
 * checker walks the AST.
 */

import type { CompilationContext, StringId } from '../core/context.ts'
import type { NodeId } from '../core/nodes.ts'
import { getBuiltin } from './builtins.ts'
import type { SemanticModel } from './model.ts'
import { type Scope, type ScopeKind, type SymbolId, type SymbolInfo, SymbolKind, type TypeId } from './types.ts'

/**
 * The function whose body is being checked.
 */
export interface FunctionContext {
	readonly nameId: StringId
	readonly returnType: TypeId
}

/**
 * Tracks a run of unreachable statements for one grouped warning.
 */
export interface UnreachableRange {
	/** First unreachable statement node */
	firstNodeId: NodeId
	/** First line of unreachable code */
	startLine: number
	/** Last line of unreachable code */
	endLine: number
}

/**
 * Core checker state passed through all checking functions.
 */
export interface CheckerState {
	readonly context: CompilationContext
	readonly model: SemanticModel
	currentScope: Scope
	currentFunction: FunctionContext | null
	/** Number of enclosing while loops */
	loopDepth: number
}

/**
 * Open a scope below the current one and make it current.
 */
export function pushScope(state: CheckerState, kind: ScopeKind): Scope {
	const scope = state.model.scopes.create(kind, state.currentScope.id)
	state.currentScope = scope
	return scope
}

/**
 * Return to the parent of the current scope.
 */
export function popScope(state: CheckerState): void {
	const { parentId } = state.currentScope
	console.assert(parentId !== null, 'popped the builtin scope')
	if (parentId !== null) {
		state.currentScope = state.model.scopes.get(parentId)
	}
}

/**
 * Find the innermost symbol named `nameId`, walking outwards.
 */
export function lookupSymbol(state: CheckerState, nameId: StringId): SymbolId | undefined {
	let scope: Scope | null = state.currentScope
	while (scope !== null) {
		const found = scope.symbols.get(nameId)
		if (found !== undefined) return found
		scope = scope.parentId === null ? null : state.model.scopes.get(scope.parentId)
	}
	return undefined
}

/**
 * Declare a symbol in the current scope.
 * Reports a DuplicateDeclarationError and returns null when the scope
 * already holds the name; names of enclosing scopes may be shadowed.
 */
export function declareSymbol(
	state: CheckerState,
	declNodeId: NodeId,
	nameNodeId: NodeId,
	symbol: Omit<SymbolInfo, 'scopeId' | 'depth' | 'declNodeId'>
): SymbolId | null {
	const scope = state.currentScope
	if (scope.symbols.has(symbol.nameId)) {
		state.context.emitAtNode('RRRES001', nameNodeId, {
			name: state.context.strings.get(symbol.nameId),
		})
		return null
	}

	const id = state.model.symbols.add(
		{ ...symbol, declNodeId, depth: scope.depth, scopeId: scope.id },
		scope
	)
	state.model.declarations.set(declNodeId, id)
	return id
}

/**
 * The standard module a builtin symbol needs, when it has not been imported.
 */
export function missingImportFor(state: CheckerState, symbol: SymbolInfo): string | null {
	if (symbol.kind !== SymbolKind.Function || symbol.declNodeId !== null || symbol.funcId === null) {
		return null
	}
	const builtinName = state.model.funcs.get(symbol.funcId).builtin
	const builtin = builtinName === null ? undefined : getBuiltin(builtinName)
	if (builtin === undefined || builtin.module === null) return null
	return state.model.imports.has(builtin.module) ? null : builtin.module
}
