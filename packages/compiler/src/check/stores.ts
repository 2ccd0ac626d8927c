/**
 * Dense array stores for scopes, symbols and function signatures.
 */

import {
	type FuncId,
	type FuncSignature,
	funcId,
	type Scope,
	type ScopeId,
	type ScopeKind,
	scopeId,
	type SymbolId,
	type SymbolInfo,
	symbolId,
} from './types.ts'

/**
 * Storage for scopes.
 * Scopes form a tree: each one records its parent.
 */
export class ScopeStore {
	private readonly scopes: Scope[] = []

	/** Open a new scope below `parentId` (null only for the builtin scope). */
	create(kind: ScopeKind, parentId: ScopeId | null): Scope {
		const parentDepth = parentId === null ? -1 : this.get(parentId).depth
		const scope: Scope = {
			depth: parentDepth + 1,
			id: scopeId(this.scopes.length),
			kind,
			parentId,
			reachable: true,
			symbols: new Map(),
		}
		this.scopes.push(scope)
		return scope
	}

	get(id: ScopeId): Scope {
		const scope = this.scopes[id]
		if (scope === undefined) {
			throw new Error(`Invalid ScopeId: ${id}`)
		}
		return scope
	}

	count(): number {
		return this.scopes.length
	}

	*[Symbol.iterator](): Generator<[ScopeId, Scope]> {
		for (let i = 0; i < this.scopes.length; i++) {
			const scope = this.scopes[i]
			if (scope !== undefined) yield [scopeId(i), scope]
		}
	}
}

/**
 * Storage for symbols.
 * Append-only; declaring also records the name in the owning scope.
 */
export class SymbolStore {
	private readonly symbols: SymbolInfo[] = []

	add(symbol: SymbolInfo, scope: Scope): SymbolId {
		console.assert(symbol.scopeId === scope.id, 'symbol declared into a foreign scope')
		const id = symbolId(this.symbols.length)
		this.symbols.push(symbol)
		scope.symbols.set(symbol.nameId, id)
		return id
	}

	get(id: SymbolId): SymbolInfo {
		const symbol = this.symbols[id]
		if (symbol === undefined) {
			throw new Error(`Invalid SymbolId: ${id}`)
		}
		return symbol
	}

	count(): number {
		return this.symbols.length
	}

	*[Symbol.iterator](): Generator<[SymbolId, SymbolInfo]> {
		for (let i = 0; i < this.symbols.length; i++) {
			const symbol = this.symbols[i]
			if (symbol !== undefined) yield [symbolId(i), symbol]
		}
	}
}

/**
 * Storage for function signatures (user functions and builtins).
 */
export class FuncStore {
	private readonly funcs: FuncSignature[] = []

	add(signature: FuncSignature): FuncId {
		const id = funcId(this.funcs.length)
		this.funcs.push(signature)
		return id
	}

	get(id: FuncId): FuncSignature {
		const func = this.funcs[id]
		if (func === undefined) {
			throw new Error(`Invalid FuncId: ${id}`)
		}
		return func
	}

	count(): number {
		return this.funcs.length
	}

	*[Symbol.iterator](): Generator<[FuncId, FuncSignature]> {
		for (let i = 0; i < this.funcs.length; i++) {
			const func = this.funcs[i]
			if (func !== undefined) yield [funcId(i), func]
		}
	}
}
