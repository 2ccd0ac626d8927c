/**
 * Semantic model: everything the checker learns about a program, kept in
 * side tables keyed by NodeId so the AST itself stays untouched.
 */

import type { NodeId } from '../core/nodes.ts'
import type { BuiltinName, StdModule } from './builtins.ts'
import { FuncStore, ScopeStore, SymbolStore } from './stores.ts'
import type { FuncId, SymbolId, TypeId } from './types.ts'

/**
 * What a call expression invokes.
 * Builtin calls also record the argument type, which selects the lowering.
 */
export type CallTarget =
	| { readonly kind: 'user'; readonly funcId: FuncId }
	| { readonly kind: 'builtin'; readonly name: BuiltinName; readonly argType: TypeId }

export class SemanticModel {
	readonly scopes = new ScopeStore()
	readonly symbols = new SymbolStore()
	readonly funcs = new FuncStore()

	/** Identifier reference → the symbol it resolves to */
	readonly bindings = new Map<NodeId, SymbolId>()
	/** Param, let and func declaration nodes → the symbol they declare */
	readonly declarations = new Map<NodeId, SymbolId>()
	/** Expression node → its type */
	readonly exprTypes = new Map<NodeId, TypeId>()
	/** Call node → its target */
	readonly calls = new Map<NodeId, CallTarget>()
	/** Int literal, or negation of one, → its value */
	readonly intValues = new Map<NodeId, bigint>()
	/** Float literal → its value */
	readonly floatValues = new Map<NodeId, number>()
	/** Standard modules imported by the program */
	readonly imports = new Set<StdModule>()

	/** The entry function, once resolved */
	entry: FuncId | null = null

	typeOf(nodeId: NodeId): TypeId {
		const type = this.exprTypes.get(nodeId)
		if (type === undefined) {
			throw new Error(`No type recorded for node ${nodeId}`)
		}
		return type
	}

	bindingOf(nodeId: NodeId): SymbolId {
		const symbol = this.bindings.get(nodeId)
		if (symbol === undefined) {
			throw new Error(`Identifier ${nodeId} is not bound`)
		}
		return symbol
	}

	declarationOf(nodeId: NodeId): SymbolId {
		const symbol = this.declarations.get(nodeId)
		if (symbol === undefined) {
			throw new Error(`Node ${nodeId} declares no symbol`)
		}
		return symbol
	}

	callOf(nodeId: NodeId): CallTarget {
		const target = this.calls.get(nodeId)
		if (target === undefined) {
			throw new Error(`Call ${nodeId} has no target`)
		}
		return target
	}
}
