/**
 * Type definitions for the Check phase.
 */

import type { StringId } from '../core/context.ts'
import type { NodeId, PrimitiveTypeName } from '../core/nodes.ts'
import type { BuiltinName } from './builtins.ts'

export type TypeId = number & { readonly __brand: 'TypeId' }

export function typeId(n: number): TypeId {
	return n as TypeId
}

export type ScopeId = number & { readonly __brand: 'ScopeId' }

export function scopeId(n: number): ScopeId {
	return n as ScopeId
}

export type SymbolId = number & { readonly __brand: 'SymbolId' }

export function symbolId(n: number): SymbolId {
	return n as SymbolId
}

export type FuncId = number & { readonly __brand: 'FuncId' }

export function funcId(n: number): FuncId {
	return n as FuncId
}

/**
 * Built-in type IDs.
 * The type system is closed, so every type is one of these.
 */
export const BuiltinTypeId = {
	Bool: typeId(3),
	Float: typeId(2),
	Int: typeId(1),
	/** Error sentinel - suppresses follow-up diagnostics */
	Invalid: typeId(5),
	String: typeId(4),
	/** No value; only valid as a function result */
	Void: typeId(0),
} as const

const TYPE_NAMES: ReadonlyMap<TypeId, string> = new Map<TypeId, string>([
	[BuiltinTypeId.Void, 'void'],
	[BuiltinTypeId.Int, 'int'],
	[BuiltinTypeId.Float, 'float'],
	[BuiltinTypeId.Bool, 'bool'],
	[BuiltinTypeId.String, 'string'],
	[BuiltinTypeId.Invalid, '<invalid>'],
])

export function typeName(id: TypeId): string {
	return TYPE_NAMES.get(id) ?? '<unknown>'
}

export function typeFromName(name: PrimitiveTypeName): TypeId {
	switch (name) {
		case 'int':
			return BuiltinTypeId.Int
		case 'float':
			return BuiltinTypeId.Float
		case 'bool':
			return BuiltinTypeId.Bool
		case 'string':
			return BuiltinTypeId.String
		case 'void':
			return BuiltinTypeId.Void
	}
}

export function isNumeric(id: TypeId): boolean {
	return id === BuiltinTypeId.Int || id === BuiltinTypeId.Float
}

/**
 * Scope kinds, outermost first.
 */
export const ScopeKind = {
	Block: 3,
	Builtin: 0,
	Function: 2,
	Module: 1,
} as const

export type ScopeKind = (typeof ScopeKind)[keyof typeof ScopeKind]

/**
 * A lexical scope. Scopes form a tree through parentId.
 */
export interface Scope {
	readonly id: ScopeId
	/** Parent scope ID, or null for the builtin scope */
	readonly parentId: ScopeId | null
	readonly depth: number
	readonly kind: ScopeKind
	/** Names declared directly in this scope */
	readonly symbols: Map<StringId, SymbolId>
	/** Whether the next statement in this scope is reachable */
	reachable: boolean
}

export const SymbolKind = {
	Function: 2,
	Parameter: 1,
	Variable: 0,
} as const

export type SymbolKind = (typeof SymbolKind)[keyof typeof SymbolKind]

/**
 * A named entity declared in some scope.
 */
export interface SymbolInfo {
	readonly nameId: StringId
	readonly kind: SymbolKind
	readonly scopeId: ScopeId
	/** Depth of the declaring scope */
	readonly depth: number
	/** Value type for variables and parameters, result type for functions */
	readonly typeId: TypeId
	readonly mutable: boolean
	/** Declaring node, or null for builtins */
	readonly declNodeId: NodeId | null
	/** Signature, for function symbols */
	readonly funcId: FuncId | null
}

/**
 * A function signature: a user function or a builtin.
 */
export interface FuncSignature {
	readonly nameId: StringId
	/** Accepted types per parameter: one for user functions, several for some builtins */
	readonly params: readonly (readonly TypeId[])[]
	readonly returnType: TypeId
	/** FuncDecl node for user functions */
	readonly declNodeId: NodeId | null
	/** Builtin name, for builtins */
	readonly builtin: BuiltinName | null
}

/**
 * Result of the check phase.
 */
export interface CheckResult {
	/** Whether checking succeeded (no errors) */
	readonly succeeded: boolean
}
