/**
 * Check phase exports.
 */

export { BUILTINS, type BuiltinDef, BuiltinName, getBuiltin, STD_MODULES, type StdModule } from './builtins.ts'
export { check } from './checker.ts'
export { INT64_MAX, INT64_MIN } from './expressions.ts'
export { blockReturns, isPanicCall, isTerminator, statementReturns } from './flow.ts'
export { type CallTarget, SemanticModel } from './model.ts'
export { FuncStore, ScopeStore, SymbolStore } from './stores.ts'
export {
	BuiltinTypeId,
	type CheckResult,
	type FuncId,
	type FuncSignature,
	funcId,
	type Scope,
	type ScopeId,
	ScopeKind,
	type SymbolId,
	type SymbolInfo,
	SymbolKind,
	scopeId,
	symbolId,
	type TypeId,
	typeFromName,
	typeId,
	typeName,
} from './types.ts'
