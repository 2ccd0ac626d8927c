/**
 * Core data structures for the rerec compiler.
 * Dense stores with integer IDs, shared by every phase through the CompilationContext.
 */

export {
	CompilationContext,
	type Diagnostic,
	type StringId,
	StringStore,
	stringId,
	stripBom,
} from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from './diagnostics.ts'
export {
	type AstNode,
	childrenOf,
	type ExpressionNode,
	type NodeId,
	NodeKind,
	NodeStore,
	nodeId,
	type ProgramNode,
	type Span,
	type StatementNode,
	walkPreorder,
} from './nodes.ts'
export { formatAst } from './dump.ts'
export { type Token, type TokenId, TokenKind, TokenStore, tokenId } from './tokens.ts'
