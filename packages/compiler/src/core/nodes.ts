/**
 * Abstract syntax tree: a closed set of node variants discriminated by `kind`.
 * Every node is also registered in a NodeStore arena under its NodeId, so later
 * phases can key side tables and diagnostics by integer ID.
 */

import type { StringId } from './context.ts'
import type { TokenId } from './tokens.ts'

/**
 * Node kinds - one per grammar production.
 * Ranges: program structure 0-9, statements 10-99, expressions 100-149.
 */
export const NodeKind = {
	AssignStatement: 12,
	BinaryExpr: 106,
	Block: 10,
	BoolLiteral: 104,
	BreakStatement: 16,
	CallExpr: 108,
	ContinueStatement: 17,
	ExpressionStatement: 18,
	FloatLiteral: 102,
	FuncDecl: 3,
	Identifier: 100,
	IfStatement: 13,
	ImportDecl: 2,
	IntLiteral: 101,
	LetStatement: 11,
	LogicalExpr: 107,
	ModuleDecl: 1,
	Name: 6,
	Param: 4,
	ParenExpr: 109,
	Program: 0,
	ReturnStatement: 15,
	StringLiteral: 103,
	TypeRef: 5,
	UnaryExpr: 105,
	WhileStatement: 14,
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

/**
 * Branded type for node IDs.
 * Provides type safety while remaining a plain number at runtime.
 */
export type NodeId = number & { readonly __brand: 'NodeId' }

export function nodeId(n: number): NodeId {
	return n as NodeId
}

/** Source position of a node's first token. */
export interface Span {
	/** 1-indexed */
	readonly line: number
	/** 1-indexed */
	readonly column: number
	/** 0-indexed character offset */
	readonly offset: number
}

interface NodeBase {
	readonly id: NodeId
	readonly span: Span
	/** Primary token for this node (for error reporting and source mapping) */
	readonly tokenId: TokenId
}

export const PRIMITIVE_TYPE_NAMES = ['int', 'float', 'bool', 'string', 'void'] as const
export type PrimitiveTypeName = (typeof PRIMITIVE_TYPE_NAMES)[number]

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%'
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>='
export type BinaryOperator = ArithmeticOperator | ComparisonOperator
export type LogicalOperator = '&&' | '||'

export const UNARY_OPERATORS = ['-', '!'] as const
export type UnaryOperator = (typeof UNARY_OPERATORS)[number]

// =============================================================================
// Program structure
// =============================================================================

/** A declaration-site name (never resolved, only declared). */
export interface NameNode extends NodeBase {
	readonly kind: typeof NodeKind.Name
	readonly nameId: StringId
}

export interface TypeRefNode extends NodeBase {
	readonly kind: typeof NodeKind.TypeRef
	readonly name: PrimitiveTypeName
}

export interface ModuleDeclNode extends NodeBase {
	readonly kind: typeof NodeKind.ModuleDecl
	readonly name: NameNode
}

export interface ImportDeclNode extends NodeBase {
	readonly kind: typeof NodeKind.ImportDecl
	readonly path: readonly NameNode[]
}

export interface ParamNode extends NodeBase {
	readonly kind: typeof NodeKind.Param
	readonly name: NameNode
	readonly type: TypeRefNode
}

export interface FuncDeclNode extends NodeBase {
	readonly kind: typeof NodeKind.FuncDecl
	readonly name: NameNode
	readonly params: readonly ParamNode[]
	/** null when no `-> Type` is written (void) */
	readonly returnType: TypeRefNode | null
	readonly body: BlockNode
}

export interface ProgramNode extends NodeBase {
	readonly kind: typeof NodeKind.Program
	readonly module: ModuleDeclNode
	readonly imports: readonly ImportDeclNode[]
	readonly funcs: readonly FuncDeclNode[]
}

// =============================================================================
// Statements
// =============================================================================

export interface BlockNode extends NodeBase {
	readonly kind: typeof NodeKind.Block
	readonly statements: readonly StatementNode[]
}

export interface LetStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.LetStatement
	/** `var` bindings are mutable, `let` bindings are not */
	readonly mutable: boolean
	readonly name: NameNode
	readonly type: TypeRefNode | null
	readonly init: ExpressionNode
}

export interface AssignStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.AssignStatement
	readonly target: IdentifierNode
	readonly value: ExpressionNode
}

export interface IfStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.IfStatement
	readonly condition: ExpressionNode
	readonly consequent: BlockNode
	readonly alternate: BlockNode | IfStatementNode | null
}

export interface WhileStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.WhileStatement
	readonly condition: ExpressionNode
	readonly body: BlockNode
}

export interface ReturnStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.ReturnStatement
	readonly value: ExpressionNode | null
}

export interface BreakStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.BreakStatement
}

export interface ContinueStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.ContinueStatement
}

export interface ExpressionStatementNode extends NodeBase {
	readonly kind: typeof NodeKind.ExpressionStatement
	readonly expression: ExpressionNode
}

export type StatementNode =
	| BlockNode
	| LetStatementNode
	| AssignStatementNode
	| IfStatementNode
	| WhileStatementNode
	| ReturnStatementNode
	| BreakStatementNode
	| ContinueStatementNode
	| ExpressionStatementNode

// =============================================================================
// Expressions
// =============================================================================

/** An identifier in expression position: resolved to exactly one symbol. */
export interface IdentifierNode extends NodeBase {
	readonly kind: typeof NodeKind.Identifier
	readonly nameId: StringId
}

export interface IntLiteralNode extends NodeBase {
	readonly kind: typeof NodeKind.IntLiteral
	/** Lexeme as written (decimal, 0x or 0b form) */
	readonly text: string
}

export interface FloatLiteralNode extends NodeBase {
	readonly kind: typeof NodeKind.FloatLiteral
	readonly text: string
}

export interface StringLiteralNode extends NodeBase {
	readonly kind: typeof NodeKind.StringLiteral
	/** Decoded value (escapes applied) */
	readonly value: string
}

export interface BoolLiteralNode extends NodeBase {
	readonly kind: typeof NodeKind.BoolLiteral
	readonly value: boolean
}

export interface UnaryExprNode extends NodeBase {
	readonly kind: typeof NodeKind.UnaryExpr
	readonly operator: UnaryOperator
	readonly operand: ExpressionNode
}

export interface BinaryExprNode extends NodeBase {
	readonly kind: typeof NodeKind.BinaryExpr
	/** Token of the operator itself, for operand diagnostics */
	readonly operatorTokenId: TokenId
	readonly operator: BinaryOperator
	readonly left: ExpressionNode
	readonly right: ExpressionNode
}

export interface LogicalExprNode extends NodeBase {
	readonly kind: typeof NodeKind.LogicalExpr
	/** Token of the operator itself, for operand diagnostics */
	readonly operatorTokenId: TokenId
	readonly operator: LogicalOperator
	readonly left: ExpressionNode
	readonly right: ExpressionNode
}

export interface CallExprNode extends NodeBase {
	readonly kind: typeof NodeKind.CallExpr
	readonly callee: IdentifierNode
	readonly args: readonly ExpressionNode[]
}

export interface ParenExprNode extends NodeBase {
	readonly kind: typeof NodeKind.ParenExpr
	readonly expression: ExpressionNode
}

export type ExpressionNode =
	| IdentifierNode
	| IntLiteralNode
	| FloatLiteralNode
	| StringLiteralNode
	| BoolLiteralNode
	| UnaryExprNode
	| BinaryExprNode
	| LogicalExprNode
	| CallExprNode
	| ParenExprNode

export type AstNode =
	| ProgramNode
	| ModuleDeclNode
	| ImportDeclNode
	| FuncDeclNode
	| ParamNode
	| TypeRefNode
	| NameNode
	| StatementNode
	| ExpressionNode

/**
 * Direct children of a node, in source order.
 */
export function childrenOf(node: AstNode): AstNode[] {
	switch (node.kind) {
		case NodeKind.Program:
			return [node.module, ...node.imports, ...node.funcs]
		case NodeKind.ModuleDecl:
			return [node.name]
		case NodeKind.ImportDecl:
			return [...node.path]
		case NodeKind.FuncDecl:
			return [
				node.name,
				...node.params,
				...(node.returnType ? [node.returnType] : []),
				node.body,
			]
		case NodeKind.Param:
			return [node.name, node.type]
		case NodeKind.Block:
			return [...node.statements]
		case NodeKind.LetStatement:
			return [node.name, ...(node.type ? [node.type] : []), node.init]
		case NodeKind.AssignStatement:
			return [node.target, node.value]
		case NodeKind.IfStatement:
			return [node.condition, node.consequent, ...(node.alternate ? [node.alternate] : [])]
		case NodeKind.WhileStatement:
			return [node.condition, node.body]
		case NodeKind.ReturnStatement:
			return node.value ? [node.value] : []
		case NodeKind.ExpressionStatement:
			return [node.expression]
		case NodeKind.UnaryExpr:
			return [node.operand]
		case NodeKind.BinaryExpr:
		case NodeKind.LogicalExpr:
			return [node.left, node.right]
		case NodeKind.CallExpr:
			return [node.callee, ...node.args]
		case NodeKind.ParenExpr:
			return [node.expression]
		case NodeKind.TypeRef:
		case NodeKind.Name:
		case NodeKind.BreakStatement:
		case NodeKind.ContinueStatement:
		case NodeKind.Identifier:
		case NodeKind.IntLiteral:
		case NodeKind.FloatLiteral:
		case NodeKind.StringLiteral:
		case NodeKind.BoolLiteral:
			return []
	}
}

/**
 * Walk a subtree in pre-order (parent before children, children in source order).
 */
export function* walkPreorder(root: AstNode): Generator<AstNode> {
	const stack: AstNode[] = [root]
	while (stack.length > 0) {
		const node = stack.pop()
		if (node === undefined) break
		yield node
		const children = childrenOf(node)
		for (let i = children.length - 1; i >= 0; i--) {
			const child = children[i]
			if (child !== undefined) stack.push(child)
		}
	}
}

/**
 * Arena of AST nodes, indexed by NodeId.
 * Append-only during parsing phase.
 */
export class NodeStore {
	private readonly nodes: AstNode[] = []

	/** Allocate the next NodeId and register the node built for it. */
	add<T extends AstNode>(build: (id: NodeId) => T): T {
		const node = build(nodeId(this.nodes.length))
		this.nodes.push(node)
		return node
	}

	get(id: NodeId): AstNode {
		const node = this.nodes[id]
		if (node === undefined) {
			throw new Error(`Invalid NodeId: ${id}`)
		}
		return node
	}

	count(): number {
		return this.nodes.length
	}

	isValid(id: NodeId): boolean {
		return id >= 0 && id < this.nodes.length
	}

	*[Symbol.iterator](): Generator<[NodeId, AstNode]> {
		for (let i = 0; i < this.nodes.length; i++) {
			const node = this.nodes[i]
			if (node !== undefined) yield [nodeId(i), node]
		}
	}
}
