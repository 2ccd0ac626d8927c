import type { ActionDict, FailedMatchResult, Node, Semantics } from 'ohm-js'
import { type CompilationContext, type StringId, stringId } from '../core/context.ts'
import {
	type AssignStatementNode,
	type BinaryExprNode,
	type BinaryOperator,
	type BlockNode,
	type BoolLiteralNode,
	type BreakStatementNode,
	type CallExprNode,
	type ContinueStatementNode,
	type ExpressionNode,
	type ExpressionStatementNode,
	type FloatLiteralNode,
	type FuncDeclNode,
	type IdentifierNode,
	type IfStatementNode,
	type ImportDeclNode,
	type IntLiteralNode,
	type LetStatementNode,
	type LogicalExprNode,
	type LogicalOperator,
	type ModuleDeclNode,
	type NameNode,
	NodeKind,
	type ParamNode,
	type ParenExprNode,
	PRIMITIVE_TYPE_NAMES,
	type ProgramNode,
	type ReturnStatementNode,
	type Span,
	type StatementNode,
	type StringLiteralNode,
	type TypeRefNode,
	UNARY_OPERATORS,
	type UnaryExprNode,
	type WhileStatementNode,
} from '../core/nodes.ts'
import { type TokenId, TokenKind, tokenId } from '../core/tokens.ts'
import { InternalCompilerError } from '../codegen/errors.ts'
import { binaryRuleName, PRECEDENCE, RerechanGrammar } from './grammar.ts'

export interface ParseResult {
	succeeded: boolean
	program?: ProgramNode
}

/**
 * The grammar's view of the token stream plus the map back to tokens.
 */
interface TokenRendering {
	readonly input: string
	/** starts[i] is the offset of token i in `input` */
	readonly starts: readonly number[]
}

function tokenText(context: CompilationContext, id: TokenId): string {
	const token = context.tokens.get(id)
	return context.source.slice(token.offset, token.offset + token.length)
}

function renderTokens(context: CompilationContext): TokenRendering {
	const parts: string[] = []
	const starts: number[] = []
	let length = 0

	for (const [id, token] of context.tokens) {
		starts.push(length)
		if (token.kind === TokenKind.Eof) continue
		const text = tokenText(context, id)
		parts.push(text, ' ')
		length += text.length + 1
	}

	return { input: parts.join(''), starts }
}

/**
 * Token whose rendering starts at or after `index` (the first one).
 * Falls back to the last token (Eof).
 */
function tokenAtIndex(rendering: TokenRendering, index: number): TokenId {
	const { starts } = rendering
	let lo = 0
	let hi = starts.length - 1
	while (lo < hi) {
		const mid = (lo + hi) >>> 1
		const start = starts[mid] ?? Number.POSITIVE_INFINITY
		if (start < index) lo = mid + 1
		else hi = mid
	}
	return tokenId(lo)
}

function describeToken(context: CompilationContext, id: TokenId): string {
	const token = context.tokens.get(id)
	if (token.kind === TokenKind.Eof) return 'end of input'
	return `\`${tokenText(context, id)}\``
}

function reportSyntaxError(
	context: CompilationContext,
	rendering: TokenRendering,
	matchResult: FailedMatchResult
): void {
	const tid = tokenAtIndex(rendering, matchResult.getInterval().startIdx)
	const expected = (matchResult.shortMessage ?? '').replace(/^Line \d+, col \d+: /, '')
	const found = `unexpected ${describeToken(context, tid)}`
	context.emitAtToken('RRPARSE001', tid, {
		detail: expected ? `${found}, ${expected}` : found,
	})
}

/** Narrow grammar text to one of a closed set of spellings. */
export function pick<T extends string>(options: readonly T[], text: string): T {
	const found = options.find((o) => o === text)
	if (found === undefined) {
		throw new InternalCompilerError(`unexpected text from grammar: ${text}`)
	}
	return found
}

function isLogical(op: BinaryOperator | LogicalOperator): op is LogicalOperator {
	return op === '&&' || op === '||'
}

function createAstSemantics(context: CompilationContext, rendering: TokenRendering): Semantics {
	const semantics = RerechanGrammar.createSemantics()

	function tokenOf(node: Node): TokenId {
		return tokenAtIndex(rendering, node.source.startIdx)
	}

	function at(node: Node): { span: Span; tokenId: TokenId } {
		const tid = tokenOf(node)
		const token = context.tokens.get(tid)
		return {
			span: { column: token.column, line: token.line, offset: token.offset },
			tokenId: tid,
		}
	}

	function payloadOf(node: Node): StringId {
		const token = context.tokens.get(tokenOf(node))
		return stringId(token.payload)
	}

	function name(node: Node): NameNode {
		return context.nodes.add<NameNode>((id) => ({
			id,
			kind: NodeKind.Name,
			nameId: payloadOf(node),
			...at(node),
		}))
	}

	/** Import segments may be keywords (`std.string`), which carry no payload. */
	function segmentName(node: Node): NameNode {
		return context.nodes.add<NameNode>((id) => ({
			id,
			kind: NodeKind.Name,
			nameId: context.strings.intern(tokenText(context, tokenOf(node))),
			...at(node),
		}))
	}

	function identifier(node: Node): IdentifierNode {
		return context.nodes.add<IdentifierNode>((id) => ({
			id,
			kind: NodeKind.Identifier,
			nameId: payloadOf(node),
			...at(node),
		}))
	}

	function literalText(node: Node): string {
		return context.strings.get(payloadOf(node))
	}

	function optional<T>(iter: Node, convert: (child: Node) => T): T | null {
		const child = iter.children[0]
		return child === undefined ? null : convert(child)
	}

	const expr = (node: Node): ExpressionNode => node['toExpression']()
	const stmt = (node: Node): StatementNode => node['toStatement']()
	const block = (node: Node): BlockNode => node['toBlock']()
	const typeRef = (node: Node): TypeRefNode => node['toType']()

	// =========================================================================
	// Expressions
	// =========================================================================

	const binaryActions: ActionDict<ExpressionNode> = {}
	for (const level of PRECEDENCE) {
		binaryActions[`${binaryRuleName(level)}_binary`] = function (
			this: Node,
			left: Node,
			opNode: Node,
			right: Node
		): ExpressionNode {
			const operator = pick(level.operators, opNode.sourceString)
			const lhs = expr(left)
			const rhs = expr(right)
			const operatorTokenId = tokenOf(opNode)
			if (isLogical(operator)) {
				return context.nodes.add<LogicalExprNode>((id) => ({
					id,
					kind: NodeKind.LogicalExpr,
					left: lhs,
					operator,
					operatorTokenId,
					right: rhs,
					...at(this),
				}))
			}
			return context.nodes.add<BinaryExprNode>((id) => ({
				id,
				kind: NodeKind.BinaryExpr,
				left: lhs,
				operator,
				operatorTokenId,
				right: rhs,
				...at(this),
			}))
		}
	}

	semantics.addOperation<ExpressionNode>('toExpression', {
		...binaryActions,
		Expr(inner: Node): ExpressionNode {
			return expr(inner)
		},
		Postfix_call(callee: Node, _lp: Node, args: Node, _rp: Node): ExpressionNode {
			const calleeNode = identifier(callee)
			const argNodes = args.asIteration().children.map(expr)
			return context.nodes.add<CallExprNode>((id) => ({
				args: argNodes,
				callee: calleeNode,
				id,
				kind: NodeKind.CallExpr,
				...at(this),
			}))
		},
		Primary_false(_kw: Node): ExpressionNode {
			return context.nodes.add<BoolLiteralNode>((id) => ({
				id,
				kind: NodeKind.BoolLiteral,
				value: false,
				...at(this),
			}))
		},
		Primary_float(_lit: Node): ExpressionNode {
			const text = literalText(this)
			return context.nodes.add<FloatLiteralNode>((id) => ({
				id,
				kind: NodeKind.FloatLiteral,
				text,
				...at(this),
			}))
		},
		Primary_ident(ident: Node): ExpressionNode {
			return identifier(ident)
		},
		Primary_int(_lit: Node): ExpressionNode {
			const text = literalText(this)
			return context.nodes.add<IntLiteralNode>((id) => ({
				id,
				kind: NodeKind.IntLiteral,
				text,
				...at(this),
			}))
		},
		Primary_paren(_lp: Node, inner: Node, _rp: Node): ExpressionNode {
			const expression = expr(inner)
			return context.nodes.add<ParenExprNode>((id) => ({
				expression,
				id,
				kind: NodeKind.ParenExpr,
				...at(this),
			}))
		},
		Primary_string(_lit: Node): ExpressionNode {
			const value = literalText(this)
			return context.nodes.add<StringLiteralNode>((id) => ({
				id,
				kind: NodeKind.StringLiteral,
				value,
				...at(this),
			}))
		},
		Primary_true(_kw: Node): ExpressionNode {
			return context.nodes.add<BoolLiteralNode>((id) => ({
				id,
				kind: NodeKind.BoolLiteral,
				value: true,
				...at(this),
			}))
		},
		Unary_op(opNode: Node, operandNode: Node): ExpressionNode {
			const operator = pick(UNARY_OPERATORS, opNode.sourceString)
			const position = at(this)
			const operand = expr(operandNode)
			return context.nodes.add<UnaryExprNode>((id) => ({
				id,
				kind: NodeKind.UnaryExpr,
				operand,
				operator,
				...position,
			}))
		},
	})

	// =========================================================================
	// Types
	// =========================================================================

	semantics.addOperation<TypeRefNode>('toType', {
		Type(kw: Node): TypeRefNode {
			const typeName = pick(PRIMITIVE_TYPE_NAMES, kw.sourceString)
			return context.nodes.add<TypeRefNode>((id) => ({
				id,
				kind: NodeKind.TypeRef,
				name: typeName,
				...at(this),
			}))
		},
	})

	// =========================================================================
	// Statements
	// =========================================================================

	semantics.addOperation<BlockNode>('toBlock', {
		Block(_lb: Node, statements: Node, _rb: Node): BlockNode {
			const position = at(this)
			const children = statements.children.map(stmt)
			return context.nodes.add<BlockNode>((id) => ({
				id,
				kind: NodeKind.Block,
				statements: children,
				...position,
			}))
		},
	})

	function ifStatement(node: Node, condNode: Node, body: Node, elseClause: Node): IfStatementNode {
		const position = at(node)
		const condition = expr(condNode)
		const consequent = block(body)
		const alternate = optional(elseClause, (clause): BlockNode | IfStatementNode => clause['toElse']())
		return context.nodes.add<IfStatementNode>((id) => ({
			alternate,
			condition,
			consequent,
			id,
			kind: NodeKind.IfStatement,
			...position,
		}))
	}

	semantics.addOperation<BlockNode | IfStatementNode>('toElse', {
		ElseClause_else(_kw: Node, body: Node) {
			return block(body)
		},
		ElseClause_elseIf(_kw: Node, nested: Node) {
			const node: IfStatementNode = nested['toStatement']()
			return node
		},
	})

	semantics.addOperation<StatementNode>('toStatement', {
		AssignStatement(target: Node, _eq: Node, value: Node, _semi: Node): StatementNode {
			const position = at(this)
			const targetNode = identifier(target)
			const valueNode = expr(value)
			return context.nodes.add<AssignStatementNode>((id) => ({
				id,
				kind: NodeKind.AssignStatement,
				target: targetNode,
				value: valueNode,
				...position,
			}))
		},
		Block(_lb: Node, _statements: Node, _rb: Node): StatementNode {
			return block(this)
		},
		BreakStatement(_kw: Node, _semi: Node): StatementNode {
			return context.nodes.add<BreakStatementNode>((id) => ({
				id,
				kind: NodeKind.BreakStatement,
				...at(this),
			}))
		},
		ContinueStatement(_kw: Node, _semi: Node): StatementNode {
			return context.nodes.add<ContinueStatementNode>((id) => ({
				id,
				kind: NodeKind.ContinueStatement,
				...at(this),
			}))
		},
		ExpressionStatement(expression: Node, _semi: Node): StatementNode {
			const position = at(this)
			const inner = expr(expression)
			return context.nodes.add<ExpressionStatementNode>((id) => ({
				expression: inner,
				id,
				kind: NodeKind.ExpressionStatement,
				...position,
			}))
		},
		IfStatement(_kw: Node, _lp: Node, condition: Node, _rp: Node, body: Node, elseClause: Node) {
			return ifStatement(this, condition, body, elseClause)
		},
		LetStatement(
			kw: Node,
			ident: Node,
			annotation: Node,
			_eq: Node,
			init: Node,
			_semi: Node
		): StatementNode {
			const position = at(this)
			const nameNode = name(ident)
			const type = optional(annotation, (a) => typeRef(a.child(1)))
			const initNode = expr(init)
			return context.nodes.add<LetStatementNode>((id) => ({
				id,
				init: initNode,
				kind: NodeKind.LetStatement,
				mutable: kw.sourceString === 'var',
				name: nameNode,
				type,
				...position,
			}))
		},
		ReturnStatement(_kw: Node, value: Node, _semi: Node): StatementNode {
			const position = at(this)
			const valueNode = optional(value, expr)
			return context.nodes.add<ReturnStatementNode>((id) => ({
				id,
				kind: NodeKind.ReturnStatement,
				value: valueNode,
				...position,
			}))
		},
		Statement(inner: Node): StatementNode {
			return stmt(inner)
		},
		WhileStatement(_kw: Node, _lp: Node, condition: Node, _rp: Node, body: Node): StatementNode {
			const position = at(this)
			const conditionNode = expr(condition)
			const bodyNode = block(body)
			return context.nodes.add<WhileStatementNode>((id) => ({
				body: bodyNode,
				condition: conditionNode,
				id,
				kind: NodeKind.WhileStatement,
				...position,
			}))
		},
	})

	// =========================================================================
	// Declarations
	// =========================================================================

	semantics.addOperation<ParamNode>('toParam', {
		Param(ident: Node, _colon: Node, type: Node): ParamNode {
			const position = at(this)
			const nameNode = name(ident)
			const typeNode = typeRef(type)
			return context.nodes.add<ParamNode>((id) => ({
				id,
				kind: NodeKind.Param,
				name: nameNode,
				type: typeNode,
				...position,
			}))
		},
	})

	semantics.addOperation<FuncDeclNode>('toFunc', {
		FuncDecl(
			_kw: Node,
			ident: Node,
			_lp: Node,
			params: Node,
			_rp: Node,
			returnType: Node,
			body: Node
		): FuncDeclNode {
			const position = at(this)
			const nameNode = name(ident)
			const paramNodes = params.asIteration().children.map((p): ParamNode => p['toParam']())
			const returnTypeNode = optional(returnType, (r) => typeRef(r.child(1)))
			const bodyNode = block(body)
			return context.nodes.add<FuncDeclNode>((id) => ({
				body: bodyNode,
				id,
				kind: NodeKind.FuncDecl,
				name: nameNode,
				params: paramNodes,
				returnType: returnTypeNode,
				...position,
			}))
		},
	})

	semantics.addOperation<ProgramNode>('toProgram', {
		Program(moduleDecl: Node, imports: Node, funcs: Node): ProgramNode {
			const position = at(this)

			const moduleName = name(moduleDecl.child(1))
			const moduleNode = context.nodes.add<ModuleDeclNode>((id) => ({
				id,
				kind: NodeKind.ModuleDecl,
				name: moduleName,
				...at(moduleDecl),
			}))

			const importNodes = imports.children.map((decl) => {
				const declPosition = at(decl)
				const path = decl.child(1).asIteration().children.map(segmentName)
				return context.nodes.add<ImportDeclNode>((id) => ({
					id,
					kind: NodeKind.ImportDecl,
					path,
					...declPosition,
				}))
			})

			const funcNodes = funcs.children.map((f): FuncDeclNode => f['toFunc']())

			return context.nodes.add<ProgramNode>((id) => ({
				funcs: funcNodes,
				id,
				imports: importNodes,
				kind: NodeKind.Program,
				module: moduleNode,
				...position,
			}))
		},
	})

	return semantics
}

/**
 * Parses tokens from context.tokens, populating context.nodes and
 * setting context.program. Stops at the first syntax error.
 */
export function parse(context: CompilationContext): ParseResult {
	const rendering = renderTokens(context)
	const matchResult = RerechanGrammar.match(rendering.input)

	if (matchResult.failed()) {
		reportSyntaxError(context, rendering, matchResult)
		return { succeeded: false }
	}

	const semantics = createAstSemantics(context, rendering)
	const program: ProgramNode = semantics(matchResult)['toProgram']()
	context.program = program

	return { program, succeeded: true }
}

/** Check the token stream against the grammar without building nodes. */
export function matchOnly(context: CompilationContext): boolean {
	return RerechanGrammar.match(renderTokens(context).input).succeeded()
}
