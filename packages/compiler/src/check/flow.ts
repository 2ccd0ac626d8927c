/**
 * Control-flow facts over checked statements: which statements end the
 * flow of their block, and which blocks always return.
 */

import {
	type BlockNode,
	type ExpressionNode,
	NodeKind,
	type StatementNode,
	type WhileStatementNode,
} from '../core/nodes.ts'
import { BuiltinName } from './builtins.ts'
import type { SemanticModel } from './model.ts'

function unwrapParens(expr: ExpressionNode): ExpressionNode {
	let current = expr
	while (current.kind === NodeKind.ParenExpr) current = current.expression
	return current
}

/**
 * True for a resolved call to the `panic` builtin.
 */
export function isPanicCall(expr: ExpressionNode, model: SemanticModel): boolean {
	if (expr.kind !== NodeKind.CallExpr) return false
	const target = model.calls.get(expr.id)
	return target !== undefined && target.kind === 'builtin' && target.name === BuiltinName.Panic
}

/**
 * Statements after which nothing else in the same block runs.
 */
export function isTerminator(stmt: StatementNode, model: SemanticModel): boolean {
	switch (stmt.kind) {
		case NodeKind.ReturnStatement:
		case NodeKind.BreakStatement:
		case NodeKind.ContinueStatement:
			return true
		case NodeKind.ExpressionStatement:
			return isPanicCall(stmt.expression, model)
		default:
			return false
	}
}

/**
 * Whether a `break` in `stmts` leaves the loop that encloses them.
 * Breaks inside nested loops target those loops instead.
 */
function containsBreak(stmts: readonly StatementNode[]): boolean {
	return stmts.some((stmt) => {
		switch (stmt.kind) {
			case NodeKind.BreakStatement:
				return true
			case NodeKind.Block:
				return containsBreak(stmt.statements)
			case NodeKind.IfStatement: {
				const alternate = stmt.alternate ? [stmt.alternate] : []
				return containsBreak([stmt.consequent, ...alternate])
			}
			default:
				return false
		}
	})
}

function isInfiniteLoop(loop: WhileStatementNode): boolean {
	const condition = unwrapParens(loop.condition)
	return condition.kind === NodeKind.BoolLiteral && condition.value && !containsBreak(loop.body.statements)
}

/**
 * Whether control can never fall off the end of `stmt`.
 */
export function statementReturns(stmt: StatementNode, model: SemanticModel): boolean {
	switch (stmt.kind) {
		case NodeKind.ReturnStatement:
			return true
		case NodeKind.ExpressionStatement:
			return isPanicCall(stmt.expression, model)
		case NodeKind.Block:
			return blockReturns(stmt, model)
		case NodeKind.IfStatement:
			return (
				stmt.alternate !== null &&
				blockReturns(stmt.consequent, model) &&
				statementReturns(stmt.alternate, model)
			)
		case NodeKind.WhileStatement:
			return isInfiniteLoop(stmt)
		default:
			return false
	}
}

/**
 * A block definitely returns when any of its statements does.
 */
export function blockReturns(block: BlockNode, model: SemanticModel): boolean {
	return block.statements.some((stmt) => statementReturns(stmt, model))
}
