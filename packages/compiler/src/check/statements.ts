/**
 * Statement checking, scope management for blocks, and grouped
 * unreachable-code warnings.
 */

import {
	type AssignStatementNode,
	type BlockNode,
	type IfStatementNode,
	type LetStatementNode,
	NodeKind,
	type ReturnStatementNode,
	type StatementNode,
	type WhileStatementNode,
	walkPreorder,
} from '../core/nodes.ts'
import { resolveTypeRef } from './declarations.ts'
import { checkExpression, checkValue, expectType, resolveIdentifier } from './expressions.ts'
import { isTerminator } from './flow.ts'
import { type CheckerState, declareSymbol, popScope, pushScope, type UnreachableRange } from './state.ts'
import { BuiltinTypeId, ScopeKind, SymbolKind, typeName } from './types.ts'

// =============================================================================
// Unreachable code
// =============================================================================

/**
 * Emit the grouped unreachable warning for a finished run of statements.
 */
function flushUnreachableWarning(range: UnreachableRange | null, state: CheckerState): void {
	if (!range) return

	const { endLine, firstNodeId, startLine } = range

	if (startLine === endLine) {
		state.context.emitAtNode('RRCHECK050', firstNodeId)
	} else {
		const suggestion = `Lines ${startLine}-${endLine} are unreachable. You can safely remove this code, or move it before the exit point.`
		state.context.emitAtNodeWithSuggestion('RRCHECK050', firstNodeId, suggestion)
	}
}

/**
 * Extend (or start) the run of unreachable statements.
 */
function trackUnreachable(stmt: StatementNode, range: UnreachableRange | null): UnreachableRange {
	const { line } = stmt.span
	const lastLine = lastLineOf(stmt)
	if (!range) {
		return { endLine: lastLine, firstNodeId: stmt.id, startLine: line }
	}
	range.endLine = lastLine
	return range
}

/**
 * Last source line a statement reaches (through its nested statements).
 */
function lastLineOf(stmt: StatementNode): number {
	let maxLine = stmt.span.line
	for (const node of walkPreorder(stmt)) {
		maxLine = Math.max(maxLine, node.span.line)
	}
	return maxLine
}

// =============================================================================
// Statements
// =============================================================================

function checkLet(stmt: LetStatementNode, state: CheckerState): void {
	const initType = checkValue(stmt.init, state)
	let type = initType

	if (stmt.type) {
		const declared = resolveTypeRef(stmt.type, state, false)
		if (declared !== BuiltinTypeId.Invalid) {
			expectType(stmt.init, initType, [declared], state)
		}
		type = declared
	}

	declareSymbol(state, stmt.id, stmt.name.id, {
		funcId: null,
		kind: SymbolKind.Variable,
		mutable: stmt.mutable,
		nameId: stmt.name.nameId,
		typeId: type,
	})
}

function checkAssign(stmt: AssignStatementNode, state: CheckerState): void {
	const resolved = resolveIdentifier(stmt.target, state)
	const valueType = checkValue(stmt.value, state)
	if (resolved === null) return

	const { symbol } = resolved
	const name = state.context.strings.get(stmt.target.nameId)
	if (symbol.kind === SymbolKind.Function) {
		state.context.emitAtNode('RRTYPE010', stmt.target.id, { name })
		return
	}
	if (!symbol.mutable) {
		state.context.emitAtNode('RRTYPE006', stmt.target.id, { name })
		return
	}
	expectType(stmt.value, valueType, [symbol.typeId], state)
}

function checkCondition(stmt: IfStatementNode | WhileStatementNode, state: CheckerState): void {
	const type = checkExpression(stmt.condition, state)
	expectType(stmt.condition, type, [BuiltinTypeId.Bool], state)
}

function checkIf(stmt: IfStatementNode, state: CheckerState): void {
	checkCondition(stmt, state)
	checkBlock(stmt.consequent, state)
	if (stmt.alternate === null) return
	if (stmt.alternate.kind === NodeKind.Block) {
		checkBlock(stmt.alternate, state)
	} else {
		checkIf(stmt.alternate, state)
	}
}

function checkWhile(stmt: WhileStatementNode, state: CheckerState): void {
	checkCondition(stmt, state)
	state.loopDepth++
	checkBlock(stmt.body, state)
	state.loopDepth--
}

function checkReturn(stmt: ReturnStatementNode, state: CheckerState): void {
	const func = state.currentFunction
	console.assert(func !== null, 'return checked outside a function')
	if (func === null) return

	const { context } = state
	if (stmt.value === null) {
		if (func.returnType !== BuiltinTypeId.Void && func.returnType !== BuiltinTypeId.Invalid) {
			context.emitAtNode('RRTYPE012', stmt.id, { type: typeName(func.returnType) })
		}
		return
	}

	if (func.returnType === BuiltinTypeId.Void) {
		checkExpression(stmt.value, state)
		context.emitAtNode('RRTYPE013', stmt.value.id, { name: context.strings.get(func.nameId) })
		return
	}

	const type = checkValue(stmt.value, state)
	expectType(stmt.value, type, [func.returnType], state)
}

function checkLoopJump(stmt: StatementNode, keyword: string, state: CheckerState): void {
	if (state.loopDepth === 0) {
		state.context.emitAtNode('RRRES005', stmt.id, { keyword })
	}
}

function checkStatement(stmt: StatementNode, state: CheckerState): void {
	switch (stmt.kind) {
		case NodeKind.Block:
			checkBlock(stmt, state)
			break
		case NodeKind.LetStatement:
			checkLet(stmt, state)
			break
		case NodeKind.AssignStatement:
			checkAssign(stmt, state)
			break
		case NodeKind.IfStatement:
			checkIf(stmt, state)
			break
		case NodeKind.WhileStatement:
			checkWhile(stmt, state)
			break
		case NodeKind.ReturnStatement:
			checkReturn(stmt, state)
			break
		case NodeKind.BreakStatement:
			checkLoopJump(stmt, 'break', state)
			break
		case NodeKind.ContinueStatement:
			checkLoopJump(stmt, 'continue', state)
			break
		case NodeKind.ExpressionStatement:
			checkExpression(stmt.expression, state)
			break
	}
}

/**
 * Check a statement list in the current scope.
 * Statements following a terminator are reported as one grouped warning.
 */
export function checkStatements(statements: readonly StatementNode[], state: CheckerState): void {
	const scope = state.currentScope
	let range: UnreachableRange | null = null

	for (const stmt of statements) {
		if (!scope.reachable) {
			range = trackUnreachable(stmt, range)
		}

		checkStatement(stmt, state)

		if (isTerminator(stmt, state.model)) {
			scope.reachable = false
		}
	}

	flushUnreachableWarning(range, state)
}

/**
 * Check a nested block in a fresh scope.
 */
export function checkBlock(block: BlockNode, state: CheckerState): void {
	pushScope(state, ScopeKind.Block)
	checkStatements(block.statements, state)
	popScope(state)
}
