/**
 * Expression checking: name binding, literal validation and typing.
 * Every checked expression gets an entry in model.exprTypes.
 */

import {
	type BinaryExprNode,
	type CallExprNode,
	type ExpressionNode,
	type IdentifierNode,
	type IntLiteralNode,
	type LogicalExprNode,
	NodeKind,
	type UnaryExprNode,
} from '../core/nodes.ts'
import type { CallTarget } from './model.ts'
import { type CheckerState, lookupSymbol, missingImportFor } from './state.ts'
import {
	BuiltinTypeId,
	isNumeric,
	type SymbolId,
	type SymbolInfo,
	SymbolKind,
	type TypeId,
	typeName,
} from './types.ts'

export const INT64_MAX = 2n ** 63n - 1n
export const INT64_MIN = -(2n ** 63n)

function record(expr: ExpressionNode, type: TypeId, state: CheckerState): TypeId {
	state.model.exprTypes.set(expr.id, type)
	return type
}

function quoted(type: TypeId): string {
	return `\`${typeName(type)}\``
}

/**
 * Format an accepted-types list for an "expected ..." message.
 */
export function describeExpected(types: readonly TypeId[]): string {
	const names = types.map(quoted)
	if (names.length <= 1) return names.join('')
	return `${names.slice(0, -1).join(', ')} or ${names[names.length - 1]}`
}

/**
 * Report a mismatch unless either side is already invalid.
 * Returns whether `found` is acceptable.
 */
export function expectType(
	expr: ExpressionNode,
	found: TypeId,
	expected: readonly TypeId[],
	state: CheckerState
): boolean {
	if (found === BuiltinTypeId.Invalid || expected.includes(BuiltinTypeId.Invalid)) return true
	if (expected.includes(found)) return true
	state.context.emitAtNode('RRTYPE001', expr.id, {
		expected: describeExpected(expected),
		found: typeName(found),
	})
	return false
}

// =============================================================================
// Names
// =============================================================================

/**
 * Bind an identifier reference to its symbol.
 * Reports an UnresolvedIdentifierError at the reference when nothing visible matches.
 */
export function resolveIdentifier(
	ident: IdentifierNode,
	state: CheckerState
): { id: SymbolId; symbol: SymbolInfo } | null {
	const { context, model } = state
	const name = context.strings.get(ident.nameId)
	const id = lookupSymbol(state, ident.nameId)
	if (id === undefined) {
		context.emitAtNode('RRRES002', ident.id, { name })
		return null
	}

	const symbol = model.symbols.get(id)
	const module = missingImportFor(state, symbol)
	if (module !== null) {
		context.emitAtNodeWithSuggestion(
			'RRRES002',
			ident.id,
			`\`${name}\` is provided by \`${module}\`; add \`import ${module};\` after the module declaration.`,
			{ name }
		)
		return null
	}

	model.bindings.set(ident.id, id)
	return { id, symbol }
}

function checkIdentifier(ident: IdentifierNode, state: CheckerState): TypeId {
	const resolved = resolveIdentifier(ident, state)
	if (resolved === null) return BuiltinTypeId.Invalid
	if (resolved.symbol.kind === SymbolKind.Function) {
		state.context.emitAtNode('RRTYPE010', ident.id, {
			name: state.context.strings.get(ident.nameId),
		})
		return BuiltinTypeId.Invalid
	}
	return resolved.symbol.typeId
}

// =============================================================================
// Literals
// =============================================================================

function checkIntValue(
	node: ExpressionNode,
	value: bigint,
	text: string,
	state: CheckerState
): TypeId {
	if (value > INT64_MAX || value < INT64_MIN) {
		state.context.emitAtNode('RRTYPE008', node.id, { value: text })
		return BuiltinTypeId.Invalid
	}
	state.model.intValues.set(node.id, value)
	return BuiltinTypeId.Int
}

function checkIntLiteral(lit: IntLiteralNode, state: CheckerState): TypeId {
	return checkIntValue(lit, BigInt(lit.text), lit.text, state)
}

/**
 * `-<literal>` is folded into one constant so the most negative int is writable.
 */
function checkNegatedLiteral(expr: UnaryExprNode, lit: IntLiteralNode, state: CheckerState): TypeId {
	const type = checkIntValue(expr, -BigInt(lit.text), `-${lit.text}`, state)
	record(lit, type, state)
	return type
}

function checkFloatLiteral(text: string, expr: ExpressionNode, state: CheckerState): TypeId {
	const value = Number(text)
	if (!Number.isFinite(value)) {
		state.context.emitAtNode('RRTYPE009', expr.id, { value: text })
		return BuiltinTypeId.Invalid
	}
	state.model.floatValues.set(expr.id, value)
	return BuiltinTypeId.Float
}

// =============================================================================
// Operators
// =============================================================================

function checkUnary(expr: UnaryExprNode, state: CheckerState): TypeId {
	const { operand } = expr
	if (expr.operator === '-' && operand.kind === NodeKind.IntLiteral) {
		return checkNegatedLiteral(expr, operand, state)
	}

	const type = checkExpression(operand, state)
	if (type === BuiltinTypeId.Invalid) return type

	const valid = expr.operator === '-' ? isNumeric(type) : type === BuiltinTypeId.Bool
	if (!valid) {
		state.context.emitAtNode('RRTYPE003', expr.id, { op: expr.operator, type: typeName(type) })
		return BuiltinTypeId.Invalid
	}
	return type
}

/**
 * Result type of a binary operator on two operands of the same type,
 * or null when the operator does not apply.
 */
function binaryResult(op: BinaryExprNode['operator'], type: TypeId): TypeId | null {
	switch (op) {
		case '+':
			return isNumeric(type) || type === BuiltinTypeId.String ? type : null
		case '-':
		case '*':
		case '/':
			return isNumeric(type) ? type : null
		case '%':
			return type === BuiltinTypeId.Int ? type : null
		case '<':
		case '<=':
		case '>':
		case '>=':
			return isNumeric(type) ? BuiltinTypeId.Bool : null
		case '==':
		case '!=':
			return type === BuiltinTypeId.Void ? null : BuiltinTypeId.Bool
	}
}

function checkOperands(
	expr: BinaryExprNode | LogicalExprNode,
	state: CheckerState
): { left: TypeId; right: TypeId } | null {
	const left = checkExpression(expr.left, state)
	const right = checkExpression(expr.right, state)
	if (left === BuiltinTypeId.Invalid || right === BuiltinTypeId.Invalid) return null
	return { left, right }
}

function reportOperands(
	expr: BinaryExprNode | LogicalExprNode,
	left: TypeId,
	right: TypeId,
	state: CheckerState
): TypeId {
	state.context.emitAtToken('RRTYPE002', expr.operatorTokenId, {
		left: typeName(left),
		op: expr.operator,
		right: typeName(right),
	})
	return BuiltinTypeId.Invalid
}

function checkBinary(expr: BinaryExprNode, state: CheckerState): TypeId {
	const operands = checkOperands(expr, state)
	if (operands === null) return BuiltinTypeId.Invalid
	const { left, right } = operands

	const result = left === right ? binaryResult(expr.operator, left) : null
	if (result === null) return reportOperands(expr, left, right, state)
	return result
}

function checkLogical(expr: LogicalExprNode, state: CheckerState): TypeId {
	const operands = checkOperands(expr, state)
	if (operands === null) return BuiltinTypeId.Invalid
	const { left, right } = operands

	if (left !== BuiltinTypeId.Bool || right !== BuiltinTypeId.Bool) {
		return reportOperands(expr, left, right, state)
	}
	return BuiltinTypeId.Bool
}

// =============================================================================
// Calls
// =============================================================================

function checkArguments(call: CallExprNode, state: CheckerState): TypeId[] {
	return call.args.map((arg) => checkExpression(arg, state))
}

function checkCall(call: CallExprNode, state: CheckerState): TypeId {
	const { context, model } = state
	const name = context.strings.get(call.callee.nameId)
	const resolved = resolveIdentifier(call.callee, state)

	if (resolved === null) {
		checkArguments(call, state)
		return BuiltinTypeId.Invalid
	}

	const { symbol } = resolved
	if (symbol.funcId === null) {
		context.emitAtNode('RRTYPE005', call.callee.id, { name })
		checkArguments(call, state)
		return BuiltinTypeId.Invalid
	}

	const signature = model.funcs.get(symbol.funcId)
	const argTypes = checkArguments(call, state)

	if (argTypes.length !== signature.params.length) {
		context.emitAtNode('RRTYPE004', call.id, {
			expected: signature.params.length,
			found: argTypes.length,
			name,
		})
		return BuiltinTypeId.Invalid
	}

	let valid = true
	call.args.forEach((arg, index) => {
		const accepted = signature.params[index] ?? []
		const found = argTypes[index] ?? BuiltinTypeId.Invalid
		if (found === BuiltinTypeId.Invalid) valid = false
		else if (!expectType(arg, found, accepted, state)) valid = false
	})
	if (!valid) return BuiltinTypeId.Invalid

	const target: CallTarget =
		signature.builtin === null
			? { funcId: symbol.funcId, kind: 'user' }
			: { argType: argTypes[0] ?? BuiltinTypeId.Void, kind: 'builtin', name: signature.builtin }
	model.calls.set(call.id, target)

	return signature.returnType
}

// =============================================================================
// Entry
// =============================================================================

function checkExpressionKind(expr: ExpressionNode, state: CheckerState): TypeId {
	switch (expr.kind) {
		case NodeKind.IntLiteral:
			return checkIntLiteral(expr, state)
		case NodeKind.FloatLiteral:
			return checkFloatLiteral(expr.text, expr, state)
		case NodeKind.StringLiteral:
			return BuiltinTypeId.String
		case NodeKind.BoolLiteral:
			return BuiltinTypeId.Bool
		case NodeKind.Identifier:
			return checkIdentifier(expr, state)
		case NodeKind.UnaryExpr:
			return checkUnary(expr, state)
		case NodeKind.BinaryExpr:
			return checkBinary(expr, state)
		case NodeKind.LogicalExpr:
			return checkLogical(expr, state)
		case NodeKind.CallExpr:
			return checkCall(expr, state)
		case NodeKind.ParenExpr:
			return checkExpression(expr.expression, state)
	}
}

/**
 * Type-check an expression and its subexpressions.
 * Returns BuiltinTypeId.Invalid after reporting (or inheriting) an error.
 */
export function checkExpression(expr: ExpressionNode, state: CheckerState): TypeId {
	return record(expr, checkExpressionKind(expr, state), state)
}

/**
 * Check an expression whose value is used: `void` is rejected.
 */
export function checkValue(expr: ExpressionNode, state: CheckerState): TypeId {
	const type = checkExpression(expr, state)
	if (type === BuiltinTypeId.Void) {
		state.context.emitAtNode('RRTYPE011', expr.id)
		return BuiltinTypeId.Invalid
	}
	return type
}
