/**
 * Lowering of checked function bodies to C statements.
 *
 * Expressions lower to side-effect-free C expressions. Every call and every
 * checked runtime operation that is an operand of a larger expression is
 * first bound to a temporary, in source order, so C's unspecified operand
 * evaluation order cannot reorder side effects. Only the outermost
 * expression of a statement may stay a call.
 */

import { BuiltinName } from '../check/builtins.ts'
import type { CallTarget, SemanticModel } from '../check/model.ts'
import { BuiltinTypeId, type FuncId, type TypeId, typeName } from '../check/types.ts'
import type { CompilationContext } from '../core/context.ts'
import {
	type ArithmeticOperator,
	type BinaryExprNode,
	type BlockNode,
	type CallExprNode,
	type ExpressionNode,
	type FuncDeclNode,
	type IfStatementNode,
	type LetStatementNode,
	type LogicalExprNode,
	type NodeId,
	NodeKind,
	type StatementNode,
	type UnaryExprNode,
	type WhileStatementNode,
} from '../core/nodes.ts'
import type { TokenId } from '../core/tokens.ts'
import { RuntimeFunction } from './abi.ts'
import { InternalCompilerError } from './errors.ts'
import { floatConstant, intConstant, stringConstant } from './literals.ts'
import { functionName, type NameTable } from './names.ts'
import type { CWriter } from './writer.ts'

/**
 * State shared by every function of one translation unit.
 */
export interface LoweringUnit {
	readonly context: CompilationContext
	readonly model: SemanticModel
	readonly names: NameTable
	/** Runtime functions referenced so far */
	readonly used: Set<RuntimeFunction>
}

const C_TYPES: ReadonlyMap<TypeId, string> = new Map<TypeId, string>([
	[BuiltinTypeId.Void, 'void'],
	[BuiltinTypeId.Int, 'int64_t'],
	[BuiltinTypeId.Float, 'double'],
	[BuiltinTypeId.Bool, 'bool'],
	[BuiltinTypeId.String, 'rere_string'],
])

export function cType(type: TypeId): string {
	const name = C_TYPES.get(type)
	if (name === undefined) {
		throw new InternalCompilerError(`no C type for ${typeName(type)}`)
	}
	return name
}

const INT_ARITHMETIC: Readonly<Record<ArithmeticOperator, RuntimeFunction>> = {
	'%': RuntimeFunction.IntRem,
	'*': RuntimeFunction.IntMul,
	'+': RuntimeFunction.IntAdd,
	'-': RuntimeFunction.IntSub,
	'/': RuntimeFunction.IntDiv,
}

const TO_STRING: ReadonlyMap<TypeId, RuntimeFunction> = new Map<TypeId, RuntimeFunction>([
	[BuiltinTypeId.Int, RuntimeFunction.IntToString],
	[BuiltinTypeId.Float, RuntimeFunction.FloatToString],
	[BuiltinTypeId.Bool, RuntimeFunction.BoolToString],
])

function unwrapParens(expr: ExpressionNode): ExpressionNode {
	let current = expr
	while (current.kind === NodeKind.ParenExpr) current = current.expression
	return current
}

/**
 * Lowers one function definition into a writer.
 */
export class FunctionLowering {
	constructor(
		private readonly unit: LoweringUnit,
		private readonly writer: CWriter
	) {}

	// =========================================================================
	// Helpers
	// =========================================================================

	private runtime(fn: RuntimeFunction): RuntimeFunction {
		this.unit.used.add(fn)
		return fn
	}

	/** `line, column` arguments for a runtime check at a token. */
	private positionOf(tokenId: TokenId): string {
		const token = this.unit.context.tokens.get(tokenId)
		return `${token.line}, ${token.column}`
	}

	private typeOf(expr: ExpressionNode): TypeId {
		return this.unit.model.typeOf(expr.id)
	}

	/** The C local an identifier reference is bound to. */
	private localOf(nodeId: NodeId): string {
		const { model, names } = this.unit
		const symbol = model.bindingOf(nodeId)
		const name = names.local(symbol)
		if (name === undefined) {
			throw new InternalCompilerError(`symbol ${symbol} has no C local`)
		}
		return name
	}

	/** Bind `code` to a fresh temporary and return its name. */
	private hoist(code: string, type: TypeId): string {
		const temp = this.unit.names.temp()
		this.writer.line(`const ${cType(type)} ${temp} = ${code};`)
		return temp
	}

	/** A call's code as an operand: hoisted unless it is the statement's outermost expression. */
	private callResult(code: string, type: TypeId, root: boolean): string {
		if (root) return code
		if (type === BuiltinTypeId.Void) {
			throw new InternalCompilerError('void call used as an operand')
		}
		return this.hoist(code, type)
	}

	// =========================================================================
	// Expressions
	// =========================================================================

	/**
	 * Lower an expression, writing any statements it needs first.
	 * Returns C code free of side effects, except a call when `root` is set.
	 */
	expression(expr: ExpressionNode, root = false): string {
		const { model } = this.unit
		switch (expr.kind) {
			case NodeKind.Identifier:
				return this.localOf(expr.id)
			case NodeKind.IntLiteral: {
				const value = model.intValues.get(expr.id)
				if (value === undefined) {
					throw new InternalCompilerError(`int literal ${expr.id} has no value`)
				}
				return intConstant(value)
			}
			case NodeKind.FloatLiteral: {
				const value = model.floatValues.get(expr.id)
				if (value === undefined) {
					throw new InternalCompilerError(`float literal ${expr.id} has no value`)
				}
				return floatConstant(value)
			}
			case NodeKind.StringLiteral:
				return stringConstant(expr.value)
			case NodeKind.BoolLiteral:
				return expr.value ? 'true' : 'false'
			case NodeKind.ParenExpr:
				return this.expression(expr.expression, root)
			case NodeKind.UnaryExpr:
				return this.unary(expr, root)
			case NodeKind.BinaryExpr:
				return this.binary(expr, root)
			case NodeKind.LogicalExpr:
				return this.logical(expr)
			case NodeKind.CallExpr:
				return this.call(expr, root)
		}
	}

	private unary(expr: UnaryExprNode, root: boolean): string {
		const folded = this.unit.model.intValues.get(expr.id)
		if (folded !== undefined) return intConstant(folded)

		const operand = this.expression(expr.operand)
		if (expr.operator === '!') return `(!${operand})`

		if (this.typeOf(expr.operand) === BuiltinTypeId.Float) return `(-${operand})`
		const fn = this.runtime(RuntimeFunction.IntNeg)
		return this.callResult(
			`${fn}(${operand}, ${this.positionOf(expr.tokenId)})`,
			BuiltinTypeId.Int,
			root
		)
	}

	private binary(expr: BinaryExprNode, root: boolean): string {
		const left = this.expression(expr.left)
		const right = this.expression(expr.right)
		const operandType = this.typeOf(expr.left)

		switch (expr.operator) {
			case '+':
			case '-':
			case '*':
			case '/':
			case '%': {
				if (operandType === BuiltinTypeId.Float) return `(${left} ${expr.operator} ${right})`
				if (operandType === BuiltinTypeId.String) {
					const fn = this.runtime(RuntimeFunction.StringConcat)
					return this.callResult(`${fn}(${left}, ${right})`, BuiltinTypeId.String, root)
				}
				const fn = this.runtime(INT_ARITHMETIC[expr.operator])
				return this.callResult(
					`${fn}(${left}, ${right}, ${this.positionOf(expr.operatorTokenId)})`,
					BuiltinTypeId.Int,
					root
				)
			}
			case '==':
			case '!=': {
				if (operandType !== BuiltinTypeId.String) return `(${left} ${expr.operator} ${right})`
				const fn = this.runtime(RuntimeFunction.StringEq)
				const call = `${fn}(${left}, ${right})`
				if (expr.operator === '==') return this.callResult(call, BuiltinTypeId.Bool, root)
				return `(!${this.hoist(call, BuiltinTypeId.Bool)})`
			}
			default:
				return `(${left} ${expr.operator} ${right})`
		}
	}

	private logical(expr: LogicalExprNode): string {
		const left = this.expression(expr.left)
		const right = this.writer.capture(() => this.expression(expr.right))
		if (right.lines.length === 0) {
			return `(${left} ${expr.operator} ${right.result})`
		}

		// the right side runs only when the left does not decide the result
		const temp = this.unit.names.temp()
		this.writer.line(`bool ${temp} = ${left};`)
		this.writer.open(expr.operator === '&&' ? `if (${temp}) {` : `if (!${temp}) {`)
		this.writer.append(right.lines)
		this.writer.line(`${temp} = ${right.result};`)
		this.writer.close()
		return temp
	}

	private call(expr: CallExprNode, root: boolean): string {
		const { context, model } = this.unit
		const args = expr.args.map((arg) => this.expression(arg))
		const target: CallTarget = model.callOf(expr.id)
		const resultType = this.typeOf(expr)

		if (target.kind === 'user') {
			const name = context.strings.get(model.funcs.get(target.funcId).nameId)
			return this.callResult(`${functionName(name)}(${args.join(', ')})`, resultType, root)
		}

		const [arg] = args
		if (arg === undefined || args.length !== 1) {
			throw new InternalCompilerError(`builtin ${target.name} takes one argument`)
		}

		switch (target.name) {
			case BuiltinName.Print:
			case BuiltinName.Write: {
				const text =
					target.argType === BuiltinTypeId.String
						? arg
						: this.hoist(`${this.toStringFn(target.argType)}(${arg})`, BuiltinTypeId.String)
				const fn = this.runtime(
					target.name === BuiltinName.Print ? RuntimeFunction.Print : RuntimeFunction.Write
				)
				return this.callResult(`${fn}(${text})`, BuiltinTypeId.Void, root)
			}
			case BuiltinName.Len: {
				const fn = this.runtime(RuntimeFunction.StringLen)
				return this.callResult(`${fn}(${arg})`, BuiltinTypeId.Int, root)
			}
			case BuiltinName.ToString:
				return this.callResult(
					`${this.toStringFn(target.argType)}(${arg})`,
					BuiltinTypeId.String,
					root
				)
			case BuiltinName.ToFloat:
				return `((double)${arg})`
			case BuiltinName.ToInt: {
				const fn = this.runtime(RuntimeFunction.FloatToInt)
				return this.callResult(
					`${fn}(${arg}, ${this.positionOf(expr.tokenId)})`,
					BuiltinTypeId.Int,
					root
				)
			}
			case BuiltinName.Panic: {
				const fn = this.runtime(RuntimeFunction.Panic)
				return this.callResult(`${fn}(${arg})`, BuiltinTypeId.Void, root)
			}
		}
	}

	private toStringFn(type: TypeId): RuntimeFunction {
		const fn = TO_STRING.get(type)
		if (fn === undefined) {
			throw new InternalCompilerError(`no textual form for ${typeName(type)}`)
		}
		return this.runtime(fn)
	}

	// =========================================================================
	// Statements
	// =========================================================================

	statements(statements: readonly StatementNode[]): void {
		for (const stmt of statements) this.statement(stmt)
	}

	statement(stmt: StatementNode): void {
		const { writer } = this
		switch (stmt.kind) {
			case NodeKind.Block:
				this.block(stmt)
				return
			case NodeKind.LetStatement:
				this.let(stmt)
				return
			case NodeKind.AssignStatement: {
				const value = this.expression(stmt.value, true)
				writer.line(`${this.localOf(stmt.target.id)} = ${value};`)
				return
			}
			case NodeKind.IfStatement: {
				const condition = this.expression(stmt.condition, true)
				writer.open(`if (${condition}) {`)
				this.ifRest(stmt)
				return
			}
			case NodeKind.WhileStatement:
				this.while(stmt)
				return
			case NodeKind.ReturnStatement:
				if (stmt.value === null) {
					writer.line('return;')
				} else {
					writer.line(`return ${this.expression(stmt.value, true)};`)
				}
				return
			case NodeKind.BreakStatement:
				writer.line('break;')
				return
			case NodeKind.ContinueStatement:
				writer.line('continue;')
				return
			case NodeKind.ExpressionStatement: {
				const code = this.expression(stmt.expression, true)
				const isCall = unwrapParens(stmt.expression).kind === NodeKind.CallExpr
				writer.line(isCall ? `${code};` : `(void)(${code});`)
				return
			}
		}
	}

	private block(block: BlockNode): void {
		this.writer.open('{')
		this.statements(block.statements)
		this.writer.close()
	}

	private let(stmt: LetStatementNode): void {
		const { context, model, names } = this.unit
		const init = this.expression(stmt.init, true)
		const symbolId = model.declarationOf(stmt.id)
		const symbol = model.symbols.get(symbolId)
		const name = names.declareLocal(symbolId, context.strings.get(stmt.name.nameId))
		const qualifier = symbol.mutable ? '' : 'const '
		this.writer.line(`${qualifier}${cType(symbol.typeId)} ${name} = ${init};`)
	}

	/**
	 * Everything of an `if` after its opening line: the consequent, then the
	 * else chain, then the closing brace.
	 */
	private ifRest(stmt: IfStatementNode): void {
		const { writer } = this
		this.statements(stmt.consequent.statements)

		const alternate = stmt.alternate
		if (alternate === null) {
			writer.close()
			return
		}
		if (alternate.kind === NodeKind.Block) {
			writer.reopen('} else {')
			this.statements(alternate.statements)
			writer.close()
			return
		}

		const condition = writer.capture(() => this.expression(alternate.condition, true), 0)
		if (condition.lines.length === 0) {
			writer.reopen(`} else if (${condition.result}) {`)
			this.ifRest(alternate)
			return
		}
		writer.reopen('} else {')
		writer.append(condition.lines)
		writer.open(`if (${condition.result}) {`)
		this.ifRest(alternate)
		writer.close()
	}

	private while(stmt: WhileStatementNode): void {
		const { writer } = this
		const condition = writer.capture(() => this.expression(stmt.condition, true))
		if (condition.lines.length === 0) {
			writer.open(`while (${condition.result}) {`)
		} else {
			writer.open('for (;;) {')
			writer.append(condition.lines)
			writer.open(`if (!(${condition.result})) {`)
			writer.line('break;')
			writer.close()
		}
		this.statements(stmt.body.statements)
		writer.close()
	}

	// =========================================================================
	// Functions
	// =========================================================================

	/**
	 * Write the definition of a user function.
	 */
	func(func: FuncDeclNode): void {
		const { context, model, names } = this.unit
		names.enterFunction()
		const signature = model.funcs.get(this.funcIdOf(func))
		const params = func.params.map((param) => {
			const symbolId = model.declarationOf(param.id)
			const symbol = model.symbols.get(symbolId)
			const name = names.declareLocal(symbolId, context.strings.get(param.name.nameId))
			return `${cType(symbol.typeId)} ${name}`
		})
		const name = functionName(context.strings.get(func.name.nameId))
		const paramList = params.length === 0 ? 'void' : params.join(', ')

		this.writer.open(`static ${cType(signature.returnType)} ${name}(${paramList}) {`)
		this.statements(func.body.statements)
		this.writer.close()
	}

	private funcIdOf(func: FuncDeclNode): FuncId {
		const { model } = this.unit
		const symbol = model.symbols.get(model.declarationOf(func.id))
		if (symbol.funcId === null) {
			throw new InternalCompilerError(`function ${func.id} has no signature`)
		}
		return symbol.funcId
	}
}
