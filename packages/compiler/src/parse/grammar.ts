/**
 * Rerechan02 grammar, matched against the canonical rendering of the token
 * stream (every token's source text, separated by single spaces).
 *
 * Binary-expression layers are generated from PRECEDENCE.
 */

import * as ohm from 'ohm-js'
import type { BinaryOperator, LogicalOperator } from '../core/nodes.ts'
import { KEYWORDS, PUNCTUATORS } from '../core/tokens.ts'

export type Associativity = 'left' | 'right' | 'none'

export interface PrecedenceLevel {
	/** Rule name prefix: `<name>Expr` and `<name>Op` */
	readonly name: string
	readonly associativity: Associativity
	readonly operators: readonly (BinaryOperator | LogicalOperator)[]
}

/**
 * Binary operators, lowest precedence first.
 * Equal precedence is resolved by associativity only.
 */
export const PRECEDENCE: readonly PrecedenceLevel[] = [
	{ associativity: 'left', name: 'Or', operators: ['||'] },
	{ associativity: 'left', name: 'And', operators: ['&&'] },
	{ associativity: 'none', name: 'Equality', operators: ['==', '!='] },
	{ associativity: 'none', name: 'Relational', operators: ['<', '<=', '>', '>='] },
	{ associativity: 'left', name: 'Additive', operators: ['+', '-'] },
	{ associativity: 'left', name: 'Multiplicative', operators: ['*', '/', '%'] },
]

/** Name of the rule for one binary layer. */
export function binaryRuleName(level: PrecedenceLevel): string {
	return `${level.name}Expr`
}

function operatorRuleName(level: PrecedenceLevel): string {
	return `${level.name.charAt(0).toLowerCase()}${level.name.slice(1)}Op`
}

/**
 * Terminal for one operator that refuses to match the prefix of a longer
 * punctuator (`<` must not match the start of `<=`).
 */
function operatorTerminal(text: string): string {
	const guards = PUNCTUATORS.filter(([p]) => p !== text && p.startsWith(text)).map(
		([p]) => ` ~${JSON.stringify(p.slice(text.length))}`
	)
	return `${JSON.stringify(text)}${guards.join('')}`
}

function generateOperatorRule(level: PrecedenceLevel): string {
	const alternatives = [...level.operators]
		.sort((a, b) => b.length - a.length)
		.map(operatorTerminal)
		.join(' | ')
	return `  ${operatorRuleName(level)} = ${alternatives}`
}

function generateLayerRule(level: PrecedenceLevel, operand: string): string {
	const self = binaryRuleName(level)
	const op = operatorRuleName(level)
	switch (level.associativity) {
		case 'left':
			return `  ${self} = ${self} ${op} ${operand}  -- binary\n    | ${operand}`
		case 'right':
			return `  ${self} = ${operand} ${op} ${self}  -- binary\n    | ${operand}`
		case 'none':
			return `  ${self} = ${operand} ${op} ${operand}  -- binary\n    | ${operand}`
	}
}

/**
 * Generate the expression layers, from the loosest level down to Unary.
 */
export function generateBinaryRules(levels: readonly PrecedenceLevel[]): string {
	const rules: string[] = []
	levels.forEach((level, index) => {
		const next = levels[index + 1]
		const operand = next ? binaryRuleName(next) : 'Unary'
		rules.push(generateLayerRule(level, operand), generateOperatorRule(level))
	})
	return rules.join('\n')
}

function keywordRuleName(keyword: string): string {
	return `${keyword}Kw`
}

function generateKeywordRules(): string {
	const keywords = [...KEYWORDS.keys()]
	const rules = keywords.map((k) => `  ${keywordRuleName(k)} = ${JSON.stringify(k)} ~identPart`)
	rules.push(`  keyword = ${keywords.map(keywordRuleName).join(' | ')}`)
	return rules.join('\n')
}

function generateGrammarSource(): string {
	const first = PRECEDENCE[0]
	const expr = first ? binaryRuleName(first) : 'Unary'

	return String.raw`
Rerechan02 {
  Program = ModuleDecl ImportDecl* FuncDecl*

  ModuleDecl = moduleKw ident ";"
  ImportDecl = importKw NonemptyListOf<importSegment, "."> ";"

  FuncDecl = funcKw ident "(" ListOf<Param, ","> ")" ReturnType? Block
  ReturnType = "->" Type
  Param = ident ":" Type
  Type = intKw | floatKw | boolKw | stringKw | voidKw

  // Statements
  Block = "{" Statement* "}"
  Statement = LetStatement
    | IfStatement
    | WhileStatement
    | ReturnStatement
    | BreakStatement
    | ContinueStatement
    | Block
    | AssignStatement
    | ExpressionStatement
  LetStatement = (letKw | varKw) ident TypeAnnotation? assign Expr ";"
  TypeAnnotation = ":" Type
  AssignStatement = ident assign Expr ";"
  IfStatement = ifKw "(" Expr ")" Block ElseClause?
  ElseClause = elseKw IfStatement  -- elseIf
    | elseKw Block  -- else
  WhileStatement = whileKw "(" Expr ")" Block
  ReturnStatement = returnKw Expr? ";"
  BreakStatement = breakKw ";"
  ContinueStatement = continueKw ";"
  ExpressionStatement = Expr ";"

  // Expressions
  Expr = ${expr}
${generateBinaryRules(PRECEDENCE)}
  Unary = unaryOp Unary  -- op
    | Postfix
  unaryOp = ${operatorTerminal('-')} | ${operatorTerminal('!')}
  assign = ${operatorTerminal('=')}
  Postfix = ident "(" ListOf<Expr, ","> ")"  -- call
    | Primary
  Primary = "(" Expr ")"  -- paren
    | trueKw  -- true
    | falseKw  -- false
    | floatLit  -- float
    | intLit  -- int
    | stringLit  -- string
    | ident  -- ident

  // Literals
  floatLit = digit+ "." digit+ exponent?  -- fraction
    | digit+ exponent  -- exponent
  exponent = ("e" | "E") ("+" | "-")? digit+
  intLit = "0" ("x" | "X") hexDigit+  -- hex
    | "0" ("b" | "B") ("0" | "1")+  -- bin
    | digit+  -- dec
  stringLit = "\"" stringChar* "\""
  stringChar = "\\" any  -- escape
    | ~("\"" | "\\" | "\n") any  -- plain

  // Identifiers and keywords
  ident = ~keyword identStart identPart*
  importSegment = ident | keyword
  identStart = "a".."z" | "A".."Z" | "_"
  identPart = identStart | digit
${generateKeywordRules()}
}
`
}

/** Grammar source text (exported for tests and tooling). */
export const grammarSource = generateGrammarSource()

/**
 * The compiled Rerechan02 grammar.
 */
export const RerechanGrammar = ohm.grammar(grammarSource)
