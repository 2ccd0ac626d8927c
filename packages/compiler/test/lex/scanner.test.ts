import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TokenKind } from '../../src/core/tokens.ts'
import { type Lexeme, LexError, type LexErrorCode, lex, Scanner } from '../../src/lex/scanner.ts'

function kinds(source: string): TokenKind[] {
	return [...lex(source)].map((l) => l.kind)
}

function lexFailure(code: LexErrorCode, text: string, line: number, column: number) {
	return (error: unknown): boolean => {
		assert.ok(error instanceof LexError)
		assert.strictEqual(error.code, code)
		assert.strictEqual(error.text, text)
		assert.strictEqual(error.line, line)
		assert.strictEqual(error.column, column)
		return true
	}
}

describe('lex/scanner', () => {
	describe('tokens', () => {
		it('records kind, text and position of every lexeme', () => {
			const lexemes = [...lex('let x = 42;')]
			const summary = lexemes.map((l: Lexeme) => [l.kind, l.text, l.line, l.column, l.offset])
			assert.deepStrictEqual(summary, [
				[TokenKind.Let, 'let', 1, 1, 0],
				[TokenKind.Identifier, 'x', 1, 5, 4],
				[TokenKind.Equals, '=', 1, 7, 6],
				[TokenKind.IntLiteral, '42', 1, 9, 8],
				[TokenKind.Semicolon, ';', 1, 11, 10],
				[TokenKind.Eof, '', 1, 12, 11],
			])
		})

		it('prefers the longest punctuator', () => {
			assert.deepStrictEqual(kinds('a<=b->c!=d'), [
				TokenKind.Identifier,
				TokenKind.LessEquals,
				TokenKind.Identifier,
				TokenKind.Arrow,
				TokenKind.Identifier,
				TokenKind.BangEquals,
				TokenKind.Identifier,
				TokenKind.Eof,
			])
		})

		it('separates keywords from identifiers that start with one', () => {
			assert.deepStrictEqual(kinds('if iffy return_value'), [
				TokenKind.If,
				TokenKind.Identifier,
				TokenKind.Identifier,
				TokenKind.Eof,
			])
		})

		it('reads number literals in every radix and form', () => {
			const lexemes = [...lex('0x1F 0b101 3.25 1e10 2.5E-3 7')]
			assert.deepStrictEqual(
				lexemes.map((l) => [l.kind, l.text]),
				[
					[TokenKind.IntLiteral, '0x1F'],
					[TokenKind.IntLiteral, '0b101'],
					[TokenKind.FloatLiteral, '3.25'],
					[TokenKind.FloatLiteral, '1e10'],
					[TokenKind.FloatLiteral, '2.5E-3'],
					[TokenKind.IntLiteral, '7'],
					[TokenKind.Eof, ''],
				]
			)
		})

		it('leaves a trailing dot to the next token', () => {
			assert.deepStrictEqual(kinds('1.'), [TokenKind.IntLiteral, TokenKind.Dot, TokenKind.Eof])
		})

		it('decodes string escapes into the value and keeps the text as written', () => {
			const [lexeme] = lex('"a\\tb\\"c\\\\"')
			assert.ok(lexeme)
			assert.strictEqual(lexeme.kind, TokenKind.StringLiteral)
			assert.strictEqual(lexeme.text, '"a\\tb\\"c\\\\"')
			assert.strictEqual(lexeme.value, 'a\tb"c\\')
			assert.strictEqual(lexeme.length, 11)
		})

		it('skips line and block comments while counting lines', () => {
			const [lexeme] = lex('// hi\n/* multi\nline */ x')
			assert.ok(lexeme)
			assert.strictEqual(lexeme.kind, TokenKind.Identifier)
			assert.strictEqual(lexeme.line, 3)
			assert.strictEqual(lexeme.column, 9)
		})

		it('ignores a leading byte order mark', () => {
			const [lexeme] = lex('\uFEFFx')
			assert.ok(lexeme)
			assert.strictEqual(lexeme.offset, 0)
			assert.strictEqual(lexeme.column, 1)
		})

		it('ends an empty source with a single Eof', () => {
			assert.deepStrictEqual(kinds(''), [TokenKind.Eof])
		})
	})

	describe('errors', () => {
		it('rejects a number that runs into letters', () => {
			assert.throws(() => [...lex('12abc')], lexFailure('RRLEX004', '12abc', 1, 1))
		})

		it('rejects a radix prefix without digits', () => {
			assert.throws(() => [...lex('0x')], lexFailure('RRLEX004', '0x', 1, 1))
		})

		it('rejects an exponent without digits', () => {
			assert.throws(() => [...lex('1e')], lexFailure('RRLEX004', '1e', 1, 1))
		})

		it('rejects an unterminated string', () => {
			assert.throws(() => [...lex('x = "abc')], lexFailure('RRLEX002', '"', 1, 5))
		})

		it('rejects a string broken by a newline', () => {
			assert.throws(() => [...lex('"ab\ncd"')], lexFailure('RRLEX002', '"', 1, 1))
		})

		it('reports an unknown escape at its backslash', () => {
			assert.throws(() => [...lex('"a\\qb"')], lexFailure('RRLEX003', '\\q', 1, 3))
		})

		it('rejects a character outside the language', () => {
			assert.throws(() => [...lex('a @')], lexFailure('RRLEX001', '@', 1, 3))
		})

		it('rejects an unterminated block comment', () => {
			assert.throws(() => [...lex('x /* open')], lexFailure('RRLEX005', '/*', 1, 3))
		})
	})

	describe('Scanner', () => {
		it('resumes after the offending character', () => {
			const scanner = new Scanner('a @ b')
			assert.strictEqual(scanner.scan().text, 'a')
			assert.throws(() => scanner.scan(), LexError)
			scanner.recover()
			const next = scanner.scan()
			assert.strictEqual(next.text, 'b')
			assert.strictEqual(next.column, 5)
			assert.strictEqual(scanner.scan().kind, TokenKind.Eof)
			assert.strictEqual(scanner.done, true)
		})

		it('resumes after the whole malformed number', () => {
			const scanner = new Scanner('12abc + 1')
			assert.throws(() => scanner.scan(), LexError)
			scanner.recover()
			const next = scanner.scan()
			assert.strictEqual(next.kind, TokenKind.Plus)
			assert.strictEqual(next.column, 7)
		})

		it('resumes after the closing quote of a string with a bad escape', () => {
			const scanner = new Scanner('"\\q" x')
			assert.throws(() => scanner.scan(), LexError)
			scanner.recover()
			const next = scanner.scan()
			assert.strictEqual(next.text, 'x')
			assert.strictEqual(next.column, 6)
		})

		it('starts over after reset', () => {
			const scanner = new Scanner('a b')
			scanner.scan()
			scanner.scan()
			scanner.reset()
			const first = scanner.scan()
			assert.strictEqual(first.text, 'a')
			assert.strictEqual(first.offset, 0)
			assert.strictEqual(scanner.done, false)
		})
	})
})
