import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext, stringId } from '../../src/core/context.ts'
import { TokenKind, tokenId } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

function tokenKinds(context: CompilationContext): TokenKind[] {
	return [...context.tokens].map(([, token]) => token.kind)
}

describe('lex/tokenizer', () => {
	it('fills the token store and ends with one Eof', () => {
		const context = new CompilationContext('let s = "hi\\n";')
		const result = tokenize(context)
		assert.strictEqual(result.succeeded, true)
		assert.deepStrictEqual(tokenKinds(context), [
			TokenKind.Let,
			TokenKind.Identifier,
			TokenKind.Equals,
			TokenKind.StringLiteral,
			TokenKind.Semicolon,
			TokenKind.Eof,
		])
	})

	it('interns names, literal text and decoded strings as payloads', () => {
		const context = new CompilationContext('x 0x10 "a\\tb" x')
		tokenize(context)
		const payloads = [...context.tokens].map(([, token]) => token.payload)
		const [name, int, str, again, eof] = payloads
		assert.strictEqual(context.strings.get(stringId(name ?? -1)), 'x')
		assert.strictEqual(context.strings.get(stringId(int ?? -1)), '0x10')
		assert.strictEqual(context.strings.get(stringId(str ?? -1)), 'a\tb')
		assert.strictEqual(again, name)
		assert.strictEqual(eof, 0)
	})

	it('gives punctuation and keywords a zero payload', () => {
		const context = new CompilationContext('func ( )')
		tokenize(context)
		for (const [, token] of context.tokens) {
			assert.strictEqual(token.payload, 0)
		}
	})

	it('reports every lexical error when recovering', () => {
		const context = new CompilationContext('@ x # y')
		const result = tokenize(context)
		assert.strictEqual(result.succeeded, false)
		const errors = context.getErrors()
		assert.deepStrictEqual(
			errors.map((d) => [d.def.code, d.line, d.column, d.message]),
			[
				['RRLEX001', 1, 1, 'unexpected character `@`'],
				['RRLEX001', 1, 5, 'unexpected character `#`'],
			]
		)
		assert.deepStrictEqual(tokenKinds(context), [TokenKind.Identifier, TokenKind.Identifier, TokenKind.Eof])
	})

	it('removes only the first of two byte order marks', () => {
		const context = new CompilationContext('\uFEFF\uFEFFx')
		tokenize(context)
		assert.deepStrictEqual(
			context.getErrors().map((d) => [d.def.code, d.line, d.column, d.message]),
			[['RRLEX001', 1, 1, 'unexpected character `\uFEFF`']]
		)
		const identifier = context.tokens.get(tokenId(0))
		assert.strictEqual(identifier.kind, TokenKind.Identifier)
		assert.strictEqual(identifier.offset, 1)
		assert.strictEqual(context.source.slice(identifier.offset, identifier.offset + identifier.length), 'x')
	})

	it('stops at the first error without recovery', () => {
		const context = new CompilationContext('@ x # y')
		const result = tokenize(context, { recover: false })
		assert.strictEqual(result.succeeded, false)
		assert.strictEqual(context.getErrorCount(), 1)
		assert.deepStrictEqual(tokenKinds(context), [TokenKind.Eof])
		const eof = context.tokens.get(tokenId(0))
		assert.strictEqual(eof.line, 1)
		assert.strictEqual(eof.column, 8)
		assert.strictEqual(eof.offset, 7)
	})

	it('names the offending text in string errors', () => {
		const context = new CompilationContext('"bad \\x escape"\n"open')
		tokenize(context)
		assert.deepStrictEqual(
			context.getErrors().map((d) => [d.def.code, d.line, d.column, d.message]),
			[
				['RRLEX003', 1, 6, 'unknown escape sequence `\\x`'],
				['RRLEX002', 2, 1, 'unterminated string literal'],
			]
		)
	})

	it('places Eof after a trailing newline on the next line', () => {
		const context = new CompilationContext('x\n')
		tokenize(context)
		const eof = context.tokens.get(tokenId(1))
		assert.strictEqual(eof.kind, TokenKind.Eof)
		assert.strictEqual(eof.line, 2)
		assert.strictEqual(eof.column, 1)
		assert.strictEqual(eof.offset, 2)
	})
})
