import assert from 'node:assert'
import { describe, it } from 'node:test'
import { cStringLiteral, floatConstant, intConstant, stringConstant, utf8 } from '../../src/codegen/literals.ts'

describe('codegen/literals', () => {
	describe('intConstant', () => {
		it('wraps values in INT64_C', () => {
			assert.strictEqual(intConstant(42n), 'INT64_C(42)')
			assert.strictEqual(intConstant(-7n), 'INT64_C(-7)')
			assert.strictEqual(intConstant(2n ** 63n - 1n), 'INT64_C(9223372036854775807)')
		})

		it('spells the most negative value as an expression', () => {
			assert.strictEqual(intConstant(-(2n ** 63n)), '(-INT64_C(9223372036854775807) - 1)')
		})
	})

	describe('floatConstant', () => {
		it('keeps a fraction or exponent', () => {
			assert.strictEqual(floatConstant(2.5), '2.5')
			assert.strictEqual(floatConstant(1e21), '1e+21')
			assert.strictEqual(floatConstant(1e-7), '1e-7')
		})

		it('adds a fraction to whole numbers', () => {
			assert.strictEqual(floatConstant(2), '2.0')
			assert.strictEqual(floatConstant(-0), '0.0')
		})

		it('rejects values C cannot spell as a literal', () => {
			assert.throws(() => floatConstant(Number.NaN), RangeError)
			assert.throws(() => floatConstant(Number.POSITIVE_INFINITY), RangeError)
		})
	})

	describe('cStringLiteral', () => {
		it('escapes quotes, backslashes and question marks', () => {
			assert.strictEqual(cStringLiteral(utf8('say "hi" \\ ??=')), '"say \\"hi\\" \\\\ \\?\\?="')
		})

		it('writes control characters as three octal digits', () => {
			assert.strictEqual(cStringLiteral(utf8('a\nb\t\0')), '"a\\012b\\011\\000"')
		})

		it('writes the UTF-8 bytes of non-ASCII text', () => {
			assert.strictEqual(cStringLiteral(utf8('é')), '"\\303\\251"')
		})
	})

	describe('stringConstant', () => {
		it('pairs the literal with its byte length', () => {
			assert.strictEqual(stringConstant('héllo'), '((rere_string){ "h\\303\\251llo", 6 })')
			assert.strictEqual(stringConstant(''), '((rere_string){ "", 0 })')
		})
	})
})
