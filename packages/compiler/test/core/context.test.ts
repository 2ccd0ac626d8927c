import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext, StringStore, stripBom } from '../../src/core/context.ts'
import { TokenKind } from '../../src/core/tokens.ts'

describe('core/context', () => {
	describe('StringStore', () => {
		it('interns equal strings to the same id', () => {
			const store = new StringStore()
			const a = store.intern('count')
			const b = store.intern('total')
			assert.strictEqual(store.intern('count'), a)
			assert.notStrictEqual(a, b)
			assert.strictEqual(store.get(b), 'total')
			assert.strictEqual(store.count(), 2)
		})

		it('finds without interning', () => {
			const store = new StringStore()
			store.intern('x')
			assert.strictEqual(store.find('y'), undefined)
			assert.strictEqual(store.count(), 1)
		})
	})

	describe('stripBom', () => {
		it('removes a leading byte order mark only', () => {
			assert.strictEqual(stripBom('\uFEFFmodule m;'), 'module m;')
			assert.strictEqual(stripBom('a\uFEFF'), 'a\uFEFF')
		})

		it('is applied to the context source', () => {
			const ctx = new CompilationContext('\uFEFFmodule m;')
			assert.strictEqual(ctx.source, 'module m;')
		})
	})

	describe('diagnostics', () => {
		it('counts errors but not warnings', () => {
			const ctx = new CompilationContext('module m;\n')
			ctx.emit('RRRES050', 1, 1, { path: 'std.io' })
			assert.strictEqual(ctx.hasErrors(), false)
			ctx.emit('RRRES004', 1, 1)
			assert.strictEqual(ctx.hasErrors(), true)
			assert.strictEqual(ctx.getErrorCount(), 1)
			assert.strictEqual(ctx.getWarnings().length, 1)
			assert.strictEqual(ctx.getErrors()[0]?.def.code, 'RRRES004')
		})

		it('takes the position of a token', () => {
			const ctx = new CompilationContext('module m;')
			const id = ctx.tokens.add({
				column: 8,
				kind: TokenKind.Identifier,
				length: 1,
				line: 1,
				offset: 7,
				payload: 0,
			})
			ctx.emitAtToken('RRRES002', id, { name: 'm' })
			const [diagnostic] = ctx.getDiagnostics()
			assert.strictEqual(diagnostic?.line, 1)
			assert.strictEqual(diagnostic?.column, 8)
			assert.strictEqual(diagnostic?.message, 'cannot find `m` in this scope')
		})

		it('formats a diagnostic with source line, caret and help', () => {
			const source = 'module m;\nfunc main() {\n    print(count);\n}\n'
			const ctx = new CompilationContext(source, 'loop.rere')
			ctx.emit('RRRES002', 3, 11, { name: 'count' })
			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				[
					'error[RRRES002]: cannot find `count` in this scope',
					'  --> loop.rere:3:11',
					'   | ',
					' 3 |     print(count);',
					'   |           ^',
					'   | ',
					'   = help: Check the spelling, or declare `count` before using it.',
				].join('\n')
			)
		})

		it('omits the source context for a line past the end', () => {
			const ctx = new CompilationContext('module m;')
			ctx.emit('RRRES004', 5, 1)
			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				'error[RRRES004]: missing entry function `main`\n  --> <input>:5:1'
			)
		})

		it('labels warnings', () => {
			const ctx = new CompilationContext('import std.io;')
			ctx.emit('RRRES050', 1, 1, { path: 'std.io' })
			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			const [header] = ctx.formatDiagnostic(diagnostic).split('\n')
			assert.strictEqual(header, 'warning[RRRES050]: module `std.io` is imported more than once')
		})

		it('separates all diagnostics with a blank line', () => {
			const ctx = new CompilationContext('')
			ctx.emit('RRRES004', 2, 1)
			ctx.emit('RRRES004', 3, 1)
			assert.strictEqual(
				ctx.formatAllDiagnostics(),
				'error[RRRES004]: missing entry function `main`\n  --> <input>:2:1\n\nerror[RRRES004]: missing entry function `main`\n  --> <input>:3:1'
			)
		})
	})
})
