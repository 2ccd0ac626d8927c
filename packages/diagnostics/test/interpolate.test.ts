import assert from 'node:assert'
import { describe, it } from 'node:test'
import { interpolateMessage } from '../src/interpolate.ts'

describe('interpolateMessage', () => {
	it('returns the template unchanged without args', () => {
		assert.strictEqual(interpolateMessage('cannot find `{name}`'), 'cannot find `{name}`')
	})

	it('replaces every occurrence of a key', () => {
		assert.strictEqual(
			interpolateMessage('`{name}` vs `{name}`', { name: 'count' }),
			'`count` vs `count`'
		)
	})

	it('formats numbers', () => {
		assert.strictEqual(
			interpolateMessage('takes {expected} but got {found}', { expected: 2, found: 0 }),
			'takes 2 but got 0'
		)
	})

	it('keeps unknown keys as written', () => {
		assert.strictEqual(interpolateMessage('{known} {unknown}', { known: 'a' }), 'a {unknown}')
	})
})
