import assert from 'node:assert'
import { readFileSync } from 'node:fs'
import { describe, it } from 'node:test'
import {
	ABI_MARKER,
	prototypesFor,
	RUNTIME_ABI_VERSION,
	RUNTIME_PROTOTYPES,
	RuntimeFunction,
	STRING_TYPEDEF,
} from '../../src/codegen/abi.ts'
import { runtimeSourcePath } from '../../src/runtime.ts'

const header = readFileSync(runtimeSourcePath('rere_runtime.h'), 'utf8').split('\n')
const source = readFileSync(runtimeSourcePath('rere_runtime.c'), 'utf8').split('\n')

describe('codegen/abi', () => {
	it('lists every runtime function exactly once', () => {
		const names = RUNTIME_PROTOTYPES.map(([name]) => name)
		assert.deepStrictEqual([...names].sort(), [...Object.values(RuntimeFunction)].sort())
	})

	it('declares each prototype under the function it names', () => {
		for (const [name, prototype] of RUNTIME_PROTOTYPES) {
			assert.ok(prototype.includes(`${name}(`), prototype)
		}
	})

	it('selects prototypes in table order', () => {
		const used = new Set([RuntimeFunction.Print, RuntimeFunction.RuntimeInit, RuntimeFunction.IntAdd])
		assert.deepStrictEqual(prototypesFor(used), [
			'void rere_runtime_init(int argc, char **argv, const char *source_name);',
			'int64_t rere_int_add(int64_t a, int64_t b, int64_t line, int64_t column);',
			'void rere_print(rere_string s);',
		])
	})

	describe('runtime header', () => {
		it('matches the generated declarations line for line', () => {
			for (const [, prototype] of RUNTIME_PROTOTYPES) {
				assert.ok(header.includes(prototype), `missing from header: ${prototype}`)
			}
			assert.ok(header.includes(STRING_TYPEDEF))
			assert.ok(header.includes(`extern const int ${ABI_MARKER};`))
		})

		it('carries the interface version', () => {
			assert.strictEqual(ABI_MARKER, 'rere_abi_v1')
			assert.ok(header.includes(`#define RERE_ABI_VERSION ${RUNTIME_ABI_VERSION}`))
		})
	})

	describe('runtime source', () => {
		it('defines every declared function', () => {
			for (const [, prototype] of RUNTIME_PROTOTYPES) {
				const definition = `${prototype.slice(0, -1)} {`
				assert.ok(source.includes(definition), `missing definition: ${definition}`)
			}
		})

		it('defines the version marker', () => {
			assert.ok(source.includes(`const int ${ABI_MARKER} = RERE_ABI_VERSION;`))
		})
	})
})
