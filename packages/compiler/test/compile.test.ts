import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompileError, compile } from '../src/index.ts'

function compileError(source: string, filename?: string): CompileError {
	try {
		compile(source, { filename })
	} catch (error) {
		if (error instanceof CompileError) return error
		throw error
	}
	assert.fail('expected a CompileError')
}

describe('compile', () => {
	it('translates a valid program', () => {
		const result = compile('module m;\nimport std.io;\nfunc main() -> int {\n    print(1);\n    return 0;\n}\n')
		assert.ok(result.code.startsWith('/* module m, from <input> */\n'))
		assert.ok(result.code.endsWith('    return rere_runtime_shutdown((int)status);\n}\n'))
		assert.deepStrictEqual(result.warnings, [])
		assert.ok(result.context.program)
	})

	it('calls std.string builtins once the module is imported', () => {
		const result = compile(
			'module m;\nimport std.io;\nimport std.string;\nfunc main() {\n    print(len("abc"));\n}\n'
		)
		assert.ok(
			result.code.includes(
				[
					'    const int64_t t1 = rere_string_len(((rere_string){ "abc", 3 }));',
					'    const rere_string t2 = rere_int_to_string(t1);',
					'    rere_print(t2);',
				].join('\n')
			),
			result.code
		)
		assert.ok(result.code.includes('\nint64_t rere_string_len(rere_string s);\n'))
	})

	it('formats every diagnostic into the error message', () => {
		const error = compileError('module m;\nfunc main() {\n    let x = y + 1;\n}\n', 'bad.rere')
		assert.strictEqual(
			error.message,
			[
				'error[RRRES002]: cannot find `y` in this scope',
				'  --> bad.rere:3:13',
				'   | ',
				' 3 |     let x = y + 1;',
				`   | ${' '.repeat(12)}^`,
				'   | ',
				'   = help: Check the spelling, or declare `y` before using it.',
			].join('\n')
		)
		assert.strictEqual(error.name, 'CompileError')
	})

	it('reports all lexical errors and stops before parsing', () => {
		const error = compileError('module m; @ func main() { # }')
		const headers = error.message.split('\n').filter((line) => /^(error|warning)\[/.test(line))
		assert.deepStrictEqual(headers, [
			'error[RRLEX001]: unexpected character `@`',
			'error[RRLEX001]: unexpected character `#`',
		])
	})

	it('reports a second byte order mark as an unexpected character', () => {
		const error = compileError('\uFEFF\uFEFFmodule m;\nfunc main() {\n}\n')
		const headers = error.message.split('\n').filter((line) => /^(error|warning)\[/.test(line))
		assert.deepStrictEqual(headers, ['error[RRLEX001]: unexpected character `\uFEFF`'])
	})

	it('reports a syntax error', () => {
		const error = compileError('module m;\nfunc main() {\n    let x = 1\n}\n')
		assert.ok(error.message.startsWith('error[RRPARSE001]: syntax error: unexpected `}`'), error.message)
	})

	it('collects every checking error', () => {
		const error = compileError('module m;\nfunc main() {\n    let a = b;\n    let c: int = "s";\n}\n')
		const headers = error.message.split('\n').filter((line) => line.startsWith('error['))
		assert.deepStrictEqual(headers, [
			'error[RRRES002]: cannot find `b` in this scope',
			'error[RRTYPE001]: mismatched types: expected `int`, found `string`',
		])
	})

	it('returns warnings with their formatted text', () => {
		const result = compile('module m;\nfunc main() {\n    return;\n    return;\n}\n', { filename: 'w.rere' })
		assert.strictEqual(result.warnings.length, 1)
		const [warning] = result.warnings
		assert.ok(warning)
		assert.strictEqual(warning.code, 'RRCHECK050')
		assert.ok(warning.formattedMessage.startsWith('warning[RRCHECK050]: unreachable code\n  --> w.rere:4:5\n'))
	})

	it('is deterministic', () => {
		const source =
			'module m;\nimport std.io;\nfunc fib(n: int) -> int {\n    if (n < 2) { return n; }\n    return fib(n - 1) + fib(n - 2);\n}\nfunc main() { print(fib(20)); }\n'
		assert.strictEqual(compile(source).code, compile(source).code)
	})
})
