import assert from 'node:assert'
import { describe, it } from 'node:test'
import { check } from '../../src/check/checker.ts'
import { BuiltinTypeId } from '../../src/check/types.ts'
import { CompilationContext, DiagnosticSeverity } from '../../src/core/context.ts'
import { NodeKind } from '../../src/core/nodes.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { parse } from '../../src/parse/parser.ts'

function checkSource(source: string): CompilationContext {
	const ctx = new CompilationContext(source)
	tokenize(ctx)
	const parsed = parse(ctx)
	assert.ok(parsed.succeeded, ctx.formatAllDiagnostics())
	check(ctx)
	return ctx
}

function inMain(body: string, header = ''): CompilationContext {
	return checkSource(`module m;\n${header}func main() {\n${body}\n}\n`)
}

type Reported = [code: string, line: number, column: number, message: string]

function reported(ctx: CompilationContext): Reported[] {
	return ctx.getDiagnostics().map((d): Reported => [d.def.code, d.line, d.column, d.message])
}

describe('check/checker', () => {
	describe('valid programs', () => {
		it('accepts a program and records the entry point', () => {
			const ctx = checkSource(
				[
					'module m;',
					'import std.io;',
					'func add(a: int, b: int) -> int {',
					'    return a + b;',
					'}',
					'func main() -> int {',
					'    print(add(1, 2));',
					'    return 0;',
					'}',
					'',
				].join('\n')
			)
			assert.deepStrictEqual(reported(ctx), [])
			const model = ctx.model
			assert.ok(model)
			const { entry } = model
			assert.ok(entry !== null)
			assert.strictEqual(ctx.strings.get(model.funcs.get(entry).nameId), 'main')
			assert.ok(model.imports.has('std.io'))
		})

		it('records the target and argument type of builtin calls', () => {
			const ctx = inMain('    print(2.5);\n    write("x");', 'import std.io;\n')
			const targets = [...(ctx.model?.calls.values() ?? [])]
			assert.deepStrictEqual(targets, [
				{ argType: BuiltinTypeId.Float, kind: 'builtin', name: 'print' },
				{ argType: BuiltinTypeId.String, kind: 'builtin', name: 'write' },
			])
		})

		it('allows functions to call functions declared later', () => {
			const ctx = checkSource('module m;\nfunc main() -> int { return later(); }\nfunc later() -> int { return 1; }\n')
			assert.deepStrictEqual(reported(ctx), [])
		})

		it('lets a nested block shadow an outer binding', () => {
			const ctx = inMain('    let x = 1;\n    {\n        let x = "s";\n    }')
			assert.deepStrictEqual(reported(ctx), [])
		})

		it('allows assignment to var bindings of the same type', () => {
			const ctx = inMain('    var n = 1;\n    n = n * 2;')
			assert.deepStrictEqual(reported(ctx), [])
		})

		it('uses core builtins without an import', () => {
			const ctx = inMain('    let f = to_float(3);\n    let i = to_int(f);\n    panic("stop");')
			assert.deepStrictEqual(reported(ctx), [])
		})

		it('folds a negated literal so the smallest int is accepted', () => {
			const ctx = inMain('    let low = -9223372036854775808;')
			assert.deepStrictEqual(reported(ctx), [])
			const statement = ctx.program?.funcs[0]?.body.statements[0]
			assert.ok(statement?.kind === NodeKind.LetStatement)
			assert.strictEqual(ctx.model?.intValues.get(statement.init.id), -(2n ** 63n))
		})

		it('records literal values and expression types', () => {
			const ctx = inMain('    let h = 0x10 + 0b11;\n    let f = 2.5;')
			const [first, second] = ctx.program?.funcs[0]?.body.statements ?? []
			assert.ok(first?.kind === NodeKind.LetStatement && first.init.kind === NodeKind.BinaryExpr)
			assert.ok(second?.kind === NodeKind.LetStatement)
			assert.strictEqual(ctx.model?.intValues.get(first.init.left.id), 16n)
			assert.strictEqual(ctx.model?.intValues.get(first.init.right.id), 3n)
			assert.strictEqual(ctx.model?.typeOf(first.init.id), BuiltinTypeId.Int)
			assert.strictEqual(ctx.model?.floatValues.get(second.init.id), 2.5)
		})
	})

	describe('name resolution', () => {
		it('reports an unknown name at its use', () => {
			const ctx = inMain('    let x = y + 1;')
			assert.deepStrictEqual(reported(ctx), [['RRRES002', 3, 13, 'cannot find `y` in this scope']])
		})

		it('points at the missing import for a library builtin', () => {
			const ctx = inMain('    print("hi");')
			assert.deepStrictEqual(reported(ctx), [['RRRES002', 3, 5, 'cannot find `print` in this scope']])
			assert.strictEqual(
				ctx.getDiagnostics()[0]?.suggestionOverride,
				'`print` is provided by `std.io`; add `import std.io;` after the module declaration.'
			)
		})

		it('rejects a second declaration in the same scope', () => {
			const ctx = inMain('    let x = 1;\n    let x = 2;')
			assert.deepStrictEqual(reported(ctx), [['RRRES001', 4, 9, '`x` is already declared in this scope']])
		})

		it('rejects a local that reuses a parameter name', () => {
			const ctx = checkSource('module m;\nfunc f(a: int) {\n    let a = 2;\n}\nfunc main() { }\n')
			assert.deepStrictEqual(reported(ctx), [['RRRES001', 3, 9, '`a` is already declared in this scope']])
		})

		it('rejects two functions with the same name', () => {
			const ctx = checkSource('module m;\nfunc f() { }\nfunc f() { }\nfunc main() { }\n')
			assert.deepStrictEqual(reported(ctx), [['RRRES001', 3, 6, '`f` is already declared in this scope']])
		})

		it('rejects unknown modules and warns on repeated imports', () => {
			const ctx = checkSource('module m;\nimport std.net;\nimport std.io;\nimport std.io;\nfunc main() { }\n')
			assert.deepStrictEqual(reported(ctx), [
				['RRRES003', 2, 1, 'unknown module `std.net`'],
				['RRRES050', 4, 1, 'module `std.io` is imported more than once'],
			])
			assert.strictEqual(ctx.getDiagnostics()[1]?.def.severity, DiagnosticSeverity.Warning)
		})

		it('rejects break and continue outside loops', () => {
			const ctx = inMain('    while (true) { continue; }\n    break;')
			assert.deepStrictEqual(reported(ctx), [['RRRES005', 4, 5, '`break` outside of a loop']])
		})
	})

	describe('entry point', () => {
		it('requires main', () => {
			const ctx = checkSource('module m;\nfunc helper() { }\n')
			assert.deepStrictEqual(reported(ctx), [['RRRES004', 1, 1, 'missing entry function `main`']])
		})

		it('rejects main with parameters', () => {
			const ctx = checkSource('module m;\nfunc main(argc: int) -> int {\n    return argc;\n}\n')
			assert.deepStrictEqual(reported(ctx), [
				['RRRES006', 2, 6, 'entry function `main` must take no parameters and return `int` or `void`'],
			])
		})

		it('rejects main returning anything but int or void', () => {
			const ctx = checkSource('module m;\nfunc main() -> string {\n    return "no";\n}\n')
			assert.strictEqual(reported(ctx)[0]?.[0], 'RRRES006')
			assert.strictEqual(ctx.model?.entry, null)
		})
	})

	describe('types', () => {
		it('checks an annotation against the initializer', () => {
			const ctx = inMain('    let x: int = "s";')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE001', 3, 18, 'mismatched types: expected `int`, found `string`'],
			])
		})

		it('rejects operands of different types at the operator', () => {
			const ctx = inMain('    let x = 1 + 2.0;')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE002', 3, 15, 'operator `+` cannot be applied to `int` and `float`'],
			])
		})

		it('rejects ordering comparisons of strings', () => {
			const ctx = inMain('    let b = "a" < "b";\n    let e = "a" == "b";')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE002', 3, 17, 'operator `<` cannot be applied to `string` and `string`'],
			])
		})

		it('requires bool operands for logical operators', () => {
			const ctx = inMain('    let b = true && 1;')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE002', 3, 18, 'operator `&&` cannot be applied to `bool` and `int`'],
			])
		})

		it('rejects unary operators on the wrong type', () => {
			const ctx = inMain('    let a = -true;\n    let b = !1;')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE003', 3, 13, 'operator `-` cannot be applied to `bool`'],
				['RRTYPE003', 4, 13, 'operator `!` cannot be applied to `int`'],
			])
		})

		it('requires a bool condition', () => {
			const ctx = inMain('    if (1) { }')
			assert.deepStrictEqual(reported(ctx), [['RRTYPE001', 3, 9, 'mismatched types: expected `bool`, found `int`']])
		})

		it('checks the number of call arguments', () => {
			const ctx = checkSource('module m;\nfunc f(a: int) -> int {\n    return a;\n}\nfunc main() {\n    f(1, 2);\n}\n')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE004', 6, 5, 'function `f` takes 1 argument(s) but 2 were supplied'],
			])
		})

		it('lists every accepted type of a builtin parameter', () => {
			const ctx = inMain('    let s = to_string("s");', 'import std.string;\n')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE001', 3, 23, 'mismatched types: expected `int`, `float` or `bool`, found `string`'],
			])
		})

		it('rejects calling a value', () => {
			const ctx = inMain('    let x = 1;\n    x(2);')
			assert.deepStrictEqual(reported(ctx), [['RRTYPE005', 4, 5, '`x` is not a function']])
		})

		it('rejects assignment to a let binding', () => {
			const ctx = inMain('    let x = 1;\n    x = 2;')
			assert.deepStrictEqual(reported(ctx), [['RRTYPE006', 4, 5, 'cannot assign twice to immutable binding `x`']])
		})

		it('rejects a function name used as a value', () => {
			const ctx = inMain('    let g = main;')
			assert.deepStrictEqual(reported(ctx), [['RRTYPE010', 3, 13, '`main` is a function, not a value']])
		})

		it('rejects using the result of a void call', () => {
			const ctx = checkSource('module m;\nfunc v() { }\nfunc main() {\n    let x = v();\n}\n')
			assert.deepStrictEqual(reported(ctx), [['RRTYPE011', 4, 13, 'a `void` value cannot be used here']])
		})

		it('rejects void parameters', () => {
			const ctx = checkSource('module m;\nfunc f(a: void) { }\nfunc main() { }\n')
			assert.deepStrictEqual(reported(ctx), [['RRTYPE011', 2, 11, 'a `void` value cannot be used here']])
		})
	})

	describe('literals', () => {
		it('rejects an int literal beyond the int range', () => {
			const ctx = inMain('    let x = 9223372036854775808;')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE008', 3, 13, 'integer literal `9223372036854775808` does not fit in `int`'],
			])
		})

		it('checks hexadecimal literals against the same range', () => {
			const ctx = inMain('    let x = 0x8000000000000000;')
			assert.strictEqual(reported(ctx)[0]?.[0], 'RRTYPE008')
		})

		it('rejects a float literal that overflows', () => {
			const ctx = inMain('    let f = 1e999;')
			assert.deepStrictEqual(reported(ctx), [['RRTYPE009', 3, 13, 'float literal `1e999` is out of range']])
		})
	})

	describe('returns', () => {
		it('reports a function that may fall off its end', () => {
			const ctx = checkSource('module m;\nfunc f(n: int) -> int {\n    if (n > 0) { return 1; }\n}\nfunc main() { }\n')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE007', 2, 6, 'function `f` may finish without returning a value of type `int`'],
			])
		})

		it('rejects a bare return in a function with a result', () => {
			const ctx = checkSource('module m;\nfunc f() -> int {\n    return;\n}\nfunc main() { }\n')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE012', 3, 5, '`return` without a value in a function returning `int`'],
			])
		})

		it('rejects a value returned from a void function', () => {
			const ctx = inMain('    return 1;')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE013', 3, 12, 'function `main` returns `void` and cannot return a value'],
			])
		})

		it('checks the returned value against the result type', () => {
			const ctx = checkSource('module m;\nfunc main() -> int {\n    return 1.5;\n}\n')
			assert.deepStrictEqual(reported(ctx), [
				['RRTYPE001', 3, 12, 'mismatched types: expected `int`, found `float`'],
			])
		})
	})
})
