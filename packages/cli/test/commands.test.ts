import assert from 'node:assert'
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { BaseCommand, Kernel } from '@adonisjs/ace'
import { runtimeSourcePath } from '@rerec/compiler'
import BuildCommand from '../src/commands/build.ts'
import CheckCommand from '../src/commands/check.ts'
import RuntimeCommand from '../src/commands/runtime.ts'

const HELLO = 'module hello;\nimport std.io;\nfunc main() {\n    print("Hello, world!");\n}\n'
const BROKEN = 'module broken;\nfunc main() {\n    print(missing);\n}\n'

function createKernel(): Kernel<typeof BaseCommand> {
	const kernel = Kernel.create()
	kernel.ui.switchMode('raw')
	return kernel
}

describe('cli/commands', () => {
	let dir = ''

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), 'rerec-cli-'))
	})

	after(async () => {
		await rm(dir, { force: true, recursive: true })
	})

	async function source(name: string, text: string): Promise<string> {
		const path = join(dir, name)
		await writeFile(path, text)
		return path
	}

	describe('build', () => {
		it('writes the C file beside the source', async () => {
			const input = await source('hello.rere', HELLO)
			const command = await createKernel().create(BuildCommand, [input])
			await command.exec()

			command.assertSucceeded()
			const code = await readFile(join(dir, 'hello.c'), 'utf-8')
			assert.ok(code.startsWith(`/* module hello, from ${input} */\n`))
			assert.ok(code.includes('    rere_print(((rere_string){ "Hello, world!", 13 }));\n'))
		})

		it('writes to the path given with -o', async () => {
			const input = await source('named.rere', HELLO)
			const output = join(dir, 'custom.c')
			const command = await createKernel().create(BuildCommand, [input, '-o', output])
			await command.exec()

			command.assertSucceeded()
			assert.ok((await readFile(output, 'utf-8')).includes('int main(int argc, char **argv) {'))
		})

		it('fails without output when the program has errors', async () => {
			const input = await source('broken.rere', BROKEN)
			const command = await createKernel().create(BuildCommand, [input])
			await command.exec()

			command.assertFailed()
			command.assertLogMatches(/error\[RRRES002\]: cannot find `missing` in this scope/)
			assert.ok(!(await readdir(dir)).includes('broken.c'))
		})

		it('reports a missing input file', async () => {
			const input = join(dir, 'absent.rere')
			const command = await createKernel().create(BuildCommand, [input])
			await command.exec()

			command.assertFailed()
			command.assertLogMatches(/\[RRCLI001\] file not found: /)
		})

		it('logs tokens and the tree when verbose', async () => {
			const input = await source('verbose.rere', HELLO)
			const command = await createKernel().create(BuildCommand, [input, '--verbose'])
			await command.exec()

			command.assertSucceeded()
			command.assertLogMatches(/Tokens: \d+/)
			command.assertLogMatches(/ModuleDecl @1:1/)
		})
	})

	describe('check', () => {
		it('accepts a valid program', async () => {
			const input = await source('valid.rere', HELLO)
			const command = await createKernel().create(CheckCommand, [input])
			await command.exec()

			command.assertSucceeded()
			command.assertLogMatches(/no errors/)
		})

		it('rejects an invalid program', async () => {
			const input = await source('invalid.rere', BROKEN)
			const command = await createKernel().create(CheckCommand, [input])
			await command.exec()

			command.assertFailed()
		})
	})

	describe('runtime', () => {
		it('copies the runtime library into the target directory', async () => {
			const target = join(dir, 'runtime-out')
			const command = await createKernel().create(RuntimeCommand, ['-o', target])
			await command.exec()

			command.assertSucceeded()
			assert.deepStrictEqual((await readdir(target)).sort(), ['rere_runtime.c', 'rere_runtime.h'])
			assert.strictEqual(
				await readFile(join(target, 'rere_runtime.h'), 'utf-8'),
				await readFile(runtimeSourcePath('rere_runtime.h'), 'utf-8')
			)
		})
	})
})
