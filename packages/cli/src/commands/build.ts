import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type CompileOutput, compile, formatAst } from '@rerec/compiler'
import {
	formatCompileError,
	formatReadError,
	formatWriteError,
	resolveOutputPath,
	writeFileAtomic,
} from '../utils.ts'

export default class BuildCommand extends BaseCommand {
	static override commandName = 'build'
	static override description = 'Compile a Rerechan02 source file to C'

	@args.string({ description: 'Input .rere file to compile' })
	declare input: string

	@flags.string({ alias: 'o', description: 'Output C file (default: input path with .c)' })
	declare output?: string

	@flags.boolean({ description: 'Log the token count, the AST and the output path' })
	declare verbose: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private compileSource(source: string): CompileOutput | null {
		try {
			return compile(source, { filename: this.input })
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
			return null
		}
	}

	private logDetails(result: CompileOutput): void {
		const { context } = result
		this.logger.info(`Tokens: ${context.tokens.count()}`)
		if (context.program !== null) {
			this.logger.info(`AST:\n${formatAst(context.program, context.strings)}`)
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.compileSource(source)
		if (result === null) return

		for (const warning of result.warnings) {
			this.logger.warning(warning.formattedMessage)
		}
		if (this.verbose) this.logDetails(result)

		const outputPath = resolveOutputPath(this.input, this.output)
		try {
			await writeFileAtomic(outputPath, result.code)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return
		}

		if (this.verbose) this.logger.success(`Generated C code saved to ${outputPath}`)
	}
}
