import { readFile } from 'node:fs/promises'
import { args, BaseCommand } from '@adonisjs/ace'
import { compile } from '@rerec/compiler'
import { formatCompileError, formatReadError } from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Check a Rerechan02 source file without writing output'

	@args.string({ description: 'Input .rere file to check' })
	declare input: string

	override async run(): Promise<void> {
		let source: string
		try {
			source = await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return
		}

		try {
			const { warnings } = compile(source, { filename: this.input })
			for (const warning of warnings) {
				this.logger.warning(warning.formattedMessage)
			}
			this.logger.success(`${this.input}: no errors`)
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
		}
	}
}
