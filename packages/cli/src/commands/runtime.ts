import { copyFile, mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import { BaseCommand, flags } from '@adonisjs/ace'
import { RUNTIME_FILES, runtimeSourcePath } from '@rerec/compiler'
import { formatWriteError } from '../utils.ts'

export default class RuntimeCommand extends BaseCommand {
	static override commandName = 'runtime'
	static override description = 'Copy the C runtime support library into a directory'

	@flags.string({ alias: 'o', description: 'Target directory (created if not exists)' })
	declare output?: string

	override async run(): Promise<void> {
		const dir = this.output ?? '.'
		try {
			await mkdir(dir, { recursive: true })
			for (const file of RUNTIME_FILES) {
				const target = join(dir, file)
				await copyFile(runtimeSourcePath(file), target)
				this.logger.success(`Wrote ${target}`)
			}
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}
}
