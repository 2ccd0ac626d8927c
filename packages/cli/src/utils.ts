import { randomBytes } from 'node:crypto'
import { rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { CompileError } from '@rerec/compiler'
import { interpolateMessage, RRCLI001, RRCLI002, RRCLI003, RRCLI004 } from '@rerec/diagnostics'

export const SOURCE_EXTENSION = '.rere'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(RRCLI001.message, { path: filePath })
		return `[${RRCLI001.code}] ${message}`
	}
	const message = interpolateMessage(RRCLI002.message, { reason: getErrorMessage(error) })
	return `[${RRCLI002.code}] ${message}`
}

export function formatWriteError(error: unknown): string {
	const message = interpolateMessage(RRCLI003.message, { reason: getErrorMessage(error) })
	return `[${RRCLI003.code}] ${message}`
}

export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return error.message
	}
	const message = interpolateMessage(RRCLI004.message, { reason: getErrorMessage(error) })
	return `[${RRCLI004.code}] ${message}`
}

/**
 * The C file for an input: `-o` when given, otherwise the input path with
 * `.rere` replaced by `.c` (or `.c` appended).
 */
export function resolveOutputPath(inputPath: string, output: string | undefined): string {
	if (output !== undefined) return output
	const stem = inputPath.endsWith(SOURCE_EXTENSION)
		? inputPath.slice(0, -SOURCE_EXTENSION.length)
		: inputPath
	return `${stem}.c`
}

/**
 * Write through a temporary file in the target directory, then rename it
 * into place. The target is either fully written or untouched.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
	const suffix = randomBytes(6).toString('hex')
	const tempPath = join(dirname(filePath), `.${basename(filePath)}.${suffix}.tmp`)
	try {
		await writeFile(tempPath, content, 'utf-8')
		await rename(tempPath, filePath)
	} catch (error: unknown) {
		await rm(tempPath, { force: true })
		throw error
	}
}
