/**
 * Location of the C runtime support library shipped with the compiler.
 */

import { fileURLToPath } from 'node:url'

export const RUNTIME_FILES = ['rere_runtime.h', 'rere_runtime.c'] as const

export type RuntimeFile = (typeof RUNTIME_FILES)[number]

/** Absolute path of a runtime source file. */
export function runtimeSourcePath(file: RuntimeFile): string {
	return fileURLToPath(new URL(`../runtime/${file}`, import.meta.url))
}
