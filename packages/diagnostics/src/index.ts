/**
 * @rerec/diagnostics
 *
 * Shared diagnostic types and definitions for the rerec packages.
 */

export { CLI_DIAGNOSTICS, type CliDiagnosticCode, RRCLI001, RRCLI002, RRCLI003, RRCLI004 } from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	RRCHECK050,
	RRGEN001,
	RRLEX001,
	RRLEX002,
	RRLEX003,
	RRLEX004,
	RRLEX005,
	RRPARSE001,
	RRRES001,
	RRRES002,
	RRRES003,
	RRRES004,
	RRRES005,
	RRRES006,
	RRRES050,
	RRTYPE001,
	RRTYPE002,
	RRTYPE003,
	RRTYPE004,
	RRTYPE005,
	RRTYPE006,
	RRTYPE007,
	RRTYPE008,
	RRTYPE009,
	RRTYPE010,
	RRTYPE011,
	RRTYPE012,
	RRTYPE013,
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticKind,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}
