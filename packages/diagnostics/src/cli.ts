/**
 * CLI diagnostic definitions.
 *
 * Error code format: RRCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (RRCLI001-099)
// =============================================================================

export const RRCLI001: DiagnosticDef = {
	code: 'RRCLI001',
	description: "rerec couldn't find a file at this path.",
	kind: DiagnosticKind.Cli,
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const RRCLI002: DiagnosticDef = {
	code: 'RRCLI002',
	description: "The file exists but rerec can't open it.",
	kind: DiagnosticKind.Cli,
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const RRCLI003: DiagnosticDef = {
	code: 'RRCLI003',
	description: "rerec couldn't save the output file.",
	kind: DiagnosticKind.Cli,
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const RRCLI004: DiagnosticDef = {
	code: 'RRCLI004',
	description: 'Something unexpected went wrong during compilation.',
	kind: DiagnosticKind.Cli,
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	RRCLI001,
	RRCLI002,
	RRCLI003,
	RRCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
