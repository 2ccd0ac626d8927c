/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * The class of failure a diagnostic reports.
 * Lets callers tell user mistakes apart from compiler defects.
 */
export const DiagnosticKind = {
	Cli: 'CliError',
	DuplicateDeclaration: 'DuplicateDeclarationError',
	InternalCompiler: 'InternalCompilerError',
	Lex: 'LexError',
	Lint: 'Lint',
	Resolve: 'ResolveError',
	Syntax: 'SyntaxError',
	Type: 'TypeError',
	UnresolvedIdentifier: 'UnresolvedIdentifierError',
} as const

export type DiagnosticKind = (typeof DiagnosticKind)[keyof typeof DiagnosticKind]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly kind: DiagnosticKind
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
