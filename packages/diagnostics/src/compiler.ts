/**
 * Compiler diagnostic definitions.
 *
 * Error code format: RR<PHASE><NUMBER>
 * - RRLEX: Lexer errors (001-099)
 * - RRPARSE: Parser errors (001-099)
 * - RRRES: Resolver errors (001-049), warnings (050-099)
 * - RRTYPE: Type errors (001-099)
 * - RRCHECK: Flow warnings (050-099)
 * - RRGEN: Internal codegen errors (001-099)
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (RRLEX001-099)
// =============================================================================

export const RRLEX001: DiagnosticDef = {
	code: 'RRLEX001',
	description: "This character isn't part of any Rerechan02 token.",
	kind: DiagnosticKind.Lex,
	message: 'unexpected character `{text}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove it, or put it inside a string literal.',
}

export const RRLEX002: DiagnosticDef = {
	code: 'RRLEX002',
	description: 'String literals have to be closed with `"` on the same line they start on.',
	kind: DiagnosticKind.Lex,
	message: 'unterminated string literal',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the closing `"`, or use `\\n` for a line break inside the string.',
}

export const RRLEX003: DiagnosticDef = {
	code: 'RRLEX003',
	description: 'Only a few escape sequences are understood inside string literals.',
	kind: DiagnosticKind.Lex,
	message: 'unknown escape sequence `{text}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of \\n, \\t, \\r, \\0, \\\\ or \\".',
}

export const RRLEX004: DiagnosticDef = {
	code: 'RRLEX004',
	description: "This looks like a number but doesn't follow the literal syntax.",
	kind: DiagnosticKind.Lex,
	message: 'malformed number literal `{text}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write decimal (42), hexadecimal (0x2A), binary (0b101) or float (4.2, 1e3) literals.',
}

export const RRLEX005: DiagnosticDef = {
	code: 'RRLEX005',
	description: 'A `/*` comment runs until the matching `*/`, which is missing.',
	kind: DiagnosticKind.Lex,
	message: 'unterminated block comment',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the comment with `*/`.',
}

// =============================================================================
// PARSER ERRORS (RRPARSE001-099)
// =============================================================================

export const RRPARSE001: DiagnosticDef = {
	code: 'RRPARSE001',
	description: "The compiler couldn't understand this part of your code.",
	kind: DiagnosticKind.Syntax,
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos, missing `;` or unbalanced braces.',
}

// =============================================================================
// RESOLVER ERRORS (RRRES001-049)
// =============================================================================

export const RRRES001: DiagnosticDef = {
	code: 'RRRES001',
	description: 'Two declarations in the same scope cannot share a name.',
	kind: DiagnosticKind.DuplicateDeclaration,
	message: '`{name}` is already declared in this scope',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of them, or move the second declaration into a nested block.',
}

export const RRRES002: DiagnosticDef = {
	code: 'RRRES002',
	description: 'Names have to be declared before they are used.',
	kind: DiagnosticKind.UnresolvedIdentifier,
	message: 'cannot find `{name}` in this scope',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the spelling, or declare `{name}` before using it.',
}

export const RRRES003: DiagnosticDef = {
	code: 'RRRES003',
	description: 'Only the standard library modules can be imported.',
	kind: DiagnosticKind.Resolve,
	message: 'unknown module `{path}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Available modules: {available}.',
}

export const RRRES004: DiagnosticDef = {
	code: 'RRRES004',
	description: 'Every program starts running at `func main()`.',
	kind: DiagnosticKind.Resolve,
	message: 'missing entry function `main`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add `func main() -> int { return 0; }` to the module.',
}

export const RRRES005: DiagnosticDef = {
	code: 'RRRES005',
	description: '`break` and `continue` only make sense inside a `while` loop.',
	kind: DiagnosticKind.Resolve,
	message: '`{keyword}` outside of a loop',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move it into a loop body, or use `return` to leave the function.',
}

export const RRRES006: DiagnosticDef = {
	code: 'RRRES006',
	description: 'The entry function is called with no arguments and its result becomes the exit status.',
	kind: DiagnosticKind.Resolve,
	message: 'entry function `main` must take no parameters and return `int` or `void`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare it as `func main() -> int` or `func main()`.',
}

// =============================================================================
// RESOLVER WARNINGS (RRRES050-099)
// =============================================================================

export const RRRES050: DiagnosticDef = {
	code: 'RRRES050',
	description: 'Importing a module a second time has no effect.',
	kind: DiagnosticKind.Resolve,
	message: 'module `{path}` is imported more than once',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove the duplicate import.',
}

// =============================================================================
// TYPE ERRORS (RRTYPE001-099)
// =============================================================================

export const RRTYPE001: DiagnosticDef = {
	code: 'RRTYPE001',
	description: 'The value here has a different type than the one required.',
	kind: DiagnosticKind.Type,
	message: 'mismatched types: expected {expected}, found `{found}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Convert the value explicitly, e.g. with `to_float` or `to_int`.',
}

export const RRTYPE002: DiagnosticDef = {
	code: 'RRTYPE002',
	description: 'Binary operators need operands of matching, supported types.',
	kind: DiagnosticKind.Type,
	message: 'operator `{op}` cannot be applied to `{left}` and `{right}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Both sides must have the same type; there are no implicit conversions.',
}

export const RRTYPE003: DiagnosticDef = {
	code: 'RRTYPE003',
	description: 'This unary operator does not support the operand type.',
	kind: DiagnosticKind.Type,
	message: 'operator `{op}` cannot be applied to `{type}`',
	severity: DiagnosticSeverity.Error,
	suggestion: '`-` works on `int` and `float`, `!` works on `bool`.',
}

export const RRTYPE004: DiagnosticDef = {
	code: 'RRTYPE004',
	description: 'A call has to pass exactly as many arguments as the function declares.',
	kind: DiagnosticKind.Type,
	message: 'function `{name}` takes {expected} argument(s) but {found} were supplied',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the declaration of `{name}`.',
}

export const RRTYPE005: DiagnosticDef = {
	code: 'RRTYPE005',
	description: 'Only functions can be called.',
	kind: DiagnosticKind.Type,
	message: '`{name}` is not a function',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the parentheses, or call a function instead.',
}

export const RRTYPE006: DiagnosticDef = {
	code: 'RRTYPE006',
	description: '`let` bindings and parameters cannot be reassigned.',
	kind: DiagnosticKind.Type,
	message: 'cannot assign twice to immutable binding `{name}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare it with `var` instead of `let` to make it mutable.',
}

export const RRTYPE007: DiagnosticDef = {
	code: 'RRTYPE007',
	description: 'A function with a result type has to return a value on every path.',
	kind: DiagnosticKind.Type,
	message: 'function `{name}` may finish without returning a value of type `{type}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a `return` at the end of the function body.',
}

export const RRTYPE008: DiagnosticDef = {
	code: 'RRTYPE008',
	description: '`int` values are 64-bit signed integers.',
	kind: DiagnosticKind.Type,
	message: 'integer literal `{value}` does not fit in `int`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a value between -9223372036854775808 and 9223372036854775807.',
}

export const RRTYPE009: DiagnosticDef = {
	code: 'RRTYPE009',
	description: 'Float literals have to be finite double-precision values.',
	kind: DiagnosticKind.Type,
	message: 'float literal `{value}` is out of range',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a smaller exponent.',
}

export const RRTYPE010: DiagnosticDef = {
	code: 'RRTYPE010',
	description: 'Functions are not values: they can only be called.',
	kind: DiagnosticKind.Type,
	message: '`{name}` is a function, not a value',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Call it with `{name}(...)`.',
}

export const RRTYPE011: DiagnosticDef = {
	code: 'RRTYPE011',
	description: '`void` means "no value", so it cannot be stored or computed with.',
	kind: DiagnosticKind.Type,
	message: 'a `void` value cannot be used here',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Call the function as a statement of its own.',
}

export const RRTYPE012: DiagnosticDef = {
	code: 'RRTYPE012',
	description: 'A bare `return;` only fits functions that return `void`.',
	kind: DiagnosticKind.Type,
	message: '`return` without a value in a function returning `{type}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Return a value of type `{type}`.',
}

export const RRTYPE013: DiagnosticDef = {
	code: 'RRTYPE013',
	description: 'A function without a result type cannot hand a value back.',
	kind: DiagnosticKind.Type,
	message: 'function `{name}` returns `void` and cannot return a value',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a result type, e.g. `-> int`, or drop the value.',
}

// =============================================================================
// FLOW WARNINGS (RRCHECK050-099)
// =============================================================================

export const RRCHECK050: DiagnosticDef = {
	code: 'RRCHECK050',
	description:
		'This code will never run because something above it (like `return` or `panic`) always leaves first.',
	kind: DiagnosticKind.Lint,
	message: 'unreachable code',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'You can safely remove this code, or move it before the exit point.',
}

// =============================================================================
// INTERNAL ERRORS (RRGEN001-099)
// =============================================================================

export const RRGEN001: DiagnosticDef = {
	code: 'RRGEN001',
	description:
		"The code generator met something the checker should have rejected. This isn't a problem with your program.",
	kind: DiagnosticKind.InternalCompiler,
	message: 'internal error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a compiler bug; please report it together with the source file.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Flow warnings
	RRCHECK050,
	// Internal errors
	RRGEN001,
	// Lexer errors
	RRLEX001,
	RRLEX002,
	RRLEX003,
	RRLEX004,
	RRLEX005,
	// Parser errors
	RRPARSE001,
	// Resolver errors and warnings
	RRRES001,
	RRRES002,
	RRRES003,
	RRRES004,
	RRRES005,
	RRRES006,
	RRRES050,
	// Type errors
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
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
