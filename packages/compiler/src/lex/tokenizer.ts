import type { CompilationContext } from '../core/context.ts'
import { type TokenId, TokenKind } from '../core/tokens.ts'
import { type Lexeme, LexError, Scanner } from './scanner.ts'

export interface TokenizeResult {
	succeeded: boolean
}

export interface TokenizeOptions {
	/** Keep scanning after a lexical error to report further ones (default true) */
	recover?: boolean
}

function payloadOf(lexeme: Lexeme, context: CompilationContext): number {
	switch (lexeme.kind) {
		case TokenKind.Identifier:
		case TokenKind.IntLiteral:
		case TokenKind.FloatLiteral:
		case TokenKind.StringLiteral:
			return context.strings.intern(lexeme.value)
		default:
			return 0
	}
}

function addToken(lexeme: Lexeme, context: CompilationContext): TokenId {
	return context.tokens.add({
		column: lexeme.column,
		kind: lexeme.kind,
		length: lexeme.length,
		line: lexeme.line,
		offset: lexeme.offset,
		payload: payloadOf(lexeme, context),
	})
}

function reportLexError(error: LexError, context: CompilationContext): void {
	context.emit(error.code, error.line, error.column, { text: error.text })
}

function addEof(scanner: Scanner, context: CompilationContext): void {
	const { source } = scanner
	const lastNewline = source.lastIndexOf('\n')
	context.tokens.add({
		column: source.length - lastNewline,
		kind: TokenKind.Eof,
		length: 0,
		line: source.split('\n').length,
		offset: source.length,
		payload: 0,
	})
}

/**
 * Tokenizes source code, populating context.tokens.
 * Lexical errors become diagnostics; with recovery on, scanning resumes after
 * the offending input so one pass reports every lexical error.
 * The token stream always ends with exactly one Eof token.
 */
export function tokenize(
	context: CompilationContext,
	options: TokenizeOptions = {}
): TokenizeResult {
	const { recover = true } = options
	const scanner = new Scanner(context.source)

	while (!scanner.done) {
		try {
			addToken(scanner.scan(), context)
		} catch (error) {
			if (!(error instanceof LexError)) throw error
			reportLexError(error, context)
			if (!recover) {
				addEof(scanner, context)
				break
			}
			scanner.recover()
		}
	}

	return { succeeded: !context.hasErrors() }
}
