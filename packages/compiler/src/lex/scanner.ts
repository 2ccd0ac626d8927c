/**
 * On-demand scanner: turns source text into lexemes one at a time.
 */

import { stripBom } from '../core/context.ts'
import { KEYWORDS, PUNCTUATORS, TokenKind } from '../core/tokens.ts'

/** Lexer diagnostic codes a scan can fail with. */
export type LexErrorCode = 'RRLEX001' | 'RRLEX002' | 'RRLEX003' | 'RRLEX004' | 'RRLEX005'

/**
 * A token as read from the source, before interning.
 * `text` is the lexeme as written; `value` is the decoded value for
 * string literals and equal to `text` otherwise.
 */
export interface Lexeme {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	readonly offset: number
	readonly length: number
	readonly text: string
	readonly value: string
}

/**
 * Thrown by Scanner.scan() for input that forms no valid token.
 */
export class LexError extends Error {
	readonly code: LexErrorCode
	/** Offending source text */
	readonly text: string
	readonly line: number
	readonly column: number
	readonly offset: number
	/** Offset where scanning resumes after recover() */
	readonly resumeOffset: number

	constructor(
		code: LexErrorCode,
		text: string,
		position: { line: number; column: number; offset: number },
		resumeOffset: number
	) {
		super(`${code} at ${position.line}:${position.column}: ${JSON.stringify(text)}`)
		this.name = 'LexError'
		this.code = code
		this.text = text
		this.line = position.line
		this.column = position.column
		this.offset = position.offset
		this.resumeOffset = resumeOffset
	}
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
	['"', '"'],
	['0', '\0'],
	['\\', '\\'],
	['n', '\n'],
	['r', '\r'],
	['t', '\t'],
])

function isDigit(c: string): boolean {
	return c >= '0' && c <= '9'
}

function isHexDigit(c: string): boolean {
	return isDigit(c) || (c >= 'a' && c <= 'f') || (c >= 'A' && c <= 'F')
}

function isIdentStart(c: string): boolean {
	return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_'
}

function isIdentPart(c: string): boolean {
	return isIdentStart(c) || isDigit(c)
}

function isWhitespace(c: string): boolean {
	return c === ' ' || c === '\t' || c === '\r' || c === '\n'
}

/**
 * Lazy lexer over one source text.
 *
 * scan() returns the next lexeme, or throws a LexError. After an error the
 * caller either stops or calls recover() to skip the bad input and continue.
 * Scanning restarts only from the beginning (reset()). The text is scanned
 * as given: a byte order mark is removed before it reaches the Scanner.
 */
export class Scanner {
	readonly source: string

	private pos = 0
	private line = 1
	private column = 1
	private pending: LexError | null = null
	private finished = false

	constructor(source: string) {
		this.source = source
	}

	/** Rewind to the start of the source. */
	reset(): void {
		this.pos = 0
		this.line = 1
		this.column = 1
		this.pending = null
		this.finished = false
	}

	/** True once the end-of-input lexeme has been returned. */
	get done(): boolean {
		return this.finished
	}

	/**
	 * Skip past the input that made the last scan() fail.
	 * Without a pending error, skips a single character.
	 */
	recover(): void {
		const target = this.pending ? this.pending.resumeOffset : this.pos + 1
		this.pending = null
		this.advanceTo(Math.min(target, this.source.length))
	}

	scan(): Lexeme {
		console.assert(this.pending === null, 'scan() called with an unrecovered LexError')
		this.skipTrivia()

		if (this.pos >= this.source.length) {
			this.finished = true
			return this.lexeme(TokenKind.Eof, this.position(), '', '')
		}

		const c = this.peek()
		if (isIdentStart(c)) return this.scanIdentifier()
		if (isDigit(c)) return this.scanNumber()
		if (c === '"') return this.scanString()
		return this.scanPunctuator()
	}

	// ===========================================================================
	// TRIVIA
	// ===========================================================================

	private skipTrivia(): void {
		for (;;) {
			const c = this.peek()
			if (isWhitespace(c)) {
				this.advance(1)
			} else if (c === '/' && this.peek(1) === '/') {
				const newline = this.source.indexOf('\n', this.pos)
				this.advanceTo(newline === -1 ? this.source.length : newline)
			} else if (c === '/' && this.peek(1) === '*') {
				const start = this.position()
				const close = this.source.indexOf('*/', this.pos + 2)
				if (close === -1) {
					this.fail('RRLEX005', '/*', start, this.source.length)
				}
				this.advanceTo(close + 2)
			} else {
				return
			}
		}
	}

	// ===========================================================================
	// TOKENS
	// ===========================================================================

	private scanIdentifier(): Lexeme {
		const start = this.position()
		let end = this.pos
		while (end < this.source.length && isIdentPart(this.source.charAt(end))) end++
		const text = this.source.slice(this.pos, end)
		this.advanceTo(end)
		return this.lexeme(KEYWORDS.get(text) ?? TokenKind.Identifier, start, text, text)
	}

	private scanNumber(): Lexeme {
		const start = this.position()
		const src = this.source
		let end = this.pos
		let kind: TokenKind = TokenKind.IntLiteral
		let valid = true

		const radix = src.charAt(end) === '0' ? src.charAt(end + 1) : ''
		if (radix === 'x' || radix === 'X' || radix === 'b' || radix === 'B') {
			const accepts = radix === 'x' || radix === 'X' ? isHexDigit : (d: string) => d === '0' || d === '1'
			end += 2
			const digitsStart = end
			while (end < src.length && accepts(src.charAt(end))) end++
			valid = end > digitsStart
		} else {
			while (end < src.length && isDigit(src.charAt(end))) end++
			if (src.charAt(end) === '.' && isDigit(src.charAt(end + 1))) {
				kind = TokenKind.FloatLiteral
				end++
				while (end < src.length && isDigit(src.charAt(end))) end++
			}
			const e = src.charAt(end)
			if (e === 'e' || e === 'E') {
				kind = TokenKind.FloatLiteral
				end++
				const sign = src.charAt(end)
				if (sign === '+' || sign === '-') end++
				const expStart = end
				while (end < src.length && isDigit(src.charAt(end))) end++
				valid = end > expStart
			}
		}

		if (end < src.length && isIdentPart(src.charAt(end))) {
			valid = false
		}
		if (!valid) {
			while (end < src.length && isIdentPart(src.charAt(end))) end++
			this.fail('RRLEX004', src.slice(this.pos, end), start, end)
		}

		const text = src.slice(this.pos, end)
		this.advanceTo(end)
		return this.lexeme(kind, start, text, text)
	}

	private scanString(): Lexeme {
		const start = this.position()
		const src = this.source
		let end = this.pos + 1
		let value = ''
		let badEscape: { text: string; offset: number } | null = null

		for (;;) {
			const c = src.charAt(end)
			if (end >= src.length || c === '\n' || c === '\r') {
				this.fail('RRLEX002', '"', start, end)
			}
			if (c === '"') {
				end++
				break
			}
			if (c === '\\') {
				const next = src.charAt(end + 1)
				const decoded = ESCAPES.get(next)
				if (decoded === undefined) {
					if (end + 1 >= src.length || next === '\n' || next === '\r') {
						this.fail('RRLEX002', '"', start, end + 1)
					}
					badEscape ??= { offset: end, text: `\\${next}` }
				} else {
					value += decoded
				}
				end += 2
				continue
			}
			value += c
			end++
		}

		if (badEscape !== null) {
			this.advanceTo(badEscape.offset)
			this.fail('RRLEX003', badEscape.text, this.position(), end)
		}

		const text = src.slice(this.pos, end)
		this.advanceTo(end)
		return this.lexeme(TokenKind.StringLiteral, start, text, value)
	}

	private scanPunctuator(): Lexeme {
		const start = this.position()
		for (const [text, kind] of PUNCTUATORS) {
			if (this.source.startsWith(text, this.pos)) {
				this.advance(text.length)
				return this.lexeme(kind, start, text, text)
			}
		}

		const codePoint = this.source.codePointAt(this.pos) ?? 0
		const text = String.fromCodePoint(codePoint)
		this.fail('RRLEX001', text, start, this.pos + text.length)
	}

	// ===========================================================================
	// POSITION
	// ===========================================================================

	private peek(ahead = 0): string {
		return this.source.charAt(this.pos + ahead)
	}

	private position(): { line: number; column: number; offset: number } {
		return { column: this.column, line: this.line, offset: this.pos }
	}

	private advance(count: number): void {
		this.advanceTo(this.pos + count)
	}

	private advanceTo(target: number): void {
		while (this.pos < target) {
			if (this.source.charAt(this.pos) === '\n') {
				this.line++
				this.column = 1
			} else {
				this.column++
			}
			this.pos++
		}
	}

	private lexeme(
		kind: TokenKind,
		start: { line: number; column: number; offset: number },
		text: string,
		value: string
	): Lexeme {
		return {
			column: start.column,
			kind,
			length: this.pos - start.offset,
			line: start.line,
			offset: start.offset,
			text,
			value,
		}
	}

	private fail(
		code: LexErrorCode,
		text: string,
		start: { line: number; column: number; offset: number },
		resumeOffset: number
	): never {
		const error = new LexError(code, text, start, Math.max(resumeOffset, start.offset + 1))
		this.pending = error
		throw error
	}
}

/**
 * Lex a whole source lazily.
 * Yields every lexeme in order, ending with exactly one Eof, and throws the
 * first LexError encountered.
 */
export function* lex(source: string): Generator<Lexeme> {
	const scanner = new Scanner(stripBom(source))
	while (!scanner.done) {
		yield scanner.scan()
	}
}
