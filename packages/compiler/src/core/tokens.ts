/**
 * Token storage using dense arrays with integer IDs.
 */

/**
 * Token kinds - small integer discriminant.
 * Ranges: punctuation and operators 0-49, keywords 50-99, identifiers and
 * literals 100-199, Eof 255.
 */
export const TokenKind = {
	AmpersandAmpersand: 20,
	Arrow: 8,
	Bang: 22,
	BangEquals: 15,
	Bool: 72,
	Break: 59,
	Colon: 6,
	Comma: 4,
	Continue: 60,
	Dot: 7,
	Else: 57,
	Eof: 255,
	Equals: 23,
	EqualsEquals: 14,
	False: 62,
	Float: 71,
	FloatLiteral: 102,
	Func: 52,
	Greater: 18,
	GreaterEquals: 19,
	Identifier: 100,
	If: 56,
	Import: 51,
	Int: 70,
	IntLiteral: 101,
	LBrace: 2,
	Less: 16,
	LessEquals: 17,
	Let: 54,
	LParen: 0,
	Minus: 10,
	Module: 50,
	Percent: 13,
	PipePipe: 21,
	Plus: 9,
	RBrace: 3,
	Return: 53,
	RParen: 1,
	Semicolon: 5,
	Slash: 12,
	Star: 11,
	String: 73,
	StringLiteral: 103,
	True: 61,
	Var: 55,
	Void: 74,
	While: 58,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token - fixed size, no pointers.
 * Payload meaning depends on kind:
 * - Identifier: StringId of the name
 * - IntLiteral/FloatLiteral: StringId of the lexeme
 * - StringLiteral: StringId of the decoded value
 * - everything else: 0
 */
export interface Token {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	/** Offset of the first character in the source (BOM excluded) */
	readonly offset: number
	/** Number of source characters the token spans */
	readonly length: number
	readonly payload: number
}

/** Reserved words, mapped to their token kind. */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['bool', TokenKind.Bool],
	['break', TokenKind.Break],
	['continue', TokenKind.Continue],
	['else', TokenKind.Else],
	['false', TokenKind.False],
	['float', TokenKind.Float],
	['func', TokenKind.Func],
	['if', TokenKind.If],
	['import', TokenKind.Import],
	['int', TokenKind.Int],
	['let', TokenKind.Let],
	['module', TokenKind.Module],
	['return', TokenKind.Return],
	['string', TokenKind.String],
	['true', TokenKind.True],
	['var', TokenKind.Var],
	['void', TokenKind.Void],
	['while', TokenKind.While],
])

/**
 * Operators and punctuation, longest first so a linear scan is maximal munch.
 */
export const PUNCTUATORS: ReadonlyArray<readonly [string, TokenKind]> = [
	['->', TokenKind.Arrow],
	['==', TokenKind.EqualsEquals],
	['!=', TokenKind.BangEquals],
	['<=', TokenKind.LessEquals],
	['>=', TokenKind.GreaterEquals],
	['&&', TokenKind.AmpersandAmpersand],
	['||', TokenKind.PipePipe],
	['+', TokenKind.Plus],
	['-', TokenKind.Minus],
	['*', TokenKind.Star],
	['/', TokenKind.Slash],
	['%', TokenKind.Percent],
	['<', TokenKind.Less],
	['>', TokenKind.Greater],
	['=', TokenKind.Equals],
	['!', TokenKind.Bang],
	['(', TokenKind.LParen],
	[')', TokenKind.RParen],
	['{', TokenKind.LBrace],
	['}', TokenKind.RBrace],
	[',', TokenKind.Comma],
	[';', TokenKind.Semicolon],
	[':', TokenKind.Colon],
	['.', TokenKind.Dot],
]

const FIXED_TEXT: ReadonlyMap<TokenKind, string> = new Map<TokenKind, string>([
	...Array.from(KEYWORDS, ([text, kind]): [TokenKind, string] => [kind, text]),
	...PUNCTUATORS.map(([text, kind]): [TokenKind, string] => [kind, text]),
])

/**
 * Source text of a keyword or punctuation kind.
 * Returns null for kinds whose text lives in the payload.
 */
export function fixedTokenText(kind: TokenKind): string | null {
	return FIXED_TEXT.get(kind) ?? null
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [i as TokenId, token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}
}
