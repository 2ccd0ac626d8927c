/**
 * C spellings of constant values.
 */

const INT64_MIN = -(2n ** 63n)

/** An int64_t constant. The most negative value has no literal form in C. */
export function intConstant(value: bigint): string {
	if (value === INT64_MIN) return '(-INT64_C(9223372036854775807) - 1)'
	return `INT64_C(${value})`
}

/** A double constant; always carries a `.` or exponent so C reads it as floating. */
export function floatConstant(value: number): string {
	if (!Number.isFinite(value)) {
		throw new RangeError(`Not a finite float: ${value}`)
	}
	const text = String(value)
	return /[.eE]/.test(text) ? text : `${text}.0`
}

function escapeByte(byte: number): string {
	if (byte === 0x22) return '\\"'
	if (byte === 0x5c) return '\\\\'
	// `?` is escaped so no trigraph can form
	if (byte === 0x3f) return '\\?'
	if (byte >= 0x20 && byte <= 0x7e) return String.fromCharCode(byte)
	return `\\${byte.toString(8).padStart(3, '0')}`
}

/** A C string literal holding the UTF-8 bytes of `bytes`. */
export function cStringLiteral(bytes: Uint8Array): string {
	let out = '"'
	for (const byte of bytes) out += escapeByte(byte)
	return `${out}"`
}

const encoder = new TextEncoder()

export function utf8(value: string): Uint8Array {
	return encoder.encode(value)
}

/** A `rere_string` compound literal for a Rerechan02 string value. */
export function stringConstant(value: string): string {
	const bytes = utf8(value)
	return `((rere_string){ ${cStringLiteral(bytes)}, ${bytes.length} })`
}
