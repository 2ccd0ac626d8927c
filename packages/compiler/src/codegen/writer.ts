/**
 * Line-oriented C source builder with indentation.
 */

const INDENT = '    '

export class CWriter {
	private lines: string[] = []
	private depth = 0

	line(text = ''): void {
		this.lines.push(text === '' ? '' : `${INDENT.repeat(this.depth)}${text}`)
	}

	/** Emit `text` (ending in `{`) and indent what follows. */
	open(text: string): void {
		this.line(text)
		this.depth++
	}

	/** Dedent and emit `text`. */
	close(text = '}'): void {
		this.depth--
		this.line(text)
	}

	/** Dedent, emit `text` (such as `} else {`) and indent again. */
	reopen(text: string): void {
		this.close(text)
		this.depth++
	}

	/**
	 * Run `fn` `levels` deeper than the current depth, collecting its lines
	 * instead of emitting them.
	 */
	capture<T>(fn: () => T, levels = 1): { lines: string[]; result: T } {
		const saved = this.lines
		this.lines = []
		this.depth += levels
		try {
			const result = fn()
			return { lines: this.lines, result }
		} finally {
			this.depth -= levels
			this.lines = saved
		}
	}

	/** Emit lines collected by capture, already indented. */
	append(lines: readonly string[]): void {
		this.lines.push(...lines)
	}

	toString(): string {
		return `${this.lines.join('\n')}\n`
	}
}
