/**
 * C identifiers for Rerechan02 entities.
 *
 * - functions: f_<name>
 * - locals and parameters: l_<name>; a later local of the same name in the
 *   same function becomes l<k>_<name>
 * - temporaries: t<k>, numbered across the whole translation unit
 *
 * Every generated name carries a prefix, so none can collide with a C
 * keyword or a runtime symbol (rere_*).
 */

import type { SymbolId } from '../check/types.ts'

export function functionName(name: string): string {
	return `f_${name}`
}

/**
 * Names for one translation unit.
 */
export class NameTable {
	private tempCounter = 0
	private locals = new Map<SymbolId, string>()
	private localCounts = new Map<string, number>()

	/** Start naming the locals of a new function. */
	enterFunction(): void {
		this.locals = new Map()
		this.localCounts = new Map()
	}

	declareLocal(symbol: SymbolId, name: string): string {
		const seen = this.localCounts.get(name) ?? 0
		this.localCounts.set(name, seen + 1)
		const cName = seen === 0 ? `l_${name}` : `l${seen}_${name}`
		this.locals.set(symbol, cName)
		return cName
	}

	local(symbol: SymbolId): string | undefined {
		return this.locals.get(symbol)
	}

	temp(): string {
		this.tempCounter++
		return `t${this.tempCounter}`
	}
}
