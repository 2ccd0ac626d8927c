/**
 * Errors thrown out of the pipeline.
 */

/**
 * A compilation that produced at least one error diagnostic.
 * The message holds every formatted diagnostic.
 */
export class CompileError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CompileError'
	}
}

/**
 * A stage received input its predecessor should never have produced.
 * Never reported to users as a diagnostic of their program.
 */
export class InternalCompilerError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InternalCompilerError'
	}
}
