/**
 * Error taxonomy shared by every stage of a merge
 *
 * Each error carries a `kind` discriminant so callers can decide on
 * remediation (re-fetch metadata, reject the input set) without matching on
 * message text.
 */

export type HdrMergeErrorKind = 'metadata' | 'decode' | 'shape' | 'insufficient-input' | 'unknown'

export interface HdrMergeErrorOptions {
	/** Image identifier the failure belongs to, when there is one */
	identifier?: string
	cause?: unknown
}

export class HdrMergeError extends Error {
	readonly kind: HdrMergeErrorKind
	readonly identifier: string | undefined

	constructor(kind: HdrMergeErrorKind, message: string, options: HdrMergeErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause })
		this.name = 'HdrMergeError'
		this.kind = kind
		this.identifier = options.identifier
	}
}

/** Exposure or gain could not be obtained, or is malformed */
export class MetadataError extends HdrMergeError {
	constructor(message: string, options?: HdrMergeErrorOptions) {
		super('metadata', message, options)
		this.name = 'MetadataError'
	}
}

/** Image could not be read, or is not a 3-channel RGB image */
export class DecodeError extends HdrMergeError {
	constructor(message: string, options?: HdrMergeErrorOptions) {
		super('decode', message, options)
		this.name = 'DecodeError'
	}
}

/** Buffer lengths that break the RGB triple or same-size invariant */
export class ShapeError extends HdrMergeError {
	constructor(message: string, options?: HdrMergeErrorOptions) {
		super('shape', message, options)
		this.name = 'ShapeError'
	}
}

/** Nothing to merge */
export class InsufficientInputError extends HdrMergeError {
	constructor(message = 'At least one image is required', options?: HdrMergeErrorOptions) {
		super('insufficient-input', message, options)
		this.name = 'InsufficientInputError'
	}
}

export class UnknownMergeError extends HdrMergeError {
	constructor(message: string, options?: HdrMergeErrorOptions) {
		super('unknown', message, options)
		this.name = 'UnknownMergeError'
	}
}

/**
 * Tagged outcome of a computation that may fail
 */
export type Result<T, E = HdrMergeError> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E }

export function isHdrMergeError(err: unknown): err is HdrMergeError {
	return err instanceof HdrMergeError
}

/**
 * Convert anything thrown into a tagged error
 * Tagged errors pass through; the rest become `unknown` with the original as cause
 */
export function toHdrMergeError(err: unknown): HdrMergeError {
	if (isHdrMergeError(err)) return err
	const message = err instanceof Error ? err.message : String(err)
	return new UnknownMergeError(message, { cause: err })
}
