/**
 * Split error taxonomy
 * Every failure the splitter reports carries one of these kinds
 */

/**
 * Error kinds
 */
export type SplitErrorKind =
	| 'InvalidTrackListFormat' // Malformed CUE syntax
	| 'MissingStartIndex' // Track without INDEX 01
	| 'NotAValidContainer' // Magic or chunk structure mismatch
	| 'UnsupportedBitDepth' // bitsPerSample != 1
	| 'TrackBoundaryError' // Range past the source, or overlapping/empty tracks
	| 'IncompatibleChannelLengths' // Channels disagree on bit length
	| 'OutputExists' // Target exists and overwrite is off
	| 'IOReadError'
	| 'IOWriteError'

/**
 * Where an error happened
 */
export interface SplitErrorContext {
	trackNumber?: number
	byteOffset?: number
	path?: string
	/** 1-based line in the track list */
	line?: number
}

/**
 * Error raised by codecs and reported by the driver
 */
export class SplitError extends Error {
	readonly kind: SplitErrorKind
	readonly context: SplitErrorContext

	constructor(kind: SplitErrorKind, message: string, context: SplitErrorContext = {}, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause })
		this.name = 'SplitError'
		this.kind = kind
		this.context = context
	}

	/**
	 * Copy with extra context (e.g. the track number once known)
	 */
	withContext(context: SplitErrorContext): SplitError {
		return new SplitError(this.kind, this.message, { ...this.context, ...context }, this.cause)
	}
}

/**
 * Narrow unknown to SplitError
 */
export function isSplitError(error: unknown): error is SplitError {
	return error instanceof SplitError
}

/**
 * Wrap any thrown value into a SplitError of the given kind
 */
export function toSplitError(error: unknown, kind: SplitErrorKind, context: SplitErrorContext = {}): SplitError {
	if (isSplitError(error)) {
		return error.withContext(context)
	}
	const message = error instanceof Error ? error.message : String(error)
	return new SplitError(kind, message, context, error)
}

/**
 * Human-readable one-liner for the presentation layer
 */
export function describeSplitError(error: SplitError): string {
	const parts: string[] = []
	const { trackNumber, byteOffset, path, line } = error.context
	if (trackNumber !== undefined) parts.push(`track ${String(trackNumber).padStart(2, '0')}`)
	if (line !== undefined) parts.push(`line ${line}`)
	if (byteOffset !== undefined) parts.push(`byte ${byteOffset}`)
	if (path !== undefined) parts.push(path)
	const where = parts.length > 0 ? ` (${parts.join(', ')})` : ''
	return `${error.kind}: ${error.message}${where}`
}
