import { SplitError } from './errors'

/**
 * Random-access, read-only byte source
 * Lets readers address large files without loading them whole
 */
export interface ByteSource {
	/** Total length in bytes */
	readonly size: number
	/**
	 * Read exactly `length` bytes at `offset`
	 * Throws IOReadError if the range is not fully available
	 */
	read(offset: number, length: number): Uint8Array
}

/**
 * ByteSource over an in-memory buffer
 */
export function bufferSource(data: Uint8Array): ByteSource {
	return {
		size: data.length,
		read(offset: number, length: number): Uint8Array {
			if (offset < 0 || length < 0 || offset + length > data.length) {
				throw new SplitError('IOReadError', `Read of ${length} bytes past end of ${data.length}-byte source`, {
					byteOffset: offset,
				})
			}
			return data.subarray(offset, offset + length)
		},
	}
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(arrays: readonly Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0)
	const result = new Uint8Array(totalLength)
	let offset = 0
	for (const arr of arrays) {
		result.set(arr, offset)
		offset += arr.length
	}
	return result
}
