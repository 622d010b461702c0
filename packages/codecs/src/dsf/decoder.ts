/**
 * DSF (DSD Stream File) container reader
 * Parses the header chunks; sample data stays in the source
 */

import { bufferSource, SplitError, type ByteSource } from '@dsdsplit/core'
import {
	DATA_CHUNK_HEADER_SIZE,
	DATA_MAGIC,
	DATA_OFFSET,
	DSD_CHUNK_SIZE,
	DSF_MAGIC,
	FMT_CHUNK_SIZE,
	FMT_MAGIC,
	type DsfDescriptor,
	type DsfFormatChunk,
} from './types'

/**
 * Check if data is DSF
 */
export function isDsf(data: Uint8Array): boolean {
	if (data.length < 4) return false
	return data[0] === 0x44 && data[1] === 0x53 && data[2] === 0x44 && data[3] === 0x20 // "DSD "
}

/**
 * Parse DSF header into a descriptor over the source
 */
export function parseDsf(input: ByteSource | Uint8Array): DsfDescriptor {
	const source = input instanceof Uint8Array ? bufferSource(input) : input

	if (source.size < DATA_OFFSET) {
		throw invalid(`file is ${source.size} bytes, shorter than the ${DATA_OFFSET}-byte header`, 0)
	}
	const reader = new DsfReader(source.read(0, DATA_OFFSET))

	// DSD chunk
	if (reader.readU32BE() !== DSF_MAGIC) {
		throw invalid('missing DSD magic', 0)
	}
	if (reader.readSize() !== DSD_CHUNK_SIZE) {
		throw invalid('DSD chunk size is not 28', 4)
	}
	const fileSize = reader.readSize()
	const metadataOffset = reader.readSize()

	// fmt chunk
	if (reader.readU32BE() !== FMT_MAGIC) {
		throw invalid('missing fmt chunk', DSD_CHUNK_SIZE)
	}
	const format = parseFormatChunk(reader)

	// data chunk header
	if (reader.readU32BE() !== DATA_MAGIC) {
		throw invalid('missing data chunk', DSD_CHUNK_SIZE + FMT_CHUNK_SIZE)
	}
	const dataChunkSize = reader.readSize()
	if (dataChunkSize < DATA_CHUNK_HEADER_SIZE) {
		throw invalid(`data chunk size ${dataChunkSize} is smaller than its header`, DSD_CHUNK_SIZE + FMT_CHUNK_SIZE + 4)
	}
	const dataSize = dataChunkSize - DATA_CHUNK_HEADER_SIZE
	if (DATA_OFFSET + dataSize > source.size) {
		throw invalid(`data chunk of ${dataSize} bytes runs past the end of the file`, source.size)
	}

	return {
		format,
		channelCount: format.channelNum,
		samplingFrequency: format.samplingFrequency,
		bitsPerSample: format.bitsPerSample,
		totalSampleCount: format.sampleCount,
		blockSizePerChannel: format.blockSizePerChannel,
		dataOffset: DATA_OFFSET,
		dataSize,
		fileSize,
		metadataOffset,
		duration: format.sampleCount / format.samplingFrequency,
		data: source,
	}
}

/**
 * Parse format chunk (after its magic)
 */
function parseFormatChunk(reader: DsfReader): DsfFormatChunk {
	const chunkSize = reader.readSize()
	if (chunkSize !== FMT_CHUNK_SIZE) {
		throw invalid(`fmt chunk size is ${chunkSize}, expected 52`, DSD_CHUNK_SIZE + 4)
	}

	const formatVersion = reader.readU32LE()
	const formatId = reader.readU32LE()
	const channelType = reader.readU32LE()
	const channelNum = reader.readU32LE()
	const samplingFrequency = reader.readU32LE()
	const bitsPerSample = reader.readU32LE()
	const sampleCount = reader.readSize()
	const blockSizePerChannel = reader.readU32LE()
	const reserved = reader.readU32LE()

	if (formatVersion !== 1) {
		throw invalid(`unsupported format version ${formatVersion}`, DSD_CHUNK_SIZE + 12)
	}

	if (formatId !== 0) {
		throw invalid(`format ID ${formatId} is not raw DSD (DST is not supported)`, DSD_CHUNK_SIZE + 16)
	}

	if (channelNum < 1 || samplingFrequency === 0 || blockSizePerChannel === 0) {
		throw invalid('channel count, sampling frequency and block size must be positive', DSD_CHUNK_SIZE + 24)
	}

	if (bitsPerSample !== 1) {
		throw new SplitError('UnsupportedBitDepth', `Only 1-bit DSD is supported, got ${bitsPerSample} bits per sample`, {
			byteOffset: DSD_CHUNK_SIZE + 32,
		})
	}

	return {
		formatVersion,
		formatId,
		channelType,
		channelNum,
		samplingFrequency,
		bitsPerSample,
		sampleCount,
		blockSizePerChannel,
		reserved,
	}
}

function invalid(reason: string, byteOffset: number): SplitError {
	return new SplitError('NotAValidContainer', `Invalid DSF: ${reason}`, { byteOffset })
}

/**
 * Byte reader helper
 */
class DsfReader {
	private data: Uint8Array
	private position: number = 0

	constructor(data: Uint8Array) {
		this.data = data
	}

	readU32LE(): number {
		const v =
			this.data[this.position] |
			(this.data[this.position + 1] << 8) |
			(this.data[this.position + 2] << 16) |
			(this.data[this.position + 3] << 24)
		this.position += 4
		return v >>> 0
	}

	readU32BE(): number {
		const v =
			(this.data[this.position] << 24) |
			(this.data[this.position + 1] << 16) |
			(this.data[this.position + 2] << 8) |
			this.data[this.position + 3]
		this.position += 4
		return v >>> 0
	}

	readU64LE(): bigint {
		const low = this.readU32LE()
		const high = this.readU32LE()
		return (BigInt(high) << 32n) | BigInt(low)
	}

	/**
	 * u64 size or count, which must fit a JS number
	 */
	readSize(): number {
		const offset = this.position
		const value = this.readU64LE()
		if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
			throw invalid(`64-bit field ${value} is too large`, offset)
		}
		return Number(value)
	}
}
