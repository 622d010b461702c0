/**
 * DSF (DSD Stream File) encoder
 * Rebuilds a container around per-channel bitstreams
 */

import { concatBytes, SplitError } from '@dsdsplit/core'
import { encodeId3v2 } from './id3'
import {
	DATA_CHUNK_HEADER_SIZE,
	DATA_OFFSET,
	DSD_CHUNK_SIZE,
	FMT_CHUNK_SIZE,
	type DsfFormatChunk,
	type DsfTags,
	type ExtractedChannelStream,
} from './types'

/**
 * Encode channel streams to a complete DSF file
 */
export function encodeDsf(
	format: Readonly<DsfFormatChunk>,
	streams: readonly ExtractedChannelStream[],
	tags?: DsfTags
): Uint8Array {
	return concatBytes(encodeDsfChunks(format, streams, tags))
}

/**
 * Encode channel streams as [header, sample data, tag] so callers can
 * write large files without another full copy
 *
 * Channel type, channel count, sampling frequency, block size and the
 * reserved field come from `format`; the sample count is the streams' bit length.
 */
export function encodeDsfChunks(
	format: Readonly<DsfFormatChunk>,
	streams: readonly ExtractedChannelStream[],
	tags?: DsfTags
): Uint8Array[] {
	const bitLength = checkStreams(format, streams)
	const dsdData = interleaveBlocks(streams, format.blockSizePerChannel)
	const tag = tags ? encodeId3v2(tags) : new Uint8Array(0)

	const header = new Uint8Array(DATA_OFFSET)
	buildDsdChunk(header, dsdData.length, tag.length)
	buildFormatChunk(header, format, bitLength)
	buildDataChunkHeader(header, dsdData.length)

	return tag.length > 0 ? [header, dsdData, tag] : [header, dsdData]
}

/**
 * All channels must be present and carry the same number of bits
 */
function checkStreams(format: Readonly<DsfFormatChunk>, streams: readonly ExtractedChannelStream[]): number {
	if (streams.length !== format.channelNum) {
		throw new SplitError(
			'IncompatibleChannelLengths',
			`Expected ${format.channelNum} channel streams, got ${streams.length}`
		)
	}

	const bitLength = streams[0]?.bitLength ?? 0
	for (const stream of streams) {
		if (stream.bitLength !== bitLength) {
			throw new SplitError(
				'IncompatibleChannelLengths',
				`Channel ${stream.channel} has ${stream.bitLength} bits, channel ${streams[0]?.channel} has ${bitLength}`
			)
		}
		if (stream.bytes.length !== Math.ceil(bitLength / 8)) {
			throw new SplitError(
				'IncompatibleChannelLengths',
				`Channel ${stream.channel} holds ${stream.bytes.length} bytes for ${bitLength} bits`
			)
		}
	}

	return bitLength
}

/**
 * Cut each stream into blocks and interleave them block by block
 * The last block of each channel is zero-padded
 */
function interleaveBlocks(streams: readonly ExtractedChannelStream[], blockSize: number): Uint8Array {
	const channels = streams.length
	const streamBytes = streams[0]?.bytes.length ?? 0
	const numBlocks = Math.ceil(streamBytes / blockSize)
	const dsdData = new Uint8Array(numBlocks * blockSize * channels)

	for (let block = 0; block < numBlocks; block++) {
		const start = block * blockSize
		const end = Math.min(start + blockSize, streamBytes)
		for (let ch = 0; ch < channels; ch++) {
			const bytes = streams[ch]?.bytes ?? new Uint8Array(0)
			dsdData.set(bytes.subarray(start, end), (block * channels + ch) * blockSize)
		}
	}

	return dsdData
}

/**
 * Build DSD chunk header
 */
function buildDsdChunk(header: Uint8Array, dataSize: number, tagSize: number): void {
	let offset = 0

	// Magic "DSD " (written as ASCII bytes)
	header[offset++] = 0x44 // 'D'
	header[offset++] = 0x53 // 'S'
	header[offset++] = 0x44 // 'D'
	header[offset++] = 0x20 // ' '

	// Chunk size (always 28)
	writeU64LE(header, offset, DSD_CHUNK_SIZE)
	offset += 8

	// Total file size (DSD + fmt + data + metadata)
	writeU64LE(header, offset, DATA_OFFSET + dataSize + tagSize)
	offset += 8

	// Metadata pointer (0 = no metadata)
	writeU64LE(header, offset, tagSize > 0 ? DATA_OFFSET + dataSize : 0)
}

/**
 * Build format chunk
 */
function buildFormatChunk(header: Uint8Array, format: Readonly<DsfFormatChunk>, sampleCount: number): void {
	let offset = DSD_CHUNK_SIZE

	// Magic "fmt " (written as ASCII bytes)
	header[offset++] = 0x66 // 'f'
	header[offset++] = 0x6d // 'm'
	header[offset++] = 0x74 // 't'
	header[offset++] = 0x20 // ' '

	// Chunk size (always 52)
	writeU64LE(header, offset, FMT_CHUNK_SIZE)
	offset += 8

	// Format version (always 1)
	writeU32LE(header, offset, 1)
	offset += 4

	// Format ID (0 = DSD raw)
	writeU32LE(header, offset, 0)
	offset += 4

	writeU32LE(header, offset, format.channelType)
	offset += 4

	writeU32LE(header, offset, format.channelNum)
	offset += 4

	writeU32LE(header, offset, format.samplingFrequency)
	offset += 4

	// Bits per sample (always 1 for DSD)
	writeU32LE(header, offset, 1)
	offset += 4

	// Sample count (per channel)
	writeU64LE(header, offset, sampleCount)
	offset += 8

	writeU32LE(header, offset, format.blockSizePerChannel)
	offset += 4

	writeU32LE(header, offset, format.reserved)
}

/**
 * Build data chunk header
 */
function buildDataChunkHeader(header: Uint8Array, dataSize: number): void {
	let offset = DSD_CHUNK_SIZE + FMT_CHUNK_SIZE

	// Magic "data" (written as ASCII bytes)
	header[offset++] = 0x64 // 'd'
	header[offset++] = 0x61 // 'a'
	header[offset++] = 0x74 // 't'
	header[offset++] = 0x61 // 'a'

	// Chunk size includes its own 12-byte header
	writeU64LE(header, offset, DATA_CHUNK_HEADER_SIZE + dataSize)
}

// Binary helpers
function writeU32LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
	data[offset + 2] = (value >> 16) & 0xff
	data[offset + 3] = (value >> 24) & 0xff
}

function writeU64LE(data: Uint8Array, offset: number, value: number): void {
	const big = BigInt(value)
	writeU32LE(data, offset, Number(big & 0xffffffffn))
	writeU32LE(data, offset + 4, Number(big >> 32n))
}
