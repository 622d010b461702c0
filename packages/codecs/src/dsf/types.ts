/**
 * DSF (DSD Stream File) types
 * 1-bit DSD audio format for high-resolution audio
 */

import type { ByteSource } from '@dsdsplit/core'

/**
 * DSF magic number: "DSD "
 */
export const DSF_MAGIC = 0x44534420

/**
 * Format chunk magic: "fmt "
 */
export const FMT_MAGIC = 0x666d7420

/**
 * Data chunk magic: "data"
 */
export const DATA_MAGIC = 0x64617461

/** DSD chunk: magic, size, total file size, metadata pointer */
export const DSD_CHUNK_SIZE = 28
/** fmt chunk including magic and size */
export const FMT_CHUNK_SIZE = 52
/** data chunk magic and size, before the sample bytes */
export const DATA_CHUNK_HEADER_SIZE = 12
/** Offset of the first sample byte */
export const DATA_OFFSET = DSD_CHUNK_SIZE + FMT_CHUNK_SIZE + DATA_CHUNK_HEADER_SIZE

/**
 * DSF format chunk
 */
export interface DsfFormatChunk {
	formatVersion: number // Always 1
	formatId: number // 0 = DSD raw
	channelType: number // 1=mono, 2=stereo, 3=3ch, 4=quad, 5=4ch, 6=5ch, 7=5.1ch
	channelNum: number // Number of channels (1-6)
	samplingFrequency: number // 2822400, 5644800, 11289600, or 22579200 Hz
	bitsPerSample: number // 1 for DSD
	sampleCount: number // Per channel
	blockSizePerChannel: number // Always 4096 in practice
	reserved: number
}

/**
 * Block interleave layout of a data region
 */
export interface DsfLayout {
	readonly channelCount: number
	readonly blockSizePerChannel: number
	/** Absolute offset of the data region in the source */
	readonly dataOffset: number
	/** Length of the data region in bytes */
	readonly dataSize: number
}

/**
 * Parsed DSF container
 * Header fields are owned by the descriptor; `data` is shared read-only by every extraction
 */
export interface DsfDescriptor extends DsfLayout {
	readonly format: Readonly<DsfFormatChunk>
	readonly samplingFrequency: number
	readonly bitsPerSample: number
	readonly totalSampleCount: number
	/** Total file size declared in the DSD chunk */
	readonly fileSize: number
	/** Offset of the trailing ID3v2 tag, 0 when absent */
	readonly metadataOffset: number
	readonly duration: number
	readonly data: ByteSource
}

/**
 * Bit numbering inside a byte
 * 'msb': earliest sample in the most significant bit
 */
export type BitOrder = 'msb' | 'lsb'

/**
 * Sample range of one channel, in that channel's deinterleaved bit space
 */
export interface BitRange {
	readonly channel: number
	readonly startBit: number
	/** endSample - startSample */
	readonly bitLength: number
}

/**
 * Byte-aligned bits of one channel: bit 0 of byte 0 is the first sample
 */
export interface ExtractedChannelStream {
	readonly channel: number
	readonly bitLength: number
	readonly bytes: Uint8Array
}

/**
 * Extraction options
 */
export interface DsfExtractOptions {
	bitOrder?: BitOrder // Default: 'msb'
}

/**
 * Text tags embedded as a trailing ID3v2 chunk
 */
export interface DsfTags {
	title?: string
	performer?: string
	album?: string
	trackNumber?: number
}

/**
 * DSD channel types
 */
export const DsfChannelType = {
	MONO: 1,
	STEREO: 2,
	THREE_CHANNEL: 3,
	QUAD: 4,
	FOUR_CHANNEL: 5,
	FIVE_CHANNEL: 6,
	FIVE_ONE: 7,
} as const

/**
 * Common DSD sample rates
 */
export const DsdSampleRate = {
	DSD64: 2822400, // 64 * 44100
	DSD128: 5644800, // 128 * 44100
	DSD256: 11289600, // 256 * 44100
	DSD512: 22579200, // 512 * 44100
} as const
