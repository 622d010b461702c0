/**
 * DSF bit-range extraction
 *
 * The data region interleaves fixed-size blocks: block b of channel c sits at
 * (b * channelCount + c) * blockSizePerChannel. A channel's samples are one
 * logical bitstream spread over its blocks. Extraction gathers the bytes that
 * cover a sample range, in address order, then shifts them so the first sample
 * lands on bit 0 of byte 0.
 */

import { SplitError } from '@dsdsplit/core'
import type { BitOrder, BitRange, DsfDescriptor, DsfExtractOptions, DsfLayout, ExtractedChannelStream } from './types'

/**
 * Locate a sample of one channel
 * byteOffset is relative to the data region; bit counts from the first-sample end of the byte
 */
export function sampleAddress(layout: DsfLayout, channel: number, sample: number): { byteOffset: number; bit: number } {
	const bitsPerBlock = layout.blockSizePerChannel * 8
	const blockIndex = Math.floor(sample / bitsPerBlock)
	const bitOffsetInBlock = sample % bitsPerBlock
	return {
		byteOffset:
			(blockIndex * layout.channelCount + channel) * layout.blockSizePerChannel + Math.floor(bitOffsetInBlock / 8),
		bit: bitOffsetInBlock % 8,
	}
}

/**
 * Bit range of [startSample, endSample) in one channel (1 bit per sample)
 */
export function bitRangeFor(channel: number, startSample: number, endSample: number): BitRange {
	if (endSample < startSample) {
		throw new SplitError('TrackBoundaryError', `Sample range ${startSample}..${endSample} is reversed`)
	}
	return { channel, startBit: startSample, bitLength: endSample - startSample }
}

/**
 * Extract one channel's bit range as a byte-aligned stream
 */
export function extractChannel(
	descriptor: DsfDescriptor,
	range: BitRange,
	options: DsfExtractOptions = {}
): ExtractedChannelStream {
	const { bitOrder = 'msb' } = options
	const { channel, startBit, bitLength } = range

	if (channel < 0 || channel >= descriptor.channelCount) {
		throw new SplitError('TrackBoundaryError', `Channel ${channel} does not exist (${descriptor.channelCount} channels)`)
	}
	if (startBit < 0 || startBit + bitLength > descriptor.totalSampleCount) {
		throw new SplitError(
			'TrackBoundaryError',
			`Samples ${startBit}..${startBit + bitLength} exceed the source's ${descriptor.totalSampleCount} samples`
		)
	}

	const outLength = Math.ceil(bitLength / 8)
	if (outLength === 0) {
		return { channel, bitLength, bytes: new Uint8Array(0) }
	}

	const k = startBit % 8
	const src = readChannelBytes(descriptor, channel, Math.floor(startBit / 8), Math.ceil((k + bitLength) / 8))
	const bytes = k === 0 ? src : shiftMerge(src, k, outLength, bitOrder)

	// Zero the unused tail of the last byte
	const rem = bitLength % 8
	if (rem > 0) {
		bytes[outLength - 1] &= bitOrder === 'msb' ? (0xff << (8 - rem)) & 0xff : (1 << rem) - 1
	}

	return { channel, bitLength, bytes }
}

/**
 * Extract [startSample, endSample) from every channel
 */
export function extractSamples(
	descriptor: DsfDescriptor,
	startSample: number,
	endSample: number,
	options: DsfExtractOptions = {}
): ExtractedChannelStream[] {
	const streams: ExtractedChannelStream[] = []
	for (let ch = 0; ch < descriptor.channelCount; ch++) {
		streams.push(extractChannel(descriptor, bitRangeFor(ch, startSample, endSample), options))
	}
	return streams
}

/**
 * Copy `count` logical bytes of a channel, starting at logical byte `first`,
 * one contiguous block run at a time
 */
function readChannelBytes(descriptor: DsfDescriptor, channel: number, first: number, count: number): Uint8Array {
	const { blockSizePerChannel: blockSize, dataOffset, dataSize } = descriptor
	const output = new Uint8Array(count)

	let logical = first
	let filled = 0
	while (filled < count) {
		const run = Math.min(blockSize - (logical % blockSize), count - filled)
		const address = sampleAddress(descriptor, channel, logical * 8).byteOffset

		if (address + run > dataSize) {
			throw new SplitError('TrackBoundaryError', `Channel ${channel} data ends before the requested range`, {
				byteOffset: dataOffset + Math.max(address, dataSize),
			})
		}

		output.set(descriptor.data.read(dataOffset + address, run), filled)
		filled += run
		logical += run
	}

	return output
}

/**
 * Shift bytes left by k bits across byte boundaries
 */
function shiftMerge(src: Uint8Array, k: number, outLength: number, bitOrder: BitOrder): Uint8Array {
	const out = new Uint8Array(outLength)
	for (let i = 0; i < outLength; i++) {
		const next = i + 1 < src.length ? src[i + 1] : 0
		out[i] =
			bitOrder === 'msb'
				? ((src[i] << k) | (next >> (8 - k))) & 0xff
				: ((src[i] >> k) | (next << (8 - k))) & 0xff
	}
	return out
}
