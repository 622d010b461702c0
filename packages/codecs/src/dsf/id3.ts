/**
 * Minimal ID3v2.4 writer for the DSF metadata chunk
 * Text frames only, UTF-8
 */

import { concatBytes } from '@dsdsplit/core'
import type { DsfTags } from './types'

const ID3_HEADER_SIZE = 10
const ID3_FRAME_HEADER_SIZE = 10

/**
 * Encode tags; returns an empty array when there is nothing to write
 */
export function encodeId3v2(tags: DsfTags): Uint8Array {
	const frames: Uint8Array[] = []

	const textFrames: Array<[string, string | undefined]> = [
		['TIT2', tags.title],
		['TPE1', tags.performer],
		['TALB', tags.album],
		['TRCK', tags.trackNumber === undefined ? undefined : String(tags.trackNumber)],
	]
	for (const [frameId, value] of textFrames) {
		if (value) frames.push(encodeTextFrame(frameId, value))
	}

	if (frames.length === 0) return new Uint8Array(0)

	const body = concatBytes(frames)
	const header = new Uint8Array(ID3_HEADER_SIZE)
	header[0] = 0x49 // 'I'
	header[1] = 0x44 // 'D'
	header[2] = 0x33 // '3'
	header[3] = 0x04 // version
	header[4] = 0x00 // revision
	header[5] = 0x00 // flags
	writeSynchsafe(header, 6, body.length)

	return concatBytes([header, body])
}

/**
 * Write ID3v2 text frame
 */
function encodeTextFrame(frameId: string, text: string): Uint8Array {
	const textData = new TextEncoder().encode(text)
	const frameSize = 1 + textData.length // 1 byte for encoding
	const frame = new Uint8Array(ID3_FRAME_HEADER_SIZE + frameSize)

	for (let i = 0; i < 4; i++) {
		frame[i] = frameId.charCodeAt(i)
	}

	// Frame size is synchsafe in ID3v2.4
	writeSynchsafe(frame, 4, frameSize)

	// Frame flags (2 bytes) stay zero

	// Text encoding (3 = UTF-8)
	frame[10] = 0x03
	frame.set(textData, 11)

	return frame
}

function writeSynchsafe(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >> 21) & 0x7f
	data[offset + 1] = (value >> 14) & 0x7f
	data[offset + 2] = (value >> 7) & 0x7f
	data[offset + 3] = value & 0x7f
}
