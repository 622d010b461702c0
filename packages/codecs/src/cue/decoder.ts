/**
 * CUE sheet decoder
 * Parses CD track listing files into tracks with start times
 */

import { SplitError } from '@dsdsplit/core'
import {
	cueTimeToSeconds,
	parseCueTime,
	type CueFile,
	type CueSheet,
	type CueTrack,
	type TrackEntry,
} from './types'

/**
 * Decode CUE sheet
 * Unknown commands are ignored; malformed arguments of known ones throw InvalidTrackListFormat
 */
export function decodeCue(data: Uint8Array | string): CueSheet {
	const lines = decodeText(data).split(/\r?\n/)

	const sheet: CueSheet = {
		files: [],
		comments: [],
	}

	let currentFile: CueFile | null = null
	let currentTrack: CueTrack | null = null

	for (let i = 0; i < lines.length; i++) {
		const line = i + 1
		const trimmed = lines[i]?.trim() ?? ''
		if (!trimmed) continue

		const command = trimmed.split(/\s+/)[0]?.toUpperCase()

		switch (command) {
			case 'REM':
				sheet.comments.push(trimmed.slice(4).trim())
				break

			case 'TITLE':
				if (currentTrack) {
					currentTrack.title = extractQuoted(trimmed.slice(5))
				} else {
					sheet.title = extractQuoted(trimmed.slice(5))
				}
				break

			case 'PERFORMER':
				if (currentTrack) {
					currentTrack.performer = extractQuoted(trimmed.slice(9))
				} else {
					sheet.performer = extractQuoted(trimmed.slice(9))
				}
				break

			case 'SONGWRITER':
				if (currentTrack) {
					currentTrack.songwriter = extractQuoted(trimmed.slice(10))
				} else {
					sheet.songwriter = extractQuoted(trimmed.slice(10))
				}
				break

			case 'CATALOG':
				sheet.catalog = trimmed.slice(7).trim()
				break

			case 'CDTEXTFILE':
				sheet.cdTextFile = extractQuoted(trimmed.slice(10))
				break

			case 'FILE': {
				const fileMatch = trimmed.match(/^FILE\s+(?:"([^"]+)"|([^"\s]+))(?:\s+(\S+))?\s*$/i)
				if (!fileMatch) {
					throw new SplitError('InvalidTrackListFormat', `Malformed FILE line: ${trimmed}`, { line })
				}
				currentFile = {
					filename: fileMatch[1] ?? fileMatch[2],
					type: fileMatch[3]?.toUpperCase() ?? 'BINARY',
					tracks: [],
				}
				sheet.files.push(currentFile)
				currentTrack = null
				break
			}

			case 'TRACK': {
				const trackMatch = trimmed.match(/^TRACK\s+(\d+)(?:\s+(\S+))?\s*$/i)
				const number = trackMatch ? parseInt(trackMatch[1] ?? '', 10) : 0
				if (!trackMatch || number < 1) {
					throw new SplitError('InvalidTrackListFormat', `Malformed TRACK line: ${trimmed}`, { line })
				}

				if (!currentFile) {
					currentFile = { type: 'BINARY', tracks: [] }
					sheet.files.push(currentFile)
				}

				currentTrack = {
					number,
					type: trackMatch[2]?.toUpperCase() ?? 'AUDIO',
					indexes: [],
					line,
				}
				currentFile.tracks.push(currentTrack)
				break
			}

			case 'INDEX': {
				const indexMatch = trimmed.match(/^INDEX\s+(\d+)\s+(\S+)\s*$/i)
				if (!indexMatch || !currentTrack) {
					throw new SplitError('InvalidTrackListFormat', `Malformed INDEX line: ${trimmed}`, { line })
				}
				currentTrack.indexes.push({
					number: parseInt(indexMatch[1] ?? '', 10),
					time: parseCueTime(indexMatch[2] ?? '', line),
				})
				break
			}

			case 'PREGAP':
			case 'POSTGAP': {
				if (!currentTrack) break
				const time = parseCueTime(trimmed.slice(command.length), line)
				if (command === 'PREGAP') {
					currentTrack.pregap = time
				} else {
					currentTrack.postgap = time
				}
				break
			}

			case 'ISRC': {
				if (!currentTrack) break
				currentTrack.isrc = trimmed.slice(4).trim()
				break
			}

			case 'FLAGS': {
				if (!currentTrack) break
				currentTrack.flags = trimmed.slice(5).trim().split(/\s+/).map(f => f.toUpperCase())
				break
			}
		}
	}

	return sheet
}

/**
 * Flatten a sheet into split-ready tracks, in document order
 * Track numbers must ascend; every track needs INDEX 01
 */
export function getTrackEntries(sheet: CueSheet): TrackEntry[] {
	const entries: TrackEntry[] = []
	let previous = 0

	for (const file of sheet.files) {
		for (const track of file.tracks) {
			if (track.number <= previous) {
				throw new SplitError(
					'InvalidTrackListFormat',
					`Track ${track.number} does not follow track ${previous}`,
					{ trackNumber: track.number, line: track.line }
				)
			}
			previous = track.number

			// INDEX 01 is the track start (INDEX 00 is pregap)
			const index01 = track.indexes.find(i => i.number === 1)
			if (!index01) {
				throw new SplitError('MissingStartIndex', `Track ${track.number} has no INDEX 01`, {
					trackNumber: track.number,
					line: track.line,
				})
			}

			entries.push({
				number: track.number,
				title: track.title,
				performer: track.performer ?? sheet.performer,
				start: index01.time,
				startSeconds: cueTimeToSeconds(index01.time),
				filename: file.filename,
			})
		}
	}

	if (entries.length === 0) {
		throw new SplitError('InvalidTrackListFormat', 'Track list declares no tracks')
	}

	return entries
}

/**
 * Parse a track list into ordered track entries
 */
export function parseTrackList(data: Uint8Array | string): TrackEntry[] {
	return getTrackEntries(decodeCue(data))
}

function decodeText(data: Uint8Array | string): string {
	// TextDecoder drops the BOM itself
	if (typeof data !== 'string') return new TextDecoder().decode(data)
	return data.charCodeAt(0) === 0xfeff ? data.slice(1) : data
}

/**
 * Extract quoted string or unquoted value
 */
function extractQuoted(str: string): string {
	const trimmed = str.trim()
	if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
		return trimmed.slice(1, -1)
	}
	return trimmed
}
