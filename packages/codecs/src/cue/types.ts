/**
 * CUE sheet types
 * CD track listing format
 */

import { SplitError } from '@dsdsplit/core'

/**
 * File type
 */
export type CueFileType =
	| 'BINARY'     // Binary file (little-endian)
	| 'MOTOROLA'   // Binary file (big-endian)
	| 'AIFF'       // AIFF audio file
	| 'WAVE'       // WAV audio file
	| 'MP3'        // MP3 audio file
	| (string & {}) // DSF sheets often say WAVE or BINARY, some tools write DSF

/**
 * Index entry
 */
export interface CueIndex {
	number: number
	time: CueTime
}

/**
 * CUE time format (MM:SS:FF - minutes:seconds:frames)
 * 75 frames per second
 */
export interface CueTime {
	minutes: number
	seconds: number
	frames: number
}

/**
 * Track entry as written in the sheet
 */
export interface CueTrack {
	number: number
	type: string
	title?: string
	performer?: string
	songwriter?: string
	isrc?: string
	pregap?: CueTime
	postgap?: CueTime
	indexes: CueIndex[]
	flags?: string[]
	/** 1-based line of the TRACK command */
	line: number
}

/**
 * File reference
 */
export interface CueFile {
	/** Undefined for tracks declared before any FILE line */
	filename?: string
	type: CueFileType
	tracks: CueTrack[]
}

/**
 * Complete CUE sheet
 */
export interface CueSheet {
	/** Album/disc title */
	title?: string
	/** Performer/artist */
	performer?: string
	/** Songwriter */
	songwriter?: string
	/** Catalog number (MCN/UPC) */
	catalog?: string
	/** CD-TEXT file */
	cdTextFile?: string
	/** Files with tracks */
	files: CueFile[]
	/** REM comments */
	comments: string[]
}

/**
 * Track ready for splitting. Immutable once parsed.
 */
export interface TrackEntry {
	readonly number: number
	readonly title?: string
	readonly performer?: string
	/** INDEX 01 */
	readonly start: CueTime
	/** MM*60 + SS + FF/75, full precision */
	readonly startSeconds: number
	/** FILE the track belongs to */
	readonly filename?: string
}

/**
 * Frames per second in CD audio
 */
export const CUE_FRAMES_PER_SECOND = 75

/**
 * Parse CUE time string to CueTime object
 * Throws InvalidTrackListFormat unless the string is MM:SS:FF with SS < 60 and FF < 75
 */
export function parseCueTime(time: string, line?: number): CueTime {
	const match = time.trim().match(/^(\d+):(\d{2}):(\d{2})$/)
	if (!match) {
		throw new SplitError('InvalidTrackListFormat', `Invalid CUE time "${time}"`, { line })
	}
	const result = {
		minutes: parseInt(match[1] ?? '', 10),
		seconds: parseInt(match[2] ?? '', 10),
		frames: parseInt(match[3] ?? '', 10),
	}
	if (result.seconds >= 60 || result.frames >= CUE_FRAMES_PER_SECOND) {
		throw new SplitError('InvalidTrackListFormat', `CUE time out of range "${time}"`, { line })
	}
	return result
}

/**
 * Format CueTime to string
 */
export function formatCueTime(time: CueTime): string {
	return (
		String(time.minutes).padStart(2, '0') + ':' +
		String(time.seconds).padStart(2, '0') + ':' +
		String(time.frames).padStart(2, '0')
	)
}

/**
 * Convert CueTime to seconds
 */
export function cueTimeToSeconds(time: CueTime): number {
	return time.minutes * 60 + time.seconds + time.frames / CUE_FRAMES_PER_SECOND
}

/**
 * Convert CueTime to a sample position at the given rate
 * Integer arithmetic on whole frames, so every DSD rate (a multiple of 75)
 * lands on an exact sample
 */
export function cueTimeToSamples(time: CueTime, samplingFrequency: number): number {
	const totalFrames = (time.minutes * 60 + time.seconds) * CUE_FRAMES_PER_SECOND + time.frames
	return Math.floor((totalFrames * samplingFrequency) / CUE_FRAMES_PER_SECOND)
}
