import { describe, expect, it } from 'vitest'
import { SplitError } from '@dsdsplit/core'
import { parseTrackList, type TrackEntry } from '@dsdsplit/codecs'
import { computeBoundaries } from './boundaries'

function tracksAt(...times: string[]): TrackEntry[] {
	const text = times.map((time, i) => `TRACK ${i + 1} AUDIO\nINDEX 01 ${time}`).join('\n')
	return parseTrackList(text)
}

function catchSplitError(fn: () => unknown): SplitError {
	try {
		fn()
	} catch (error) {
		if (error instanceof SplitError) return error
		throw error
	}
	throw new Error('expected a SplitError')
}

describe('computeBoundaries', () => {
	it('should resolve INDEX 01 00:01:00 at DSD64 to sample 2822400', () => {
		const boundaries = computeBoundaries(tracksAt('00:00:00', '00:01:00'), 2822400, 2822400 * 3)
		expect(boundaries[1]?.startSample).toBe(2822400)
	})

	it('should chain tracks and end at the total sample count', () => {
		const boundaries = computeBoundaries(tracksAt('00:00:00', '00:00:01', '00:02:30'), 2822400, 2822400 * 200)

		expect(boundaries.map(b => [b.startSample, b.endSample])).toEqual([
			[0, 37632],
			[37632, 150 * 2822400],
			[150 * 2822400, 200 * 2822400],
		])
	})

	it('should partition the source for assorted track lists', () => {
		const total = 5644800 * 600
		const lists = [
			['00:00:00'],
			['00:00:00', '00:00:01', '00:00:02'],
			['00:00:00', '03:12:44', '07:59:74', '09:00:01'],
		]

		for (const times of lists) {
			const boundaries = computeBoundaries(tracksAt(...times), 5644800, total)
			for (let i = 0; i + 1 < boundaries.length; i++) {
				expect(boundaries[i + 1]?.startSample).toBe(boundaries[i]?.endSample)
			}
			expect(boundaries[boundaries.length - 1]?.endSample).toBe(total)
			expect(boundaries.every(b => b.endSample > b.startSample)).toBe(true)
		}
	})

	it('should keep the track entries', () => {
		const tracks = tracksAt('00:00:00', '00:00:10')
		const boundaries = computeBoundaries(tracks, 2822400, 2822400)
		expect(boundaries.map(b => b.track)).toEqual(tracks)
	})

	it('should reject a start past the end of the source', () => {
		const error = catchSplitError(() => computeBoundaries(tracksAt('00:00:00', '00:02:00'), 2822400, 2822400 * 60))
		expect(error.kind).toBe('TrackBoundaryError')
		expect(error.context.trackNumber).toBe(2)
	})

	it('should reject a start exactly at the end of the source', () => {
		const error = catchSplitError(() => computeBoundaries(tracksAt('00:00:00', '00:01:00'), 2822400, 2822400))
		expect(error.context.trackNumber).toBe(2)
	})

	it('should reject a first track that starts after the beginning', () => {
		const error = catchSplitError(() => computeBoundaries(tracksAt('00:00:10', '00:00:40'), 900, 900))
		expect(error.kind).toBe('TrackBoundaryError')
		expect(error.context.trackNumber).toBe(1)
	})

	it('should reject a first track one frame late', () => {
		const error = catchSplitError(() => computeBoundaries(tracksAt('00:00:01'), 2822400, 2822400 * 60))
		expect(error.kind).toBe('TrackBoundaryError')
		expect(error.context.trackNumber).toBe(1)
	})

	it('should reject overlapping and empty tracks', () => {
		const overlap = catchSplitError(() =>
			computeBoundaries(tracksAt('00:00:00', '00:00:10', '00:00:05'), 2822400, 2822400 * 60)
		)
		expect(overlap.kind).toBe('TrackBoundaryError')
		expect(overlap.context.trackNumber).toBe(2)

		const empty = catchSplitError(() =>
			computeBoundaries(tracksAt('00:00:00', '00:00:10', '00:00:10'), 2822400, 2822400 * 60)
		)
		expect(empty.context.trackNumber).toBe(2)
	})
})
