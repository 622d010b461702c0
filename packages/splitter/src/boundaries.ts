import { SplitError } from '@dsdsplit/core'
import { cueTimeToSamples, formatCueTime, type TrackEntry } from '@dsdsplit/codecs'

/**
 * Sample span of one track: [startSample, endSample)
 */
export interface TrackBoundary {
	readonly track: TrackEntry
	readonly startSample: number
	readonly endSample: number
}

/**
 * Map track start times onto the source's samples
 *
 * Each track ends where the next begins and the last one ends at the
 * source's final sample. The first track starts at sample 0 and later starts
 * are strictly increasing and inside the source, so the tracks cover every sample.
 */
export function computeBoundaries(
	tracks: readonly TrackEntry[],
	samplingFrequency: number,
	totalSampleCount: number
): TrackBoundary[] {
	const starts = tracks.map(track => cueTimeToSamples(track.start, samplingFrequency))

	const first = tracks[0]
	if (first && starts[0] !== 0) {
		throw new SplitError(
			'TrackBoundaryError',
			`First track starts at ${formatCueTime(first.start)} (sample ${starts[0]}), leaving samples before it uncovered`,
			{ trackNumber: first.number }
		)
	}

	return tracks.map((track, i) => {
		const startSample = starts[i] ?? 0
		const endSample = starts[i + 1] ?? totalSampleCount

		if (startSample >= totalSampleCount) {
			throw new SplitError(
				'TrackBoundaryError',
				`Track starts at ${formatCueTime(track.start)} (sample ${startSample}), past the source's ${totalSampleCount} samples`,
				{ trackNumber: track.number }
			)
		}
		if (endSample <= startSample) {
			throw new SplitError(
				'TrackBoundaryError',
				`Next track starts at sample ${endSample}, not after this track's start ${startSample}`,
				{ trackNumber: track.number }
			)
		}

		return { track, startSample, endSample }
	})
}
