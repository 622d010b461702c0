/**
 * Split driver
 *
 * A run has two phases. Planning reads the track list, opens and parses every
 * source and computes all boundaries; any failure there ends the run before a
 * file is written. Writing then extracts, encodes and writes each track on its
 * own, so one track's failure never touches another's output.
 */

import { mkdir, open, readFile, rm, type FileHandle } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import {
	attempt,
	attemptAsync,
	err,
	ok,
	SplitError,
	toSplitError,
	type Result,
} from '@dsdsplit/core'
import {
	decodeCue,
	encodeDsfChunks,
	extractSamples,
	getTrackEntries,
	parseDsf,
	type CueSheet,
	type DsfDescriptor,
	type DsfTags,
	type TrackEntry,
} from '@dsdsplit/codecs'
import { computeBoundaries, type TrackBoundary } from './boundaries'
import {
	resolveCueSheetOptions,
	resolveSplitOptions,
	type CueSheetOptionsInput,
	type SplitOptions,
	type SplitOptionsInput,
} from './config'
import { FileSource } from './fileSource'
import { logger as defaultLogger, type Logger } from './logger'
import { trackFileName } from './naming'

/**
 * Track list given by path or as text
 */
export type TrackListInput = { readonly path: string } | { readonly text: string }

export type TrackStatus = 'written' | 'failed' | 'skipped'

/**
 * Outcome of one track
 */
export interface TrackResult {
	readonly trackNumber: number
	readonly title?: string
	readonly outputPath: string
	readonly startSample: number
	readonly endSample: number
	readonly status: TrackStatus
	readonly error?: SplitError
}

interface SourceGroup {
	readonly sourcePath: string
	readonly tracks: readonly TrackEntry[]
}

interface TrackJob {
	readonly boundary: TrackBoundary
	readonly descriptor: DsfDescriptor
	readonly outputPath: string
	readonly album?: string
}

/**
 * Split one source container along a track list
 * Every track in the list is taken from `sourcePath`, whatever FILE it names.
 * The output directory is only taken from the argument; an outputDirectory
 * option is rejected as unknown.
 */
export async function split(
	trackList: TrackListInput,
	sourcePath: string,
	outputDirectory: string,
	options: SplitOptionsInput = {}
): Promise<Result<TrackResult[]>> {
	const opts = resolveSplitOptions(options, defaultLogger)

	const sheet = await loadTrackList(trackList)
	if (!sheet.ok) return sheet

	return runSplit([{ sourcePath, tracks: sheet.value.tracks }], outputDirectory, sheet.value.sheet.title, opts)
}

/**
 * Split every FILE a cue sheet names, resolving sources next to the sheet
 * Output goes to options.outputDirectory, or the sheet's directory
 */
export async function splitCueSheet(
	cuePath: string,
	options: CueSheetOptionsInput = {}
): Promise<Result<TrackResult[]>> {
	const opts = resolveCueSheetOptions(options, defaultLogger)
	const baseDir = dirname(resolve(cuePath))

	const sheet = await loadTrackList({ path: cuePath })
	if (!sheet.ok) return sheet

	const groups = new Map<string, TrackEntry[]>()
	for (const track of sheet.value.tracks) {
		if (track.filename === undefined) {
			return err(
				new SplitError('InvalidTrackListFormat', `Track ${track.number} is not inside a FILE entry`, {
					trackNumber: track.number,
					path: cuePath,
				})
			)
		}
		const group = groups.get(track.filename) ?? []
		group.push(track)
		groups.set(track.filename, group)
	}

	const sources = Array.from(groups, ([filename, tracks]) => ({ sourcePath: resolve(baseDir, filename), tracks }))
	return runSplit(sources, opts.outputDirectory ?? baseDir, sheet.value.sheet.title, opts)
}

/**
 * Tracks that did not get written
 */
export function failedTracks(results: readonly TrackResult[]): TrackResult[] {
	return results.filter(result => result.status !== 'written')
}

async function loadTrackList(input: TrackListInput): Promise<Result<{ sheet: CueSheet; tracks: TrackEntry[] }>> {
	if ('text' in input) {
		return parseSheet(input.text, {})
	}

	const path = input.path
	const read = await attemptAsync('IOReadError', () => readFile(path), { path })
	if (!read.ok) return read
	return parseSheet(read.value, { path })
}

function parseSheet(data: Uint8Array | string, context: { path?: string }): Result<{ sheet: CueSheet; tracks: TrackEntry[] }> {
	return attempt(
		'InvalidTrackListFormat',
		() => {
			const sheet = decodeCue(data)
			return { sheet, tracks: getTrackEntries(sheet) }
		},
		context
	)
}

async function runSplit(
	groups: readonly SourceGroup[],
	outputDirectory: string,
	album: string | undefined,
	opts: SplitOptions
): Promise<Result<TrackResult[]>> {
	const log = opts.logger
	const opened: FileSource[] = []

	try {
		const jobs: TrackJob[] = []

		for (const group of groups) {
			const path = group.sourcePath

			const source = attempt('IOReadError', () => FileSource.open(path), { path })
			if (!source.ok) return source
			opened.push(source.value)

			const descriptor = attempt('NotAValidContainer', () => parseDsf(source.value), { path })
			if (!descriptor.ok) return descriptor
			const desc = descriptor.value

			const boundaries = attempt(
				'TrackBoundaryError',
				() => computeBoundaries(group.tracks, desc.samplingFrequency, desc.totalSampleCount),
				{ path }
			)
			if (!boundaries.ok) return boundaries

			log.info(
				{
					source: path,
					channels: desc.channelCount,
					samplingFrequency: desc.samplingFrequency,
					totalSampleCount: desc.totalSampleCount,
					duration: desc.duration,
					tracks: boundaries.value.length,
				},
				'Planned source'
			)

			for (const boundary of boundaries.value) {
				jobs.push({
					boundary,
					descriptor: desc,
					outputPath: join(outputDirectory, trackFileName(boundary.track)),
					album,
				})
			}
		}

		const created = await attemptAsync('IOWriteError', () => mkdir(outputDirectory, { recursive: true }), {
			path: outputDirectory,
		})
		if (!created.ok) return created

		const results = await runJobs(jobs, opts)
		log.info(
			{
				written: results.filter(r => r.status === 'written').length,
				failed: results.filter(r => r.status === 'failed').length,
				skipped: results.filter(r => r.status === 'skipped').length,
			},
			'Split finished'
		)
		return ok(results)
	} finally {
		for (const source of opened) source.close()
	}
}

/**
 * Process jobs with up to opts.concurrency in flight
 * Results keep job order whatever order tracks finish in
 */
async function runJobs(jobs: readonly TrackJob[], opts: SplitOptions): Promise<TrackResult[]> {
	const results = jobs.map((job): TrackResult => ({ ...baseResult(job), status: 'skipped' }))
	let next = 0
	let stopped = false

	const worker = async (): Promise<void> => {
		while (!stopped && next < jobs.length) {
			const index = next++
			const result = await processTrack(jobs[index], opts)
			results[index] = result
			if (result.status === 'failed' && opts.failFast) {
				stopped = true
			}
		}
	}

	const workers = Math.min(opts.concurrency, jobs.length)
	await Promise.all(Array.from({ length: workers }, () => worker()))
	return results
}

async function processTrack(job: TrackJob, opts: SplitOptions): Promise<TrackResult> {
	const { boundary, descriptor, outputPath } = job
	const { track, startSample, endSample } = boundary
	const log = opts.logger.child({ track: track.number })
	const context = { trackNumber: track.number }
	const base = baseResult(job)

	const streams = attempt(
		'TrackBoundaryError',
		() => extractSamples(descriptor, startSample, endSample, { bitOrder: opts.bitOrder }),
		context
	)
	if (!streams.ok) return failed(base, streams.error, log)
	log.debug({ startSample, endSample, shift: startSample % 8 }, 'Extracted channel streams')

	const tags: DsfTags | undefined = opts.embedTags
		? { title: track.title, performer: track.performer, album: job.album, trackNumber: track.number }
		: undefined
	const chunks = attempt('IncompatibleChannelLengths', () => encodeDsfChunks(descriptor.format, streams.value, tags), context)
	if (!chunks.ok) return failed(base, chunks.error, log)

	const written = await writeOutput(outputPath, chunks.value, opts.overwriteExisting, track.number)
	if (!written.ok) return failed(base, written.error, log)

	log.info({ outputPath, samples: endSample - startSample }, 'Wrote track')
	return { ...base, status: 'written' }
}

function baseResult(job: TrackJob): Omit<TrackResult, 'status'> {
	return {
		trackNumber: job.boundary.track.number,
		title: job.boundary.track.title,
		outputPath: job.outputPath,
		startSample: job.boundary.startSample,
		endSample: job.boundary.endSample,
	}
}

function failed(base: Omit<TrackResult, 'status'>, error: SplitError, log: Logger): TrackResult {
	log.error({ kind: error.kind, context: error.context, err: error }, 'Track failed')
	return { ...base, status: 'failed', error }
}

/**
 * Write chunks to a new file; without overwrite an existing path is an error
 * A failed write removes its own partial file
 */
async function writeOutput(
	path: string,
	chunks: readonly Uint8Array[],
	overwrite: boolean,
	trackNumber: number
): Promise<Result<void>> {
	const context = { path, trackNumber }

	let handle: FileHandle
	try {
		handle = await open(path, overwrite ? 'w' : 'wx')
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
			return err(new SplitError('OutputExists', `${path} already exists`, context))
		}
		return err(toSplitError(error, 'IOWriteError', context))
	}

	let writeError: SplitError | undefined
	try {
		for (const chunk of chunks) {
			let offset = 0
			while (offset < chunk.length) {
				const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset)
				offset += bytesWritten
			}
		}
	} catch (error) {
		writeError = toSplitError(error, 'IOWriteError', context)
	} finally {
		await handle.close()
	}

	if (writeError) {
		await rm(path, { force: true })
		return err(writeError)
	}
	return ok(undefined)
}
