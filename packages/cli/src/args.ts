/**
 * Command-line arguments
 */

export interface CliOptions {
	cuePath?: string
	output?: string
	force: boolean
	verbose: boolean
	bestEffort: boolean
	jobs: number
	lsb: boolean
	tags: boolean
	help: boolean
	version: boolean
}

export type ParsedArgs = { ok: true; options: CliOptions } | { ok: false; message: string }

export const VERSION = '0.1.0'

export const HELP = `
dsdsplit - Split DSF (DSD Stream File) images along a CUE sheet

USAGE:
  dsdsplit <cue_file> [options]

Every FILE in the cue sheet is read from the cue sheet's directory and each
track is written as "NN - Title.dsf". Sample data is copied bit for bit.

OPTIONS:
  -o, --output <dir>    Output directory (default: the cue sheet's directory)
  -f, --force           Overwrite existing output files
  -j, --jobs <n>        Tracks written at once (default: 1)
  --best-effort         Keep going after a track fails
  --lsb                 Source bytes hold the earliest sample in the low bit
  --no-tags             Do not embed ID3 tags
  -v, --verbose         Debug logging
  --help                Show this help
  --version             Show version

EXAMPLES:
  dsdsplit album.cue
  dsdsplit album.cue -o tracks/ -j 4
  dsdsplit album.cue --force --best-effort

`

/**
 * Parse argv (without node and script)
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
	const options: CliOptions = {
		force: false,
		verbose: false,
		bestEffort: false,
		jobs: 1,
		lsb: false,
		tags: true,
		help: false,
		version: false,
	}

	let i = 0
	while (i < args.length) {
		const arg = args[i]
		const next = args[i + 1]

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--force' || arg === '-f') {
			options.force = true
		} else if (arg === '--best-effort') {
			options.bestEffort = true
		} else if (arg === '--lsb') {
			options.lsb = true
		} else if (arg === '--no-tags') {
			options.tags = false
		} else if (arg === '--output' || arg === '-o') {
			if (next === undefined) return { ok: false, message: `${arg} requires a directory` }
			options.output = next
			i++
		} else if (arg === '--jobs' || arg === '-j') {
			const jobs = next === undefined ? Number.NaN : Number(next)
			if (!Number.isInteger(jobs) || jobs < 1) {
				return { ok: false, message: `${arg} requires a positive integer` }
			}
			options.jobs = jobs
			i++
		} else if (arg !== undefined && !arg.startsWith('-')) {
			if (options.cuePath !== undefined) return { ok: false, message: `Unexpected argument: ${arg}` }
			options.cuePath = arg
		} else {
			return { ok: false, message: `Unknown option: ${arg}` }
		}

		i++
	}

	return { ok: true, options }
}
