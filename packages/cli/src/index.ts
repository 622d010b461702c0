#!/usr/bin/env node
/**
 * dsdsplit CLI
 */

import { describeSplitError } from '@dsdsplit/core'
import { createLogger, failedTracks, splitCueSheet, type TrackResult } from '@dsdsplit/splitter'
import { HELP, VERSION, parseArgs } from './args'

function formatResult(result: TrackResult): string {
	const number = String(result.trackNumber).padStart(2, '0')
	switch (result.status) {
		case 'written':
			return `  [${number}] ${result.outputPath}`
		case 'failed':
			return `  [${number}] failed: ${result.error ? describeSplitError(result.error) : 'unknown error'}`
		case 'skipped':
			return `  [${number}] skipped`
	}
}

async function main(): Promise<number> {
	const parsed = parseArgs(process.argv.slice(2))
	if (!parsed.ok) {
		console.error(`Error: ${parsed.message}`)
		console.error('Run dsdsplit --help for usage')
		return 1
	}

	const { options } = parsed

	if (options.version) {
		console.log(`dsdsplit ${VERSION}`)
		return 0
	}

	if (options.help || options.cuePath === undefined) {
		console.log(HELP)
		return options.help ? 0 : 1
	}

	const logger = createLogger({ command: 'split' })
	if (options.verbose) logger.level = 'debug'

	const result = await splitCueSheet(options.cuePath, {
		outputDirectory: options.output,
		overwriteExisting: options.force,
		failFast: !options.bestEffort,
		concurrency: options.jobs,
		bitOrder: options.lsb ? 'lsb' : 'msb',
		embedTags: options.tags,
		logger,
	})

	if (!result.ok) {
		console.error(`Error: ${describeSplitError(result.error)}`)
		return 1
	}

	for (const track of result.value) {
		if (track.status === 'written') console.log(formatResult(track))
		else console.error(formatResult(track))
	}

	const failures = failedTracks(result.value)
	const written = result.value.length - failures.length
	console.log(`\n${written} of ${result.value.length} tracks written`)
	return failures.length > 0 ? 1 : 0
}

main().then(
	code => {
		process.exitCode = code
	},
	(error: unknown) => {
		console.error('Error:', error instanceof Error ? error.message : error)
		process.exitCode = 1
	}
)
