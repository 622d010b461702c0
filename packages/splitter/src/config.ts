/**
 * Split configuration
 *
 * Options are explicit values passed to each run; the environment only
 * supplies the default log level.
 */

import type { Logger } from 'pino'
import { z } from 'zod'

// ─── Environment ─────────────────────────────────────────────────────────────

export const EnvSchema = z.object({
	LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export type EnvConfig = z.infer<typeof EnvSchema>

/**
 * Validate environment variables, failing with every issue at once
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
	const result = EnvSchema.safeParse(env)
	if (!result.success) {
		const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
		throw new Error(`Invalid environment: ${issues.join('; ')}`)
	}
	return result.data
}

// ─── Split options ───────────────────────────────────────────────────────────

export const SplitOptionsSchema = z
	.object({
		/** Replace existing output files instead of failing with OutputExists */
		overwriteExisting: z.boolean().default(false),
		/** Stop scheduling tracks after the first failure */
		failFast: z.boolean().default(true),
		/** Tracks processed at once */
		concurrency: z.number().int().min(1).default(1),
		bitOrder: z.enum(['msb', 'lsb']).default('msb'),
		/** Write title/performer/album/track number into each output */
		embedTags: z.boolean().default(true),
	})
	.strict()

/**
 * splitCueSheet also takes the output directory, which split gets as an argument
 */
export const CueSheetOptionsSchema = SplitOptionsSchema.extend({
	/** Defaults to the cue sheet's directory */
	outputDirectory: z.string().min(1).optional(),
})

export type SplitOptionsInput = z.input<typeof SplitOptionsSchema> & { logger?: Logger }

export type SplitOptions = z.output<typeof SplitOptionsSchema> & { logger: Logger }

export type CueSheetOptionsInput = z.input<typeof CueSheetOptionsSchema> & { logger?: Logger }

export type CueSheetOptions = z.output<typeof CueSheetOptionsSchema> & { logger: Logger }

/**
 * Apply defaults and validate; throws ZodError on bad or unknown options
 */
export function resolveSplitOptions(input: SplitOptionsInput, fallbackLogger: Logger): SplitOptions {
	const { logger, ...rest } = input
	return { ...SplitOptionsSchema.parse(rest), logger: logger ?? fallbackLogger }
}

export function resolveCueSheetOptions(input: CueSheetOptionsInput, fallbackLogger: Logger): CueSheetOptions {
	const { logger, ...rest } = input
	return { ...CueSheetOptionsSchema.parse(rest), logger: logger ?? fallbackLogger }
}
