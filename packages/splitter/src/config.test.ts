import { describe, expect, it } from 'vitest'
import { pino } from 'pino'
import { loadEnvConfig, resolveCueSheetOptions, resolveSplitOptions } from './config'

const silent = pino({ level: 'silent' })

describe('config', () => {
	describe('resolveSplitOptions', () => {
		it('should apply defaults', () => {
			const options = resolveSplitOptions({}, silent)
			expect(options.overwriteExisting).toBe(false)
			expect(options.failFast).toBe(true)
			expect(options.concurrency).toBe(1)
			expect(options.bitOrder).toBe('msb')
			expect(options.embedTags).toBe(true)
			expect(options.logger).toBe(silent)
		})

		it('should keep a caller logger', () => {
			const own = pino({ level: 'silent' })
			expect(resolveSplitOptions({ logger: own }, silent).logger).toBe(own)
		})

		it('should reject invalid values', () => {
			expect(() => resolveSplitOptions({ concurrency: 1.5 }, silent)).toThrow()
			expect(() => resolveSplitOptions({ concurrency: 0 }, silent)).toThrow()
		})

		it('should not take an output directory', () => {
			const input = { failFast: true, outputDirectory: 'tracks' }
			expect(() => resolveSplitOptions(input, silent)).toThrow()
		})

		it('should reject unknown options', () => {
			const input = { failFast: true, overwrite: true }
			expect(() => resolveSplitOptions(input, silent)).toThrow()
		})
	})

	describe('resolveCueSheetOptions', () => {
		it('should take an output directory', () => {
			const options = resolveCueSheetOptions({ outputDirectory: 'tracks' }, silent)
			expect(options.outputDirectory).toBe('tracks')
			expect(options.failFast).toBe(true)
		})

		it('should leave the output directory unset by default', () => {
			expect(resolveCueSheetOptions({}, silent).outputDirectory).toBeUndefined()
		})

		it('should reject an empty output directory', () => {
			expect(() => resolveCueSheetOptions({ outputDirectory: '' }, silent)).toThrow()
		})
	})

	describe('loadEnvConfig', () => {
		it('should default the log level', () => {
			expect(loadEnvConfig({}).LOG_LEVEL).toBe('info')
		})

		it('should accept known levels', () => {
			expect(loadEnvConfig({ LOG_LEVEL: 'debug' }).LOG_LEVEL).toBe('debug')
		})

		it('should reject unknown levels', () => {
			expect(() => loadEnvConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid environment: LOG_LEVEL')
		})
	})
})
