import { describe, expect, it } from 'vitest'
import {
	attempt,
	attemptAsync,
	bufferSource,
	concatBytes,
	describeSplitError,
	isSplitError,
	SplitError,
	toSplitError,
} from './index'

describe('core', () => {
	describe('SplitError', () => {
		it('should carry kind and context', () => {
			const error = new SplitError('TrackBoundaryError', 'past end', { trackNumber: 3, byteOffset: 4096 })
			expect(error.kind).toBe('TrackBoundaryError')
			expect(error.context.trackNumber).toBe(3)
			expect(error.context.byteOffset).toBe(4096)
			expect(error).toBeInstanceOf(Error)
			expect(isSplitError(error)).toBe(true)
			expect(isSplitError(new Error('x'))).toBe(false)
		})

		it('should merge context without losing the kind', () => {
			const error = new SplitError('OutputExists', 'exists', { path: '/tmp/a.dsf' }).withContext({ trackNumber: 2 })
			expect(error.kind).toBe('OutputExists')
			expect(error.context).toEqual({ path: '/tmp/a.dsf', trackNumber: 2 })
		})

		it('should describe errors on one line', () => {
			const error = new SplitError('TrackBoundaryError', 'start past end', { trackNumber: 7, byteOffset: 92 })
			expect(describeSplitError(error)).toBe('TrackBoundaryError: start past end (track 07, byte 92)')
			expect(describeSplitError(new SplitError('IOReadError', 'gone'))).toBe('IOReadError: gone')
		})

		it('should wrap foreign errors with a cause', () => {
			const cause = new Error('EACCES')
			const wrapped = toSplitError(cause, 'IOWriteError', { path: 'out.dsf' })
			expect(wrapped.kind).toBe('IOWriteError')
			expect(wrapped.message).toBe('EACCES')
			expect(wrapped.cause).toBe(cause)
			expect(wrapped.context.path).toBe('out.dsf')
		})
	})

	describe('attempt', () => {
		it('should return ok results', () => {
			expect(attempt('IOReadError', () => 42)).toEqual({ ok: true, value: 42 })
		})

		it('should keep the kind of thrown SplitErrors', () => {
			const result = attempt('IOReadError', () => {
				throw new SplitError('NotAValidContainer', 'bad magic')
			})
			expect(result.ok).toBe(false)
			if (!result.ok) expect(result.error.kind).toBe('NotAValidContainer')
		})

		it('should convert other exceptions to the stage kind', async () => {
			const result = await attemptAsync('IOWriteError', async () => {
				throw new Error('disk full')
			}, { trackNumber: 1 })
			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.kind).toBe('IOWriteError')
				expect(result.error.context.trackNumber).toBe(1)
			}
		})
	})

	describe('bufferSource', () => {
		it('should read ranges', () => {
			const source = bufferSource(new Uint8Array([1, 2, 3, 4, 5]))
			expect(source.size).toBe(5)
			expect(Array.from(source.read(1, 3))).toEqual([2, 3, 4])
			expect(source.read(5, 0).length).toBe(0)
		})

		it('should reject reads past the end', () => {
			const source = bufferSource(new Uint8Array(4))
			expect(() => source.read(2, 3)).toThrow(SplitError)
		})
	})

	it('should concatenate bytes', () => {
		expect(Array.from(concatBytes([new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3])]))).toEqual([1, 2, 3])
	})
})
