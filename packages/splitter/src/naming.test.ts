import { describe, expect, it } from 'vitest'
import { trackFileName } from './naming'

describe('trackFileName', () => {
	it('should number and title tracks', () => {
		expect(trackFileName({ number: 1, title: 'Intro' })).toBe('01 - Intro.dsf')
		expect(trackFileName({ number: 12, title: 'Finale' })).toBe('12 - Finale.dsf')
		expect(trackFileName({ number: 123, title: 'Bonus' })).toBe('123 - Bonus.dsf')
	})

	it('should name untitled tracks', () => {
		expect(trackFileName({ number: 3 })).toBe('03 - Track 03.dsf')
		expect(trackFileName({ number: 3, title: '  ' })).toBe('03 - Track 03.dsf')
	})

	it('should not repeat a leading track number', () => {
		expect(trackFileName({ number: 1, title: '01 - 01 - Title' })).toBe('01 - 01 - Title.dsf')
		expect(trackFileName({ number: 2, title: '02 - Title' })).toBe('02 - Title.dsf')
		expect(trackFileName({ number: 2, title: '03 - Title' })).toBe('02 - 03 - Title.dsf')
	})

	it('should replace characters that are not allowed in file names', () => {
		expect(trackFileName({ number: 4, title: 'AC/DC: "Live"?' })).toBe('04 - AC_DC_ _Live__.dsf')
		expect(trackFileName({ number: 5, title: 'a\\b|c*d<e>f' })).toBe('05 - a_b_c_d_e_f.dsf')
	})
})
