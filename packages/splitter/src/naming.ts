import type { TrackEntry } from '@dsdsplit/codecs'

/**
 * Output file name: "NN - Title.dsf"
 * A title that already starts with "NN - " is not numbered twice
 */
export function trackFileName(track: Pick<TrackEntry, 'number' | 'title'>): string {
	const num = String(track.number).padStart(2, '0')

	let title = track.title?.trim() ?? ''
	if (title.startsWith(`${num} - `)) {
		title = title.slice(num.length + 3).trim()
	}
	if (!title) {
		title = `Track ${num}`
	}

	return `${num} - ${title.replace(/[/\\:*?"<>|\u0000-\u001f]/g, '_')}.dsf`
}
