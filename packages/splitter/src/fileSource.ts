import { closeSync, fstatSync, openSync, readSync } from 'node:fs'
import { SplitError, toSplitError, type ByteSource } from '@dsdsplit/core'

/**
 * ByteSource over an open file; reads at arbitrary offsets without loading the file
 * Must be closed by the caller
 */
export class FileSource implements ByteSource {
	readonly path: string
	readonly size: number
	private fd: number | null

	private constructor(path: string, fd: number, size: number) {
		this.path = path
		this.fd = fd
		this.size = size
	}

	static open(path: string): FileSource {
		let fd: number
		try {
			fd = openSync(path, 'r')
		} catch (error) {
			throw toSplitError(error, 'IOReadError', { path })
		}
		try {
			return new FileSource(path, fd, fstatSync(fd).size)
		} catch (error) {
			closeSync(fd)
			throw toSplitError(error, 'IOReadError', { path })
		}
	}

	read(offset: number, length: number): Uint8Array {
		if (this.fd === null) {
			throw new SplitError('IOReadError', 'File is closed', { path: this.path, byteOffset: offset })
		}

		const buffer = new Uint8Array(length)
		let done = 0
		while (done < length) {
			let bytesRead: number
			try {
				bytesRead = readSync(this.fd, buffer, done, length - done, offset + done)
			} catch (error) {
				throw toSplitError(error, 'IOReadError', { path: this.path, byteOffset: offset + done })
			}
			if (bytesRead === 0) {
				throw new SplitError('IOReadError', 'Unexpected end of file', { path: this.path, byteOffset: offset + done })
			}
			done += bytesRead
		}
		return buffer
	}

	close(): void {
		if (this.fd === null) return
		const fd = this.fd
		this.fd = null
		closeSync(fd)
	}
}
