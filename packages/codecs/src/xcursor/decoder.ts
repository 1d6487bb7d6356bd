/**
 * Xcursor decoder - X11 cursor theme files
 */

import { unpremultiply } from '@cursorkit/core'
import {
	XCURSOR_COMMENT_SUBTYPES,
	XCURSOR_COMMENT_TYPE,
	XCURSOR_IMAGE_MAX_SIZE,
	XCURSOR_IMAGE_TYPE,
	XCURSOR_MAGIC,
	XCURSOR_TOC_ENTRY_LEN,
	type XcursorComment,
	type XcursorCommentKind,
	type XcursorFile,
	type XcursorImage,
} from './types'

interface TocEntry {
	type: number
	subtype: number
	position: number
}

/**
 * Decode all images of an Xcursor file, in table-of-contents order
 */
export function decodeXcursor(data: Uint8Array): XcursorImage[] {
	return decodeXcursorFile(data).images
}

/**
 * Decode Xcursor file with comments
 */
export function decodeXcursorFile(data: Uint8Array): XcursorFile {
	const reader = new ChunkReader(data)

	if (reader.u32(0) !== XCURSOR_MAGIC) {
		throw new Error('Invalid Xcursor file: wrong magic number')
	}

	const headerLen = reader.u32(4)
	const ntoc = reader.u32(12)

	const toc: TocEntry[] = []
	for (let i = 0; i < ntoc; i++) {
		const offset = headerLen + i * XCURSOR_TOC_ENTRY_LEN
		toc.push({
			type: reader.u32(offset),
			subtype: reader.u32(offset + 4),
			position: reader.u32(offset + 8),
		})
	}

	const images: XcursorImage[] = []
	const comments: XcursorComment[] = []

	for (const entry of toc) {
		switch (entry.type) {
			case XCURSOR_IMAGE_TYPE:
				images.push(parseImageChunk(reader, entry))
				break

			case XCURSOR_COMMENT_TYPE: {
				const comment = parseCommentChunk(reader, entry)
				if (comment) comments.push(comment)
				break
			}
		}
	}

	return { images, comments }
}

/**
 * Check if data is an Xcursor file
 */
export function isXcursor(data: Uint8Array): boolean {
	if (data.length < 16) return false
	return new ChunkReader(data).u32(0) === XCURSOR_MAGIC
}

/**
 * Bounds-checked little-endian reader
 */
class ChunkReader {
	private readonly view: DataView

	constructor(readonly data: Uint8Array) {
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	}

	u32(offset: number): number {
		if (offset < 0 || offset + 4 > this.data.length) {
			throw new Error(`Xcursor file truncated at offset ${offset}`)
		}
		return this.view.getUint32(offset, true)
	}

	/**
	 * Read the common chunk header and check it against the TOC entry
	 */
	chunkHeader(entry: TocEntry): number {
		const pos = entry.position
		const headerLen = this.u32(pos)
		const type = this.u32(pos + 4)
		const subtype = this.u32(pos + 8)

		if (type !== entry.type || subtype !== entry.subtype) {
			throw new Error(`Xcursor chunk at ${pos} does not match its table entry`)
		}

		return headerLen
	}
}

function parseImageChunk(reader: ChunkReader, entry: TocEntry): XcursorImage {
	const pos = entry.position
	const headerLen = reader.chunkHeader(entry)

	const width = reader.u32(pos + 16)
	const height = reader.u32(pos + 20)
	const hotspotX = reader.u32(pos + 24)
	const hotspotY = reader.u32(pos + 28)
	const delay = reader.u32(pos + 32)

	if (width === 0 || height === 0 || width > XCURSOR_IMAGE_MAX_SIZE || height > XCURSOR_IMAGE_MAX_SIZE) {
		throw new Error(`Invalid Xcursor image dimensions: ${width}x${height}`)
	}
	if (hotspotX > width || hotspotY > height) {
		throw new Error(`Invalid Xcursor hotspot: (${hotspotX}, ${hotspotY})`)
	}

	const pixelStart = pos + headerLen
	const pixelCount = width * height
	if (pixelStart + pixelCount * 4 > reader.data.length) {
		throw new Error('Xcursor file truncated: missing pixel data')
	}

	// Pixels are premultiplied ARGB u32 little-endian, i.e. B, G, R, A bytes
	const src = reader.data
	const pixels = new Uint8Array(pixelCount * 4)
	for (let i = 0; i < pixelCount; i++) {
		const s = pixelStart + i * 4
		unpremultiply(pixels, i * 4, src[s + 2] ?? 0, src[s + 1] ?? 0, src[s] ?? 0, src[s + 3] ?? 0)
	}

	return {
		size: entry.subtype,
		width,
		height,
		hotspotX,
		hotspotY,
		delay,
		data: pixels,
	}
}

function parseCommentChunk(reader: ChunkReader, entry: TocEntry): XcursorComment | null {
	const pos = entry.position
	const headerLen = reader.chunkHeader(entry)
	const length = reader.u32(pos + 16)

	const start = pos + headerLen
	if (start + length > reader.data.length) {
		throw new Error('Xcursor file truncated: missing comment text')
	}

	const kind = commentKind(entry.subtype)
	// Unknown comment subtypes are ignored
	if (!kind) return null

	return {
		kind,
		text: new TextDecoder().decode(reader.data.subarray(start, start + length)),
	}
}

function commentKind(subtype: number): XcursorCommentKind | null {
	switch (subtype) {
		case XCURSOR_COMMENT_SUBTYPES.copyright:
			return 'copyright'
		case XCURSOR_COMMENT_SUBTYPES.license:
			return 'license'
		case XCURSOR_COMMENT_SUBTYPES.other:
			return 'other'
		default:
			return null
	}
}
