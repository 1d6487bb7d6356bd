/**
 * Xcursor encoder - X11 cursor theme files
 */

import { premultiply } from '@cursorkit/core'
import {
	XCURSOR_COMMENT_HEADER_LEN,
	XCURSOR_COMMENT_SUBTYPES,
	XCURSOR_COMMENT_TYPE,
	XCURSOR_COMMENT_VERSION,
	XCURSOR_FILE_HEADER_LEN,
	XCURSOR_FILE_VERSION,
	XCURSOR_IMAGE_HEADER_LEN,
	XCURSOR_IMAGE_MAX_SIZE,
	XCURSOR_IMAGE_TYPE,
	XCURSOR_IMAGE_VERSION,
	XCURSOR_MAGIC,
	XCURSOR_TOC_ENTRY_LEN,
	type XcursorEncodeOptions,
	type XcursorImage,
} from './types'

interface Chunk {
	type: number
	subtype: number
	bytes: Uint8Array
}

/**
 * Encode cursor images (any mix of sizes and frames) to an Xcursor file
 */
export function encodeXcursor(images: XcursorImage[], options: XcursorEncodeOptions = {}): Uint8Array {
	if (images.length === 0) {
		throw new Error('No images to encode')
	}

	const chunks: Chunk[] = images.map(encodeImageChunk)
	for (const comment of options.comments ?? []) {
		const text = new TextEncoder().encode(comment.text)
		const subtype = XCURSOR_COMMENT_SUBTYPES[comment.kind]
		const bytes = new Uint8Array(XCURSOR_COMMENT_HEADER_LEN + text.length)
		writeU32LE(bytes, 0, XCURSOR_COMMENT_HEADER_LEN)
		writeU32LE(bytes, 4, XCURSOR_COMMENT_TYPE)
		writeU32LE(bytes, 8, subtype)
		writeU32LE(bytes, 12, XCURSOR_COMMENT_VERSION)
		writeU32LE(bytes, 16, text.length)
		bytes.set(text, XCURSOR_COMMENT_HEADER_LEN)
		chunks.push({ type: XCURSOR_COMMENT_TYPE, subtype, bytes })
	}

	const tocSize = chunks.length * XCURSOR_TOC_ENTRY_LEN
	let totalSize = XCURSOR_FILE_HEADER_LEN + tocSize
	for (const chunk of chunks) {
		totalSize += chunk.bytes.length
	}

	const output = new Uint8Array(totalSize)

	// File header
	writeU32LE(output, 0, XCURSOR_MAGIC)
	writeU32LE(output, 4, XCURSOR_FILE_HEADER_LEN)
	writeU32LE(output, 8, XCURSOR_FILE_VERSION)
	writeU32LE(output, 12, chunks.length)

	// Table of contents, then chunks in the same order
	let position = XCURSOR_FILE_HEADER_LEN + tocSize
	chunks.forEach((chunk, i) => {
		const entry = XCURSOR_FILE_HEADER_LEN + i * XCURSOR_TOC_ENTRY_LEN
		writeU32LE(output, entry, chunk.type)
		writeU32LE(output, entry + 4, chunk.subtype)
		writeU32LE(output, entry + 8, position)

		output.set(chunk.bytes, position)
		position += chunk.bytes.length
	})

	return output
}

function encodeImageChunk(image: XcursorImage): Chunk {
	const { width, height, data } = image

	if (width === 0 || height === 0 || width > XCURSOR_IMAGE_MAX_SIZE || height > XCURSOR_IMAGE_MAX_SIZE) {
		throw new Error(`Invalid Xcursor image dimensions: ${width}x${height}`)
	}
	if (data.length !== width * height * 4) {
		throw new Error('Image data length does not match dimensions')
	}

	const bytes = new Uint8Array(XCURSOR_IMAGE_HEADER_LEN + width * height * 4)
	writeU32LE(bytes, 0, XCURSOR_IMAGE_HEADER_LEN)
	writeU32LE(bytes, 4, XCURSOR_IMAGE_TYPE)
	writeU32LE(bytes, 8, image.size)
	writeU32LE(bytes, 12, XCURSOR_IMAGE_VERSION)
	writeU32LE(bytes, 16, width)
	writeU32LE(bytes, 20, height)
	writeU32LE(bytes, 24, image.hotspotX)
	writeU32LE(bytes, 28, image.hotspotY)
	writeU32LE(bytes, 32, image.delay)

	// Straight RGBA -> premultiplied B, G, R, A
	for (let i = 0; i < width * height; i++) {
		const src = i * 4
		const dst = XCURSOR_IMAGE_HEADER_LEN + src
		const a = data[src + 3] ?? 0
		bytes[dst] = premultiply(data[src + 2] ?? 0, a)
		bytes[dst + 1] = premultiply(data[src + 1] ?? 0, a)
		bytes[dst + 2] = premultiply(data[src] ?? 0, a)
		bytes[dst + 3] = a
	}

	return { type: XCURSOR_IMAGE_TYPE, subtype: image.size, bytes }
}

function writeU32LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >>> 8) & 0xff
	data[offset + 2] = (value >>> 16) & 0xff
	data[offset + 3] = (value >>> 24) & 0xff
}
