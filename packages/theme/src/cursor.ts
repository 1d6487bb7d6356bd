/**
 * Cursor icons and frame extraction
 */

import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { decodeSvg, decodeXcursor, isXcursor, type XcursorImage } from '@cursorkit/codecs'
import type { ImageData } from '@cursorkit/core'
import { type CursorFrameMeta, readCursorMetadata } from './metadata'
import type { CursorFormat, CursorFrame } from './types'

const METADATA_FILE = 'metadata.json'

/**
 * A cursor icon found in a theme
 *
 * Nothing is read until frames are requested, and frames are never cached.
 */
export class Cursor {
	constructor(
		readonly format: CursorFormat,
		/** Xcursor file, or directory of an SVG cursor */
		readonly path: string
	) {}

	static svg(path: string): Cursor {
		return new Cursor('svg', path)
	}

	static xcursor(path: string): Cursor {
		return new Cursor('xcursor', path)
	}

	/**
	 * Extract frames at (or, for Xcursor, nearest to) the requested size
	 *
	 * Returns undefined when the icon has nothing to show. Throws when an SVG
	 * cursor has malformed metadata or a frame fails to render.
	 */
	frames(size: number): CursorFrame[] | undefined {
		switch (this.format) {
			case 'svg':
				return svgFrames(this.path, size)
			case 'xcursor':
				return xcursorFrames(this.path, size)
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Xcursor
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Nominal size closest to the requested one; ties go to the earlier image
 */
export function nearestSize(images: readonly { size: number }[], size: number): number | undefined {
	let nearest: number | undefined
	let bestDiff = Number.POSITIVE_INFINITY

	for (const image of images) {
		const diff = Math.abs(image.size - size)
		if (diff < bestDiff) {
			bestDiff = diff
			nearest = image.size
		}
	}

	return nearest
}

function xcursorFrames(path: string, size: number): CursorFrame[] | undefined {
	let bytes: Uint8Array
	try {
		bytes = readFileSync(path)
	} catch {
		return undefined
	}

	if (!isXcursor(bytes)) return undefined

	let images: XcursorImage[]
	try {
		images = decodeXcursor(bytes)
	} catch {
		return undefined
	}

	const nearest = nearestSize(images, size)
	if (nearest === undefined) return undefined

	return images.filter((image) => image.size === nearest).map(fromXcursor)
}

function fromXcursor(image: XcursorImage): CursorFrame {
	return {
		size: image.size,
		width: image.width,
		height: image.height,
		hotspotX: image.hotspotX,
		hotspotY: image.hotspotY,
		delay: image.delay,
		data: image.data,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// SVG
// ─────────────────────────────────────────────────────────────────────────────

function svgFrames(directory: string, size: number): CursorFrame[] | undefined {
	const metadata = readCursorMetadata(join(directory, METADATA_FILE))
	if (!metadata || metadata.length === 0) return undefined

	return metadata.map((meta) => renderSvgFrame(directory, size, meta))
}

function renderSvgFrame(directory: string, size: number, meta: CursorFrameMeta): CursorFrame {
	const file = join(directory, meta.filename)
	const scale = size / meta.nominal_size

	let image: ImageData
	try {
		image = decodeSvg(readFileSync(file), { scale })
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new Error(`Failed to render cursor frame ${file}: ${reason}`)
	}

	return {
		size,
		width: image.width,
		height: image.height,
		hotspotX: Math.trunc(meta.hotspot_x * scale),
		hotspotY: Math.trunc(meta.hotspot_y * scale),
		delay: meta.delay ?? 0,
		data: image.data,
	}
}
