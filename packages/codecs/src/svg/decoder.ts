/**
 * SVG decoder
 * Rasterizes SVG to bitmap ImageData
 */

import { detectFormat, type ImageData } from '@cursorkit/core'
import { parseSvg } from './parser'
import { rasterizeSvg } from './renderer'
import type { SvgDecodeOptions, SvgInfo } from './types'

/**
 * Check if data is an SVG file
 */
export function isSvg(data: Uint8Array | string): boolean {
	const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data
	return detectFormat(bytes) === 'svg'
}

/**
 * Parse SVG info without rendering
 */
export function parseSvgInfo(data: Uint8Array | string): SvgInfo {
	const doc = parseSvg(toText(data))

	return {
		width: doc.width,
		height: doc.height,
		viewBox: doc.viewBox,
	}
}

/**
 * Decode SVG to ImageData at the given scale
 */
export function decodeSvg(data: Uint8Array | string, options: SvgDecodeOptions = {}): ImageData {
	return rasterizeSvg(parseSvg(toText(data)), { scale: options.scale })
}

function toText(data: Uint8Array | string): string {
	return typeof data === 'string' ? data : new TextDecoder().decode(data)
}
