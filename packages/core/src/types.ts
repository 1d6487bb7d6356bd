/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255), straight (not premultiplied) alpha
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Image formats a cursor can be stored in or exported to
 */
export type CursorImageFormat = 'xcursor' | 'svg' | 'png'

/**
 * Create empty (fully transparent) ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Get pixel at (x, y)
 */
export function getPixel(image: ImageData, x: number, y: number): [number, number, number, number] {
	const idx = (y * image.width + x) * 4
	const { data } = image
	return [data[idx] ?? 0, data[idx + 1] ?? 0, data[idx + 2] ?? 0, data[idx + 3] ?? 0]
}

/**
 * Convert a premultiplied ARGB pixel (as stored by X11 cursors) to straight RGBA
 */
export function unpremultiply(
	out: Uint8Array,
	offset: number,
	r: number,
	g: number,
	b: number,
	a: number
): void {
	if (a === 0) {
		out[offset] = 0
		out[offset + 1] = 0
		out[offset + 2] = 0
		out[offset + 3] = 0
		return
	}
	out[offset] = Math.min(255, Math.round((r * 255) / a))
	out[offset + 1] = Math.min(255, Math.round((g * 255) / a))
	out[offset + 2] = Math.min(255, Math.round((b * 255) / a))
	out[offset + 3] = a
}

/**
 * Premultiply one straight RGBA channel value by alpha
 */
export function premultiply(channel: number, alpha: number): number {
	return Math.round((channel * alpha) / 255)
}
