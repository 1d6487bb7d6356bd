/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

/** Color type 6: 8-bit RGBA */
export const PNG_COLOR_TYPE_RGBA = 6

/** Scanline filter 0: bytes stored as-is */
export const PNG_FILTER_NONE = 0

export interface PngEncodeOptions {
	/** Latin-1 key/value pairs written as tEXt chunks */
	text?: Record<string, string>
}
