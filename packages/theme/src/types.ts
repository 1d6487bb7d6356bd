import type { ImageData } from '@cursorkit/core'

/**
 * On-disk representation of a cursor icon
 * - svg: `cursors_scalable/<shape>/` holding metadata.json plus one SVG per frame
 * - xcursor: `cursors/<shape>`, a single file with every size and frame
 */
export type CursorFormat = 'svg' | 'xcursor'

/**
 * One rendered cursor frame
 *
 * `data` is straight (not premultiplied) RGBA for both formats. Xcursor
 * pixels are stored premultiplied and converted on decode, which rounds
 * color channels of translucent pixels.
 */
export interface CursorFrame extends ImageData {
	/** Nominal size: the matched Xcursor size, or the requested size for SVG */
	readonly size: number
	/** Hotspot in output pixels */
	readonly hotspotX: number
	readonly hotspotY: number
	/** Delay until the next frame (ms), 0 when not set */
	readonly delay: number
}

export interface LoadOptions {
	/** Theme roots to search instead of the environment-derived ones */
	searchPaths?: readonly string[]
}
