/**
 * Frame export as PNG
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { encodePng } from '@cursorkit/codecs'
import { getExtension } from '@cursorkit/core'
import type { CursorFrame } from '@cursorkit/theme'

export interface ExportedFrame {
	path: string
	frame: CursorFrame
}

export function frameFileName(shape: string, size: number, index: number): string {
	return `${shape}-${size}-${index}.${getExtension('png')}`
}

/**
 * Encode a frame, keeping hotspot and delay as PNG text
 */
export function encodeFrame(frame: CursorFrame): Uint8Array {
	return encodePng(frame, {
		text: {
			Hotspot: `${frame.hotspotX},${frame.hotspotY}`,
			Delay: String(frame.delay),
		},
	})
}

/**
 * Write `<shape>-<size>-<index>.png` for every frame into `outDir`
 */
export function exportFrames(
	frames: CursorFrame[],
	shape: string,
	size: number,
	outDir: string,
	dryRun = false
): ExportedFrame[] {
	if (!dryRun) {
		mkdirSync(outDir, { recursive: true })
	}

	return frames.map((frame, index) => {
		const path = join(outDir, frameFileName(shape, size, index))
		if (!dryRun) {
			writeFileSync(path, encodeFrame(frame))
		}
		return { path, frame }
	})
}

export function describeFrame(frame: CursorFrame): string {
	const parts = [`${frame.width}x${frame.height}`, `hotspot (${frame.hotspotX}, ${frame.hotspotY})`]
	if (frame.delay > 0) parts.push(`delay ${frame.delay}ms`)
	return parts.join('  ')
}
