/**
 * Temporary theme trees for tests
 */

import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { encodeXcursor, type XcursorImage } from '@cursorkit/codecs'
import type { CursorFrameMeta } from '../metadata'

export function createTempDir(): string {
	return mkdtempSync(join(tmpdir(), 'cursorkit-'))
}

export function removeTempDir(dir: string): void {
	rmSync(dir, { recursive: true, force: true })
}

/**
 * Opaque square; the red channel holds the size so frames are distinguishable
 */
export function solidImage(size: number, overrides: Partial<XcursorImage> = {}): XcursorImage {
	const data = new Uint8Array(size * size * 4)
	for (let i = 0; i < size * size; i++) {
		data[i * 4] = size
		data[i * 4 + 1] = 0x20
		data[i * 4 + 2] = 0x40
		data[i * 4 + 3] = 255
	}
	return {
		size,
		width: size,
		height: size,
		hotspotX: Math.floor(size / 2),
		hotspotY: Math.floor(size / 2),
		delay: 0,
		data,
		...overrides,
	}
}

/**
 * Write `<themeDir>/cursors/<shape>` with one image per size
 */
export function writeXcursorShape(themeDir: string, shape: string, images: (number | XcursorImage)[]): string {
	const dir = join(themeDir, 'cursors')
	mkdirSync(dir, { recursive: true })

	const path = join(dir, shape)
	const encoded = images.map((image) => (typeof image === 'number' ? solidImage(image) : image))
	writeFileSync(path, encodeXcursor(encoded))
	return path
}

export interface SvgFrameFixture extends CursorFrameMeta {
	svg: string
}

/**
 * Write `<themeDir>/cursors_scalable/<shape>/` with metadata.json and the frame files
 */
export function writeSvgShape(themeDir: string, shape: string, frames: SvgFrameFixture[]): string {
	const dir = join(themeDir, 'cursors_scalable', shape)
	mkdirSync(dir, { recursive: true })

	const metadata = frames.map(({ svg, ...meta }) => {
		writeFileSync(join(dir, meta.filename), svg)
		return meta
	})
	writeFileSync(join(dir, 'metadata.json'), JSON.stringify(metadata))
	return dir
}

export function writeIndexTheme(themeDir: string, body: string): void {
	mkdirSync(themeDir, { recursive: true })
	writeFileSync(join(themeDir, 'index.theme'), body)
}

/**
 * Symlink `<dir>/<name>` to `target` (relative to dir, or absolute)
 */
export function linkShape(dir: string, name: string, target: string): void {
	symlinkSync(target, join(dir, name))
}

export function squareSvg(size: number, fill: string): string {
	return `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}"><rect width="${size}" height="${size}" fill="${fill}"/></svg>`
}
