import { readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { getPixel } from '@cursorkit/core'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Cursor, nearestSize } from './cursor'
import {
	createTempDir,
	removeTempDir,
	solidImage,
	squareSvg,
	writeSvgShape,
	writeXcursorShape,
} from './testing/theme-fixtures'

describe('nearestSize', () => {
	const images = [{ size: 24 }, { size: 32 }, { size: 48 }]

	it('picks the closest size', () => {
		expect(nearestSize(images, 30)).toBe(32)
		expect(nearestSize(images, 48)).toBe(48)
		expect(nearestSize(images, 96)).toBe(48)
		expect(nearestSize(images, 1)).toBe(24)
	})

	it('breaks ties by order', () => {
		expect(nearestSize(images, 28)).toBe(24)
		expect(nearestSize([{ size: 32 }, { size: 24 }], 28)).toBe(32)
	})

	it('returns undefined without images', () => {
		expect(nearestSize([], 24)).toBeUndefined()
	})
})

describe('Cursor', () => {
	let dir: string

	beforeEach(() => {
		dir = createTempDir()
	})

	afterEach(() => {
		removeTempDir(dir)
	})

	describe('xcursor', () => {
		function writeAnimated(): string {
			return writeXcursorShape(dir, 'wait', [
				solidImage(24),
				solidImage(32, { delay: 50, hotspotX: 3 }),
				solidImage(32, { delay: 60, hotspotX: 4 }),
				solidImage(48),
			])
		}

		it('returns all frames of the nearest size', () => {
			const frames = Cursor.xcursor(writeAnimated()).frames(30)

			expect(frames?.length).toBe(2)
			expect(frames?.map((f) => f.size)).toEqual([32, 32])
			expect(frames?.map((f) => f.delay)).toEqual([50, 60])
			expect(frames?.map((f) => f.hotspotX)).toEqual([3, 4])
			expect(frames?.[0]?.width).toBe(32)
			expect(frames?.[0]?.height).toBe(32)
			expect(frames?.[0]?.hotspotY).toBe(16)
		})

		it('returns an exact size match', () => {
			const frames = Cursor.xcursor(writeAnimated()).frames(48)

			expect(frames?.length).toBe(1)
			const frame = frames?.[0]
			expect(frame?.size).toBe(48)
			expect(frame?.data.length).toBe(48 * 48 * 4)
			expect(frame && getPixel(frame, 10, 10)).toEqual([48, 0x20, 0x40, 255])
		})

		it('returns straight alpha pixels', () => {
			const image = solidImage(2)
			image.data.set([255, 0, 0, 128], 0)
			const frame = Cursor.xcursor(writeXcursorShape(dir, 'text', [image])).frames(2)?.[0]

			// Premultiplied this would read [128, 0, 0, 128]
			expect(frame && getPixel(frame, 0, 0)).toEqual([255, 0, 0, 128])
		})

		it('returns identical frames on repeated calls', () => {
			const cursor = Cursor.xcursor(writeAnimated())
			expect(cursor.frames(32)).toEqual(cursor.frames(32))
		})

		it('returns undefined for a missing file', () => {
			expect(Cursor.xcursor(join(dir, 'missing')).frames(24)).toBeUndefined()
		})

		it('returns undefined for an invalid file', () => {
			const path = join(dir, 'bogus')
			writeFileSync(path, 'not a cursor file')
			expect(Cursor.xcursor(path).frames(24)).toBeUndefined()
		})

		it('returns undefined for a truncated file', () => {
			const path = writeXcursorShape(dir, 'cut', [24])
			writeFileSync(path, readFileSync(path).subarray(0, 40))
			expect(Cursor.xcursor(path).frames(24)).toBeUndefined()
		})

		it('returns undefined for a file without images', () => {
			// Header only: magic, header length, version, no table of contents entries
			const header = new Uint8Array([
				0x58, 0x63, 0x75, 0x72, 16, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0,
			])
			const path = join(dir, 'empty')
			writeFileSync(path, header)
			expect(Cursor.xcursor(path).frames(24)).toBeUndefined()
		})
	})

	describe('svg', () => {
		it('scales frames to the requested size', () => {
			const path = writeSvgShape(dir, 'wait', [
				{ filename: 'wait.svg', hotspot_x: 12, hotspot_y: 12, nominal_size: 24, svg: squareSvg(24, 'red') },
			])

			const frames = Cursor.svg(path).frames(48)

			expect(frames?.length).toBe(1)
			const frame = frames?.[0]
			expect(frame?.size).toBe(48)
			expect(frame?.width).toBe(48)
			expect(frame?.height).toBe(48)
			expect(frame?.hotspotX).toBe(24)
			expect(frame?.hotspotY).toBe(24)
			expect(frame?.delay).toBe(0)
			expect(frame?.data.length).toBe(48 * 48 * 4)
			expect(frame && getPixel(frame, 47, 47)).toEqual([255, 0, 0, 255])
		})

		it('truncates fractional sizes and hotspots', () => {
			const path = writeSvgShape(dir, 'text', [
				{
					filename: 'text.svg',
					hotspot_x: 3,
					hotspot_y: 5,
					nominal_size: 24,
					svg: '<svg xmlns="http://www.w3.org/2000/svg" width="20" height="10"><rect width="20" height="10"/></svg>',
				},
			])

			const frame = Cursor.svg(path).frames(36)?.[0]

			// scale 1.5
			expect(frame?.width).toBe(30)
			expect(frame?.height).toBe(15)
			expect(frame?.hotspotX).toBe(4)
			expect(frame?.hotspotY).toBe(7)
		})

		it('keeps frame order and delays', () => {
			const path = writeSvgShape(dir, 'progress', [
				{ filename: 'a.svg', hotspot_x: 0, hotspot_y: 0, nominal_size: 24, delay: 40, svg: squareSvg(24, 'red') },
				{ filename: 'b.svg', hotspot_x: 0, hotspot_y: 0, nominal_size: 24, delay: 80, svg: squareSvg(24, 'blue') },
			])

			const frames = Cursor.svg(path).frames(24)

			expect(frames?.map((f) => f.delay)).toEqual([40, 80])
			expect(frames?.map((f) => getPixel(f, 12, 12))).toEqual([
				[255, 0, 0, 255],
				[0, 0, 255, 255],
			])
		})

		it('returns identical frames on repeated calls', () => {
			const path = writeSvgShape(dir, 'wait', [
				{ filename: 'wait.svg', hotspot_x: 1, hotspot_y: 1, nominal_size: 24, svg: squareSvg(24, 'green') },
			])
			const cursor = Cursor.svg(path)
			expect(cursor.frames(30)).toEqual(cursor.frames(30))
		})

		it('returns undefined for empty metadata', () => {
			const path = writeSvgShape(dir, 'wait', [])
			expect(Cursor.svg(path).frames(24)).toBeUndefined()
		})

		it('returns undefined without metadata', () => {
			expect(Cursor.svg(dir).frames(24)).toBeUndefined()
		})

		it('throws on malformed metadata', () => {
			writeFileSync(join(dir, 'metadata.json'), '[{"filename": 1}]')
			expect(() => Cursor.svg(dir).frames(24)).toThrow('Invalid cursor metadata')
		})

		it('fails the whole call when one frame is missing', () => {
			const path = writeSvgShape(dir, 'wait', [
				{ filename: 'a.svg', hotspot_x: 0, hotspot_y: 0, nominal_size: 24, svg: squareSvg(24, 'red') },
			])
			writeFileSync(
				join(path, 'metadata.json'),
				JSON.stringify([
					{ filename: 'a.svg', hotspot_x: 0, hotspot_y: 0, nominal_size: 24 },
					{ filename: 'b.svg', hotspot_x: 0, hotspot_y: 0, nominal_size: 24 },
				])
			)

			expect(() => Cursor.svg(path).frames(24)).toThrow(`Failed to render cursor frame ${join(path, 'b.svg')}`)
		})

		it('fails on a document that is not SVG', () => {
			const path = writeSvgShape(dir, 'wait', [
				{ filename: 'a.svg', hotspot_x: 0, hotspot_y: 0, nominal_size: 24, svg: '<html></html>' },
			])
			expect(() => Cursor.svg(path).frames(24)).toThrow('root element must be <svg>')
		})
	})
})
