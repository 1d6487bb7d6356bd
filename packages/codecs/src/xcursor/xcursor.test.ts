import { describe, expect, it } from 'vitest'
import { decodeXcursor, decodeXcursorFile, encodeXcursor, isXcursor } from './index'
import type { XcursorImage } from './types'

describe('Xcursor Codec', () => {
	// Solid opaque square; color encodes the size so frames are distinguishable
	function createTestImage(size: number, overrides: Partial<XcursorImage> = {}): XcursorImage {
		const data = new Uint8Array(size * size * 4)
		for (let i = 0; i < size * size; i++) {
			data[i * 4] = size
			data[i * 4 + 1] = 0x40
			data[i * 4 + 2] = 0x80
			data[i * 4 + 3] = 255
		}
		return {
			size,
			width: size,
			height: size,
			hotspotX: Math.floor(size / 4),
			hotspotY: Math.floor(size / 3),
			delay: 0,
			data,
			...overrides,
		}
	}

	describe('encode/decode', () => {
		it('should decode a single image', () => {
			const encoded = encodeXcursor([createTestImage(24)])

			expect(isXcursor(encoded)).toBe(true)

			const images = decodeXcursor(encoded)
			expect(images.length).toBe(1)

			const image = images[0]!
			expect(image.size).toBe(24)
			expect(image.width).toBe(24)
			expect(image.height).toBe(24)
			expect(image.hotspotX).toBe(6)
			expect(image.hotspotY).toBe(8)
			expect(image.delay).toBe(0)
			expect(image.data.length).toBe(24 * 24 * 4)
			expect([...image.data.subarray(0, 4)]).toEqual([24, 0x40, 0x80, 255])
		})

		it('should keep table-of-contents order across sizes and frames', () => {
			const encoded = encodeXcursor([
				createTestImage(32, { delay: 40 }),
				createTestImage(24, { delay: 40 }),
				createTestImage(32, { delay: 60 }),
			])

			const images = decodeXcursor(encoded)
			expect(images.map(img => [img.size, img.delay])).toEqual([
				[32, 40],
				[24, 40],
				[32, 60],
			])
		})

		it('should write pixels as premultiplied BGRA', () => {
			const data = new Uint8Array([255, 0, 0, 128])
			const encoded = encodeXcursor([
				{ size: 1, width: 1, height: 1, hotspotX: 0, hotspotY: 0, delay: 0, data },
			])

			// header (16) + one TOC entry (12) + image header (36)
			const pixel = encoded.subarray(64, 68)
			expect([...pixel]).toEqual([0, 0, 128, 128])

			const decoded = decodeXcursor(encoded)[0]!
			expect([...decoded.data]).toEqual([255, 0, 0, 128])
		})

		it('should clear color of fully transparent pixels', () => {
			const data = new Uint8Array([10, 20, 30, 0])
			const encoded = encodeXcursor([
				{ size: 1, width: 1, height: 1, hotspotX: 0, hotspotY: 0, delay: 0, data },
			])

			expect([...decodeXcursor(encoded)[0]!.data]).toEqual([0, 0, 0, 0])
		})

		it('should preserve non-square dimensions', () => {
			const data = new Uint8Array(8 * 4 * 4).fill(255)
			const encoded = encodeXcursor([
				{ size: 8, width: 8, height: 4, hotspotX: 8, hotspotY: 4, delay: 0, data },
			])

			const image = decodeXcursor(encoded)[0]!
			expect(image.width).toBe(8)
			expect(image.height).toBe(4)
			expect(image.hotspotX).toBe(8)
			expect(image.hotspotY).toBe(4)
		})
	})

	describe('comments', () => {
		it('should decode comment chunks', () => {
			const encoded = encodeXcursor([createTestImage(16)], {
				comments: [
					{ kind: 'copyright', text: 'Test Author' },
					{ kind: 'license', text: 'CC0' },
				],
			})

			const file = decodeXcursorFile(encoded)
			expect(file.images.length).toBe(1)
			expect(file.comments).toEqual([
				{ kind: 'copyright', text: 'Test Author' },
				{ kind: 'license', text: 'CC0' },
			])
		})
	})

	describe('errors', () => {
		it('should reject wrong magic', () => {
			expect(() => decodeXcursor(new Uint8Array(16))).toThrow('Invalid Xcursor file')
		})

		it('should reject truncated pixel data', () => {
			const encoded = encodeXcursor([createTestImage(4)])
			expect(() => decodeXcursor(encoded.subarray(0, encoded.length - 1))).toThrow('truncated')
		})

		it('should reject a chunk that does not match its TOC entry', () => {
			const encoded = encodeXcursor([createTestImage(4)])
			// Chunk subtype lives 8 bytes into the chunk at offset 28
			encoded[36] = 5
			expect(() => decodeXcursor(encoded)).toThrow('does not match')
		})

		it('should reject a hotspot outside the image', () => {
			const encoded = encodeXcursor([createTestImage(4, { hotspotX: 5 })])
			expect(() => decodeXcursor(encoded)).toThrow('Invalid Xcursor hotspot')
		})

		it('should refuse to encode nothing', () => {
			expect(() => encodeXcursor([])).toThrow('No images to encode')
		})

		it('should decode a file with an empty table of contents', () => {
			const header = new Uint8Array([0x58, 0x63, 0x75, 0x72, 16, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0])
			expect(decodeXcursor(header)).toEqual([])
		})
	})

	describe('isXcursor', () => {
		it('should reject non-Xcursor data', () => {
			expect(isXcursor(new Uint8Array([0x58, 0x63, 0x75, 0x72]))).toBe(false) // too short
			expect(isXcursor(new Uint8Array(16))).toBe(false)
			expect(isXcursor(new Uint8Array([]))).toBe(false)
		})
	})
})
