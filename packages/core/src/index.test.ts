import { describe, expect, test } from 'vitest'
import {
	createImageData,
	detectFormat,
	getExtension,
	getMimeType,
	getPixel,
	premultiply,
	unpremultiply,
} from './index'

describe('core', () => {
	test('createImageData allocates a transparent RGBA buffer', () => {
		const img = createImageData(3, 2)
		expect(img.width).toBe(3)
		expect(img.height).toBe(2)
		expect(img.data.length).toBe(3 * 2 * 4)
		expect(img.data.every(v => v === 0)).toBe(true)
	})

	test('getPixel reads row-major RGBA', () => {
		const img = createImageData(2, 2)
		img.data.set([10, 20, 30, 40], (1 * 2 + 0) * 4)
		expect(getPixel(img, 0, 1)).toEqual([10, 20, 30, 40])
		expect(getPixel(img, 1, 1)).toEqual([0, 0, 0, 0])
	})

	describe('alpha conversion', () => {
		test('premultiply scales by alpha', () => {
			expect(premultiply(255, 128)).toBe(128)
			expect(premultiply(200, 255)).toBe(200)
			expect(premultiply(200, 0)).toBe(0)
		})

		test('unpremultiply restores straight color', () => {
			const out = new Uint8Array(4)
			unpremultiply(out, 0, 128, 64, 0, 128)
			expect([...out]).toEqual([255, 128, 0, 128])
		})

		test('unpremultiply clears fully transparent pixels', () => {
			const out = new Uint8Array([9, 9, 9, 9])
			unpremultiply(out, 0, 50, 50, 50, 0)
			expect([...out]).toEqual([0, 0, 0, 0])
		})
	})

	describe('detectFormat', () => {
		test('detects Xcursor magic', () => {
			expect(detectFormat(new Uint8Array([0x58, 0x63, 0x75, 0x72, 16, 0, 0, 0]))).toBe('xcursor')
		})

		test('detects PNG signature', () => {
			expect(detectFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe('png')
		})

		test('detects SVG text', () => {
			const svg = new TextEncoder().encode('<?xml version="1.0"?>\n<svg width="24" height="24"></svg>')
			expect(detectFormat(svg)).toBe('svg')
		})

		test('returns null for unknown data', () => {
			expect(detectFormat(new Uint8Array([0, 1, 2, 3]))).toBeNull()
			expect(detectFormat(new Uint8Array([]))).toBeNull()
		})
	})

	test('format metadata', () => {
		expect(getExtension('png')).toBe('png')
		expect(getExtension('xcursor')).toBe('')
		expect(getMimeType('svg')).toBe('image/svg+xml')
		expect(getMimeType('xcursor')).toBe('image/x-xcursor')
	})
})
