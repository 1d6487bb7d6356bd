import type { ImageData } from '@cursorkit/core'
import { deflateStored } from './deflate'
import { PNG_COLOR_TYPE_RGBA, PNG_FILTER_NONE, PNG_SIGNATURE, type PngEncodeOptions } from './types'

/**
 * Write 32-bit big-endian unsigned integer
 */
function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >>> 24) & 0xff
	data[offset + 1] = (value >>> 16) & 0xff
	data[offset + 2] = (value >>> 8) & 0xff
	data[offset + 3] = value & 0xff
}

/**
 * CRC32 lookup table
 */
const crcTable = new Uint32Array(256)
for (let n = 0; n < 256; n++) {
	let c = n
	for (let k = 0; k < 8; k++) {
		c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
	}
	crcTable[n] = c
}

export function crc32(data: Uint8Array): number {
	let crc = 0xffffffff
	for (const byte of data) {
		crc = (crcTable[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8)
	}
	return (crc ^ 0xffffffff) >>> 0
}

/**
 * Create a PNG chunk: length, type, data, CRC over type + data
 */
function createChunk(type: string, data: Uint8Array): Uint8Array {
	const chunk = new Uint8Array(12 + data.length)
	writeU32BE(chunk, 0, data.length)
	for (let i = 0; i < 4; i++) {
		chunk[4 + i] = type.charCodeAt(i)
	}
	chunk.set(data, 8)
	writeU32BE(chunk, 8 + data.length, crc32(chunk.subarray(4, 8 + data.length)))
	return chunk
}

function createIHDR(width: number, height: number): Uint8Array {
	const data = new Uint8Array(13)
	writeU32BE(data, 0, width)
	writeU32BE(data, 4, height)
	data[8] = 8 // Bit depth
	data[9] = PNG_COLOR_TYPE_RGBA
	// Compression, filter and interlace methods stay 0
	return createChunk('IHDR', data)
}

function createText(key: string, value: string): Uint8Array {
	if (key.length === 0 || key.length > 79) {
		throw new Error(`Invalid PNG text keyword: "${key}"`)
	}
	const data = new Uint8Array(key.length + 1 + value.length)
	for (let i = 0; i < key.length; i++) data[i] = key.charCodeAt(i) & 0xff
	for (let i = 0; i < value.length; i++) data[key.length + 1 + i] = value.charCodeAt(i) & 0xff
	return createChunk('tEXt', data)
}

function createIDAT(image: ImageData): Uint8Array {
	const { width, height, data } = image
	const stride = width * 4

	// Every scanline is prefixed with its filter type
	const raw = new Uint8Array((stride + 1) * height)
	for (let y = 0; y < height; y++) {
		const offset = y * (stride + 1)
		raw[offset] = PNG_FILTER_NONE
		raw.set(data.subarray(y * stride, (y + 1) * stride), offset + 1)
	}

	return createChunk('IDAT', deflateStored(raw))
}

/**
 * Encode straight-alpha RGBA ImageData as an 8-bit RGBA PNG
 */
export function encodePng(image: ImageData, options: PngEncodeOptions = {}): Uint8Array {
	const { width, height, data } = image

	if (width <= 0 || height <= 0) {
		throw new Error(`Invalid PNG dimensions: ${width}x${height}`)
	}
	if (data.length !== width * height * 4) {
		throw new Error('Image data length does not match dimensions')
	}

	const chunks = [createIHDR(width, height)]
	for (const [key, value] of Object.entries(options.text ?? {})) {
		chunks.push(createText(key, value))
	}
	chunks.push(createIDAT(image), createChunk('IEND', new Uint8Array(0)))

	const output = new Uint8Array(PNG_SIGNATURE.length + chunks.reduce((sum, c) => sum + c.length, 0))
	output.set(PNG_SIGNATURE, 0)
	let offset = PNG_SIGNATURE.length
	for (const chunk of chunks) {
		output.set(chunk, offset)
		offset += chunk.length
	}

	return output
}
