import type { CursorImageFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<'xcursor' | 'png', { bytes: number[]; offset?: number }> = {
	xcursor: { bytes: [0x58, 0x63, 0x75, 0x72] }, // "Xcur"
	png: { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * SVG has no magic bytes; look for the root tag near the start of the text
 */
function looksLikeSvg(data: Uint8Array): boolean {
	const head = new TextDecoder().decode(data.subarray(0, 1024)).trim().toLowerCase()
	return (
		head.startsWith('<svg') ||
		((head.startsWith('<?xml') || head.startsWith('<!--')) && head.includes('<svg')) ||
		head.includes('<!doctype svg')
	)
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): CursorImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.xcursor)) return 'xcursor'
	if (matchMagic(data, MAGIC_BYTES.png)) return 'png'
	if (looksLikeSvg(data)) return 'svg'
	return null
}

/**
 * Get file extension for format
 */
export function getExtension(format: CursorImageFormat): string {
	// Xcursor files conventionally have no extension
	if (format === 'xcursor') return ''
	return format
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: CursorImageFormat): string {
	switch (format) {
		case 'xcursor':
			return 'image/x-xcursor'
		case 'svg':
			return 'image/svg+xml'
		case 'png':
			return 'image/png'
	}
}
