/**
 * Xcursor (X11 cursor) format types
 * https://www.x.org/releases/current/doc/man/man3/Xcursor.3.xhtml
 */

import type { ImageData } from '@cursorkit/core'

/** "Xcur" read as a little-endian u32 */
export const XCURSOR_MAGIC = 0x72756358

/** File header size in bytes */
export const XCURSOR_FILE_HEADER_LEN = 16
export const XCURSOR_FILE_VERSION = 0x10000
/** Table of contents entry size in bytes */
export const XCURSOR_TOC_ENTRY_LEN = 12

export const XCURSOR_IMAGE_TYPE = 0xfffd0002
export const XCURSOR_IMAGE_HEADER_LEN = 36
export const XCURSOR_IMAGE_VERSION = 1
export const XCURSOR_IMAGE_MAX_SIZE = 0x7fff

export const XCURSOR_COMMENT_TYPE = 0xfffe0001
export const XCURSOR_COMMENT_HEADER_LEN = 20
export const XCURSOR_COMMENT_VERSION = 1

/** Comment subtypes */
export const XCURSOR_COMMENT_SUBTYPES = {
	copyright: 1,
	license: 2,
	other: 3,
} as const

export type XcursorCommentKind = keyof typeof XCURSOR_COMMENT_SUBTYPES

/** One embedded image: a single frame at one nominal size */
export interface XcursorImage extends ImageData {
	/** Nominal size the image was drawn for */
	readonly size: number
	readonly hotspotX: number
	readonly hotspotY: number
	/** Delay until the next frame (ms), 0 for static cursors */
	readonly delay: number
}

export interface XcursorComment {
	readonly kind: XcursorCommentKind
	readonly text: string
}

/** Decoded Xcursor file, images in table-of-contents order */
export interface XcursorFile {
	images: XcursorImage[]
	comments: XcursorComment[]
}

export interface XcursorEncodeOptions {
	/** Comment chunks written after the images */
	comments?: XcursorComment[]
}
