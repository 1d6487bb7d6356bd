/**
 * metadata.json of a scalable (SVG) cursor
 *
 * [
 *   { "filename": "wait-01.svg", "hotspot_x": 12, "hotspot_y": 12, "nominal_size": 24, "delay": 30 },
 *   ...
 * ]
 */

import { readFileSync } from 'node:fs'
import { type Static, Type } from '@sinclair/typebox'
import { TypeCompiler } from '@sinclair/typebox/compiler'

export const CursorFrameMetaSchema = Type.Object({
	/** SVG file, relative to the cursor directory */
	filename: Type.String({ minLength: 1 }),
	/** Hotspot in SVG user units at nominal size */
	hotspot_x: Type.Number(),
	hotspot_y: Type.Number(),
	/** Size the SVG was drawn for */
	nominal_size: Type.Number({ exclusiveMinimum: 0 }),
	/** Frame delay (ms) */
	delay: Type.Optional(Type.Integer({ minimum: 0 })),
})

export type CursorFrameMeta = Static<typeof CursorFrameMetaSchema>

export const CursorMetadataSchema = Type.Array(CursorFrameMetaSchema)

const validateMetadata = TypeCompiler.Compile(CursorMetadataSchema)

/**
 * Parse and validate metadata.json text
 */
export function parseCursorMetadata(text: string): CursorFrameMeta[] {
	let json: unknown
	try {
		json = JSON.parse(text)
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new Error(`Invalid cursor metadata: ${reason}`)
	}

	if (!validateMetadata.Check(json)) {
		const errors = Array.from(validateMetadata.Errors(json), (e) => `  - ${e.path || '/'}: ${e.message}`)
		throw new Error(`Invalid cursor metadata:\n${errors.join('\n')}`)
	}

	return json
}

/**
 * Read metadata.json; undefined when the file cannot be read
 */
export function readCursorMetadata(path: string): CursorFrameMeta[] | undefined {
	let text: string
	try {
		text = readFileSync(path, 'utf8')
	} catch {
		return undefined
	}
	return parseCursorMetadata(text)
}
