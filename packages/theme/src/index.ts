/**
 * @cursorkit/theme - cursor theme lookup and frame extraction
 *
 * @example
 * const theme = CursorTheme.load('Adwaita')
 * const frames = theme?.resolve('wait')?.frames(48)
 */

export * from './types'
export { computeSearchPaths, getSearchPaths, type Environment } from './search-path'
export { parseThemeInherits, readThemeInherits } from './index-theme'
export { scanIconDirectory, type CursorFactory } from './scanner'
export {
	CursorFrameMetaSchema,
	CursorMetadataSchema,
	parseCursorMetadata,
	readCursorMetadata,
	type CursorFrameMeta,
} from './metadata'
export { Cursor, nearestSize } from './cursor'
export { CursorTheme } from './theme'
export { alternateShapeNames, CURSOR_SHAPES, isCursorShape, type CursorShape } from './shapes'
