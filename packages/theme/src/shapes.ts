/**
 * Standard cursor shape names (CSS `cursor` keywords) and the legacy X11
 * names themes often ship instead
 */

import shapeAlternates from './shapes.json'

export type CursorShape = keyof typeof shapeAlternates

export function isCursorShape(name: string): name is CursorShape {
	return Object.hasOwn(shapeAlternates, name)
}

/**
 * All standard shape names
 */
export const CURSOR_SHAPES: readonly CursorShape[] = Object.keys(shapeAlternates).filter(isCursorShape)

/**
 * Legacy names for a shape, most common first
 */
export function alternateShapeNames(shape: CursorShape): readonly string[] {
	return shapeAlternates[shape]
}
