/**
 * Cursor theme resolution
 */

import { statSync } from 'node:fs'
import { join } from 'node:path'
import { Cursor } from './cursor'
import { readThemeInherits } from './index-theme'
import { scanIconDirectory } from './scanner'
import { getSearchPaths } from './search-path'
import { alternateShapeNames, isCursorShape } from './shapes'
import type { LoadOptions } from './types'

const SVG_DIRECTORY = 'cursors_scalable'
const XCURSOR_DIRECTORY = 'cursors'
const INDEX_FILE = 'index.theme'

/**
 * A loaded cursor theme: shape name -> cursor
 *
 * Shapes from the theme itself win over inherited ones, and within one theme
 * earlier search roots win over later ones. Symlinked shapes share the
 * Cursor of their target.
 */
export class CursorTheme {
	private constructor(
		readonly name: string,
		private readonly cache: ReadonlyMap<string, Cursor>
	) {}

	/**
	 * Load a theme and everything it inherits
	 * Returns undefined when no cursor was found anywhere
	 */
	static load(name: string, options: LoadOptions = {}): CursorTheme | undefined {
		const roots = options.searchPaths ?? getSearchPaths()
		const cache = new Map<string, Cursor>()

		discover(name, roots, cache)

		if (cache.size === 0) return undefined
		return new CursorTheme(name, cache)
	}

	icon(shape: string): Cursor | undefined {
		return this.cache.get(shape)
	}

	has(shape: string): boolean {
		return this.cache.has(shape)
	}

	/**
	 * Look up a shape, falling back to its legacy X11 names
	 */
	resolve(shape: string): Cursor | undefined {
		const cursor = this.cache.get(shape)
		if (cursor || !isCursorShape(shape)) return cursor

		for (const alternate of alternateShapeNames(shape)) {
			const found = this.cache.get(alternate)
			if (found) return found
		}
		return undefined
	}

	/**
	 * Shape names, sorted
	 */
	shapes(): string[] {
		return [...this.cache.keys()].sort()
	}
}

/**
 * Walk the inheritance chain depth-first, scanning each theme in every root
 */
function discover(name: string, roots: readonly string[], cache: Map<string, Cursor>): void {
	const stack = [name]
	const visited = new Set<string>()

	for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
		// Cyclic Inherits chains stop at the first repeat
		if (visited.has(current)) continue
		visited.add(current)

		let inherits: string | undefined

		for (const root of roots) {
			const themeDir = join(root, current)
			if (!isDirectory(themeDir)) continue

			// A theme directory provides either SVG or Xcursor icons, never both
			const svgDir = join(themeDir, SVG_DIRECTORY)
			const xcursorDir = join(themeDir, XCURSOR_DIRECTORY)
			if (isDirectory(svgDir)) {
				scanIconDirectory(svgDir, cache, Cursor.svg)
			} else if (isDirectory(xcursorDir)) {
				scanIconDirectory(xcursorDir, cache, Cursor.xcursor)
			}

			if (inherits === undefined) {
				inherits = readThemeInherits(join(themeDir, INDEX_FILE))
			}
		}

		if (inherits !== undefined) stack.push(inherits)
	}
}

function isDirectory(path: string): boolean {
	try {
		return statSync(path).isDirectory()
	} catch {
		return false
	}
}
