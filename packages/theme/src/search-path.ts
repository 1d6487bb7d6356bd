/**
 * Cursor theme search path
 *
 * Follows the XDG base directory layout that X11 and Wayland cursor
 * loaders use:
 * 1. $XDG_DATA_HOME/icons, else ~/.local/share/icons
 * 2. ~/.icons
 * 3. $XDG_DATA_DIRS/<dir>/icons, else /usr/share/icons
 */

import { join } from 'node:path'

export type Environment = Readonly<Record<string, string | undefined>>

const DEFAULT_SYSTEM_ICONS = '/usr/share/icons'

/**
 * Cached search path for the process
 */
let searchPaths: readonly string[] | null = null

/**
 * Read an environment variable, treating an empty value as unset
 */
function getVar(env: Environment, key: string): string | undefined {
	const value = env[key]
	return value ? value : undefined
}

function splitPaths(value: string): string[] {
	return value.split(':').filter((path) => path.length > 0)
}

/**
 * Compute the ordered theme roots, user roots first
 */
export function computeSearchPaths(env: Environment): string[] {
	const home = getVar(env, 'XDG_HOME') ?? getVar(env, 'HOME')
	if (!home) {
		throw new Error('$HOME is not set')
	}

	const dataHome = getVar(env, 'XDG_DATA_HOME') ?? join(home, '.local', 'share')
	const paths = [join(dataHome, 'icons'), join(home, '.icons')]

	// An empty $XDG_DATA_DIRS falls back like an unset one instead of
	// yielding a relative `icons` root
	const dataDirs = getVar(env, 'XDG_DATA_DIRS')
	if (dataDirs) {
		paths.push(...splitPaths(dataDirs).map((dir) => join(dir, 'icons')))
	} else {
		paths.push(DEFAULT_SYSTEM_ICONS)
	}

	return paths
}

/**
 * Get the search path for this process (computed from process.env on first use)
 */
export function getSearchPaths(): readonly string[] {
	if (searchPaths) return searchPaths

	searchPaths = Object.freeze(computeSearchPaths(process.env))
	return searchPaths
}
