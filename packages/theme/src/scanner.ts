/**
 * Icon directory scanner
 */

import { type Dirent, readdirSync, realpathSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import type { Cursor } from './cursor'

export type CursorFactory = (path: string) => Cursor

/**
 * Add every shape in `directory` to `cache` without replacing existing entries
 *
 * Regular entries are added first so that symlinks to siblings find their
 * target. A symlink becomes an alias of the cached cursor named by its
 * target, and only when that target lives in this same directory.
 */
export function scanIconDirectory(directory: string, cache: Map<string, Cursor>, create: CursorFactory): void {
	let entries: Dirent[]
	try {
		entries = readdirSync(directory, { withFileTypes: true })
	} catch {
		return
	}

	entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

	const symlinks: Dirent[] = []
	for (const entry of entries) {
		if (entry.isSymbolicLink()) {
			symlinks.push(entry)
			continue
		}
		if (cache.has(entry.name)) continue
		cache.set(entry.name, create(join(directory, entry.name)))
	}

	if (symlinks.length === 0) return

	const canonical = resolvePath(directory)
	if (canonical === undefined) return

	for (const link of symlinks) {
		if (cache.has(link.name)) continue

		const target = resolvePath(join(directory, link.name))
		if (target === undefined || dirname(target) !== canonical) continue

		const cursor = cache.get(basename(target))
		if (cursor) cache.set(link.name, cursor)
	}
}

/**
 * Canonical path, or undefined for broken links and unreadable paths
 */
function resolvePath(path: string): string | undefined {
	try {
		return realpathSync(path)
	} catch {
		return undefined
	}
}
