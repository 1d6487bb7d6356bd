import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Cursor } from './cursor'
import { scanIconDirectory } from './scanner'
import { createTempDir, linkShape, removeTempDir } from './testing/theme-fixtures'

describe('scanIconDirectory', () => {
	let root: string
	let dir: string

	beforeEach(() => {
		root = createTempDir()
		dir = join(root, 'cursors')
		mkdirSync(dir)
		writeFileSync(join(dir, 'left_ptr'), 'x')
		writeFileSync(join(dir, 'watch'), 'x')
	})

	afterEach(() => {
		removeTempDir(root)
	})

	it('adds every entry with the factory', () => {
		const cache = new Map<string, Cursor>()
		scanIconDirectory(dir, cache, Cursor.xcursor)

		expect([...cache.keys()]).toEqual(['left_ptr', 'watch'])
		expect(cache.get('watch')?.path).toBe(join(dir, 'watch'))
		expect(cache.get('watch')?.format).toBe('xcursor')
	})

	it('keeps entries already cached', () => {
		const existing = Cursor.svg('/elsewhere/watch')
		const cache = new Map([['watch', existing]])
		scanIconDirectory(dir, cache, Cursor.xcursor)

		expect(cache.get('watch')).toBe(existing)
		expect(cache.get('left_ptr')?.path).toBe(join(dir, 'left_ptr'))
	})

	it('aliases symlinks to the cached target', () => {
		// Sorted before the target, still resolved after it
		linkShape(dir, 'default', 'left_ptr')
		linkShape(dir, 'wait', 'watch')

		const cache = new Map<string, Cursor>()
		scanIconDirectory(dir, cache, Cursor.xcursor)

		expect(cache.get('default')).toBe(cache.get('left_ptr'))
		expect(cache.get('wait')).toBe(cache.get('watch'))
	})

	it('follows symlink chains', () => {
		linkShape(dir, 'arrow', 'left_ptr')
		linkShape(dir, 'default', 'arrow')

		const cache = new Map<string, Cursor>()
		scanIconDirectory(dir, cache, Cursor.xcursor)

		expect(cache.get('default')).toBe(cache.get('left_ptr'))
	})

	it('aliases whatever is cached under the target name', () => {
		const existing = Cursor.xcursor('/first-root/left_ptr')
		const cache = new Map([['left_ptr', existing]])
		linkShape(dir, 'default', 'left_ptr')

		scanIconDirectory(dir, cache, Cursor.xcursor)

		expect(cache.get('default')).toBe(existing)
	})

	it('rejects symlinks leaving the directory', () => {
		const outside = join(root, 'outside')
		mkdirSync(outside)
		writeFileSync(join(outside, 'left_ptr'), 'x')
		linkShape(dir, 'escape', join(outside, 'left_ptr'))
		linkShape(dir, 'parent', '../cursors/../outside/left_ptr')

		const cache = new Map<string, Cursor>()
		scanIconDirectory(dir, cache, Cursor.xcursor)

		expect(cache.has('escape')).toBe(false)
		expect(cache.has('parent')).toBe(false)
	})

	it('skips broken symlinks', () => {
		linkShape(dir, 'broken', 'missing')

		const cache = new Map<string, Cursor>()
		scanIconDirectory(dir, cache, Cursor.xcursor)

		expect(cache.has('broken')).toBe(false)
		expect(cache.size).toBe(2)
	})

	it('accepts a symlinked directory path', () => {
		const link = join(root, 'linked')
		linkShape(root, 'linked', 'cursors')
		linkShape(dir, 'default', 'left_ptr')

		const cache = new Map<string, Cursor>()
		scanIconDirectory(link, cache, Cursor.xcursor)

		expect(cache.get('default')).toBe(cache.get('left_ptr'))
	})

	it('treats a missing directory as empty', () => {
		const cache = new Map<string, Cursor>()
		scanIconDirectory(join(root, 'missing'), cache, Cursor.xcursor)
		expect(cache.size).toBe(0)
	})
})
