import { afterEach, describe, expect, it, vi } from 'vitest'
import { computeSearchPaths, getSearchPaths } from './search-path'

describe('computeSearchPaths', () => {
	it('uses defaults with only $HOME', () => {
		expect(computeSearchPaths({ HOME: '/home/user' })).toEqual([
			'/home/user/.local/share/icons',
			'/home/user/.icons',
			'/usr/share/icons',
		])
	})

	it('honors XDG data directories', () => {
		const paths = computeSearchPaths({
			HOME: '/home/user',
			XDG_DATA_HOME: '/data',
			XDG_DATA_DIRS: '/usr/local/share:/usr/share',
		})
		expect(paths).toEqual(['/data/icons', '/home/user/.icons', '/usr/local/share/icons', '/usr/share/icons'])
	})

	it('prefers $XDG_HOME over $HOME', () => {
		expect(computeSearchPaths({ XDG_HOME: '/xdg', HOME: '/home/user' })[1]).toBe('/xdg/.icons')
	})

	it('ignores $XCURSOR_PATH', () => {
		const paths = computeSearchPaths({
			HOME: '/home/user',
			XDG_DATA_HOME: '/data',
			XCURSOR_PATH: '~/.icons:/usr/share/pixmaps',
		})
		expect(paths).toEqual(['/data/icons', '/home/user/.icons', '/usr/share/icons'])
	})

	it('treats empty variables and segments as unset', () => {
		expect(computeSearchPaths({ HOME: '/home/user', XDG_DATA_HOME: '', XDG_DATA_DIRS: '' })).toEqual([
			'/home/user/.local/share/icons',
			'/home/user/.icons',
			'/usr/share/icons',
		])
		expect(computeSearchPaths({ HOME: '/h', XDG_DATA_DIRS: '/x::/y:' }).slice(2)).toEqual(['/x/icons', '/y/icons'])
	})

	it('requires a home directory', () => {
		expect(() => computeSearchPaths({})).toThrow('$HOME is not set')
		expect(() => computeSearchPaths({ HOME: '' })).toThrow('$HOME is not set')
	})
})

describe('getSearchPaths', () => {
	afterEach(() => {
		vi.unstubAllEnvs()
	})

	it('computes once from the environment', () => {
		vi.stubEnv('XDG_HOME', '')
		vi.stubEnv('HOME', '/home/test')
		vi.stubEnv('XDG_DATA_HOME', '')
		vi.stubEnv('XDG_DATA_DIRS', '')

		const first = getSearchPaths()
		expect(first).toEqual(['/home/test/.local/share/icons', '/home/test/.icons', '/usr/share/icons'])
		expect(Object.isFrozen(first)).toBe(true)

		vi.stubEnv('HOME', '/home/other')
		expect(getSearchPaths()).toBe(first)
	})
})
