import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'

describe('parseArgs', () => {
	it('collects the theme and shapes', () => {
		expect(parseArgs(['Adwaita', 'default', 'wait'])).toEqual({
			inputs: ['Adwaita', 'default', 'wait'],
			options: {},
		})
	})

	it('parses flags', () => {
		const { options } = parseArgs(['--list', '-v', '--quiet', '--dry-run', '-i'])
		expect(options).toEqual({ list: true, verbose: true, quiet: true, dryRun: true, info: true })
	})

	it('parses size and output directory', () => {
		const { inputs, options } = parseArgs(['breeze', '--size', '48', 'wait', '-o', 'out/'])
		expect(inputs).toEqual(['breeze', 'wait'])
		expect(options.size).toBe(48)
		expect(options.out).toBe('out/')
	})

	it('rejects invalid sizes', () => {
		expect(() => parseArgs(['-s', '0'])).toThrow('Invalid size: 0')
		expect(() => parseArgs(['-s', '2.5'])).toThrow('Invalid size: 2.5')
		expect(() => parseArgs(['-s', 'big'])).toThrow('Invalid size: big')
	})

	it('requires option values', () => {
		expect(() => parseArgs(['--size'])).toThrow('--size requires a value')
		expect(() => parseArgs(['--out', '--list'])).toThrow('--out requires a value')
	})

	it('rejects unknown options', () => {
		expect(() => parseArgs(['--frobnicate'])).toThrow('Unknown option: --frobnicate')
	})
})
