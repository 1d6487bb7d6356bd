#!/usr/bin/env tsx
/**
 * cursorkit CLI - inspect cursor themes and export cursor frames
 */

import { basename, resolve } from 'node:path'
import { getMimeType } from '@cursorkit/core'
import { type Cursor, CursorTheme, getSearchPaths } from '@cursorkit/theme'
import { type CliOptions, DEFAULT_SIZE, parseArgs } from './args'
import { describeFrame, exportFrames } from './export'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const HELP = `
cursorkit - Cursor theme inspector and frame exporter

USAGE:
  cursorkit <theme> --list                   List the shapes of a theme
  cursorkit <theme> --info                   Show theme summary
  cursorkit <theme> <shape...> [options]     Export frames as PNG

OPTIONS:
  -s, --size <px>       Requested cursor size (default ${DEFAULT_SIZE})
  -o, --out <dir>       Output directory (default .)
  -l, --list            List shapes
  -i, --info            Show theme summary
  --dry-run             Show what would be written without writing
  -v, --verbose         Verbose output
  --quiet               Suppress output
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  cursorkit Adwaita --list
  cursorkit breeze_cursors wait --size 48          # wait-48-0.png, wait-48-1.png, ...
  cursorkit Adwaita default pointer -o out/

Shapes accept standard names (default, pointer, wait) and fall back to
legacy X11 names (left_ptr, hand2, watch).
`

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function showHelp(): void {
	console.log(HELP)
}

function showVersion(): void {
	console.log(`cursorkit v${VERSION}`)
}

/**
 * Alias marker for shapes whose cursor was found under another name
 */
function aliasOf(shape: string, cursor: Cursor): string | null {
	const target = basename(cursor.path)
	return target === shape ? null : target
}

function listShapes(theme: CursorTheme, options: CliOptions): void {
	for (const shape of theme.shapes()) {
		const cursor = theme.icon(shape)
		if (!cursor) continue

		const alias = aliasOf(shape, cursor)
		let line = alias ? `${shape} -> ${alias}` : shape
		if (options.verbose) {
			line += `  (${cursor.format}: ${cursor.path})`
		}
		console.log(line)
	}
}

function showInfo(theme: CursorTheme, options: CliOptions): void {
	const shapes = theme.shapes()
	const counts = { svg: 0, xcursor: 0 }
	let aliases = 0

	for (const shape of shapes) {
		const cursor = theme.icon(shape)
		if (!cursor) continue
		counts[cursor.format]++
		if (aliasOf(shape, cursor)) aliases++
	}

	console.log(`\nTheme: ${theme.name}`)
	console.log(`Shapes: ${shapes.length} (${aliases} aliases)`)
	console.log(`SVG cursors: ${counts.svg} (${getMimeType('svg')})`)
	console.log(`Xcursor cursors: ${counts.xcursor} (${getMimeType('xcursor')})`)

	if (options.verbose) {
		console.log('Search path:')
		for (const path of getSearchPaths()) {
			console.log(`  ${path}`)
		}
	}

	console.log()
}

/**
 * Export every frame of a shape; false when the shape has nothing to export
 */
function exportShape(theme: CursorTheme, shape: string, options: CliOptions): boolean {
	const cursor = theme.resolve(shape)
	if (!cursor) {
		console.error(`Shape not found: ${shape}`)
		return false
	}

	const size = options.size ?? DEFAULT_SIZE
	const frames = cursor.frames(size)
	if (!frames) {
		console.error(`No frames for shape: ${shape}`)
		return false
	}

	if (options.verbose && !options.quiet) {
		console.log(`${shape}: ${cursor.format} ${cursor.path}`)
	}

	const outDir = resolve(options.out ?? '.')
	for (const { path, frame } of exportFrames(frames, shape, size, outDir, options.dryRun)) {
		if (!options.quiet) {
			const prefix = options.dryRun ? 'Would write' : 'Wrote'
			console.log(`${prefix} ${path}  ${describeFrame(frame)}`)
		}
	}

	return true
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function main(): void {
	const { inputs, options } = parseArgs(process.argv.slice(2))

	if (options.help) {
		showHelp()
		return
	}

	if (options.version) {
		showVersion()
		return
	}

	const [themeName, ...shapes] = inputs
	if (!themeName) {
		showHelp()
		return
	}

	const theme = CursorTheme.load(themeName)
	if (!theme) {
		console.error(`Theme not found: ${themeName}`)
		process.exit(1)
	}

	if (options.info) {
		showInfo(theme, options)
		return
	}

	if (options.list || shapes.length === 0) {
		listShapes(theme, options)
		return
	}

	let failed = 0
	for (const shape of shapes) {
		if (!exportShape(theme, shape, options)) failed++
	}

	if (failed > 0) {
		process.exit(1)
	}
}

try {
	main()
} catch (err) {
	console.error('Error:', err instanceof Error ? err.message : err)
	process.exit(1)
}
