/**
 * index.theme reader
 * Only the Inherits key matters for cursor lookup
 */

import { readFileSync } from 'node:fs'

const INHERITS = 'Inherits'

function isSeparator(ch: string): boolean {
	return ch === ',' || ch === ';' || /\s/.test(ch)
}

/**
 * Get the first theme named by an `Inherits=` line
 *
 * The value starts after any separators (whitespace, `,`, `;`) and ends at
 * the next one. Lines with an empty value are skipped.
 */
export function parseThemeInherits(text: string): string | undefined {
	for (const line of text.split('\n')) {
		if (!line.startsWith(INHERITS)) continue

		const rest = line.slice(INHERITS.length).trimStart()
		if (rest.charAt(0) !== '=') continue

		let start = 1
		while (start < rest.length && isSeparator(rest.charAt(start))) start++
		let end = start
		while (end < rest.length && !isSeparator(rest.charAt(end))) end++

		const inherits = rest.slice(start, end)
		if (inherits) return inherits
	}

	return undefined
}

/**
 * Read the parent theme from an index.theme file
 * Missing or unreadable files declare nothing
 */
export function readThemeInherits(path: string): string | undefined {
	let text: string
	try {
		text = readFileSync(path, 'utf8')
	} catch {
		return undefined
	}
	return parseThemeInherits(text)
}
