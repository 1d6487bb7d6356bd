/**
 * Command line parsing for the cursorkit CLI
 */

export interface CliOptions {
	// Output
	size?: number
	out?: string

	// Flags
	verbose?: boolean
	quiet?: boolean
	dryRun?: boolean

	// Commands
	list?: boolean
	info?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	/** Theme name followed by shape names */
	inputs: string[]
	options: CliOptions
}

export const DEFAULT_SIZE = 24

/**
 * Parse argv (without node and script path)
 * Throws on unknown options and invalid values
 */
export function parseArgs(args: string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i] ?? ''

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--list' || arg === '-l') {
			options.list = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--dry-run') {
			options.dryRun = true
		} else if (arg === '--size' || arg === '-s') {
			options.size = parseSize(requireValue(args, ++i, arg))
		} else if (arg === '--out' || arg === '-o') {
			options.out = requireValue(args, ++i, arg)
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

function requireValue(args: string[], index: number, option: string): string {
	const value = args[index]
	if (value === undefined || value.startsWith('-')) {
		throw new Error(`${option} requires a value`)
	}
	return value
}

function parseSize(value: string): number {
	const size = Number(value)
	if (!Number.isInteger(size) || size <= 0) {
		throw new Error(`Invalid size: ${value}`)
	}
	return size
}
