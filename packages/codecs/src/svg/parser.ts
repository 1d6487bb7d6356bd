/**
 * SVG XML parser
 * Parses SVG XML into structured elements
 */

import namedColors from './named-colors.json'
import type {
	FillRule,
	GradientStop,
	GradientUnits,
	PathCommand,
	Point,
	RgbaColor,
	SpreadMethod,
	StrokeLinecap,
	StrokeLinejoin,
	SvgBaseElement,
	SvgDocument,
	SvgElement,
	SvgGradient,
	SvgPaint,
	SvgStyle,
	SvgTransform,
	ViewBox,
} from './types'

/** Intrinsic size when neither width/height nor viewBox is given */
const DEFAULT_SIZE = 100

// ─────────────────────────────────────────────────────────────────────────────
// XML Parser
// ─────────────────────────────────────────────────────────────────────────────

interface XmlNode {
	tag: string
	attrs: Record<string, string>
	children: XmlNode[]
	text?: string
}

function parseXml(xml: string): XmlNode | null {
	let pos = 0

	function skipWhitespace(): void {
		while (pos < xml.length && /\s/.test(xml.charAt(pos))) pos++
	}

	function skipUntil(marker: string): boolean {
		const end = xml.indexOf(marker, pos)
		if (end === -1) return false
		pos = end + marker.length
		return true
	}

	function parseTag(): XmlNode | null {
		skipWhitespace()

		// Skip comments, declarations, DOCTYPE
		while (pos < xml.length) {
			if (xml.startsWith('<!--', pos)) {
				if (!skipUntil('-->')) return null
			} else if (xml.startsWith('<?', pos)) {
				if (!skipUntil('?>')) return null
			} else if (xml.startsWith('<!DOCTYPE', pos)) {
				// Internal subset may contain '>' inside brackets
				let depth = 0
				pos += 9
				while (pos < xml.length) {
					const c = xml.charAt(pos++)
					if (c === '[') depth++
					else if (c === ']') depth--
					else if (c === '>' && depth === 0) break
				}
			} else {
				break
			}
			skipWhitespace()
		}

		if (xml.charAt(pos) !== '<') return null
		pos++

		const tagStart = pos
		while (pos < xml.length && /[a-zA-Z0-9:_.-]/.test(xml.charAt(pos))) pos++
		const tag = xml.slice(tagStart, pos).replace(/^svg:/, '')
		if (!tag) return null

		const attrs: Record<string, string> = {}
		while (pos < xml.length) {
			skipWhitespace()
			const c = xml.charAt(pos)
			if (c === '>' || c === '/') break

			const attrStart = pos
			while (pos < xml.length && /[a-zA-Z0-9:_.-]/.test(xml.charAt(pos))) pos++
			const attrName = xml.slice(attrStart, pos)
			if (!attrName) break

			skipWhitespace()
			if (xml.charAt(pos) !== '=') continue
			pos++
			skipWhitespace()

			const quote = xml.charAt(pos)
			if (quote !== '"' && quote !== "'") break
			const valueStart = ++pos
			while (pos < xml.length && xml.charAt(pos) !== quote) pos++
			attrs[attrName] = decodeXmlEntities(xml.slice(valueStart, pos))
			pos++
		}

		// Self-closing tag
		if (xml.charAt(pos) === '/') {
			pos += 2
			return { tag, attrs, children: [] }
		}
		pos++

		const children: XmlNode[] = []
		let text = ''

		while (pos < xml.length) {
			if (xml.startsWith('<!--', pos)) {
				if (!skipUntil('-->')) break
			} else if (xml.startsWith('</', pos)) {
				skipUntil('>')
				break
			} else if (xml.startsWith('<![CDATA[', pos)) {
				const start = pos + 9
				if (!skipUntil(']]>')) break
				text += xml.slice(start, pos - 3)
			} else if (xml.charAt(pos) === '<') {
				const child = parseTag()
				if (!child) break
				children.push(child)
			} else {
				const textStart = pos
				while (pos < xml.length && xml.charAt(pos) !== '<') pos++
				text += decodeXmlEntities(xml.slice(textStart, pos))
			}
		}

		return { tag, attrs, children, text: text.trim() || undefined }
	}

	return parseTag()
}

function decodeXmlEntities(str: string): string {
	return str
		.replace(/&lt;/g, '<')
		.replace(/&gt;/g, '>')
		.replace(/&quot;/g, '"')
		.replace(/&apos;/g, "'")
		.replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(parseInt(code, 10)))
		.replace(/&#x([0-9a-fA-F]+);/g, (_, code: string) => String.fromCharCode(parseInt(code, 16)))
		.replace(/&amp;/g, '&')
}

// ─────────────────────────────────────────────────────────────────────────────
// CSS Parser
// ─────────────────────────────────────────────────────────────────────────────

type CssProperties = Record<string, string>

function parseCss(cssText: string, styles: Map<string, CssProperties>): void {
	const ruleRegex = /([^{]+)\{([^}]*)\}/g
	const stripped = cssText.replace(/\/\*[\s\S]*?\*\//g, '')
	let match: RegExpExecArray | null

	while ((match = ruleRegex.exec(stripped)) !== null) {
		const props = parseStyleDeclarations(match[2] ?? '')
		for (const selector of (match[1] ?? '').split(',')) {
			const key = selector.trim()
			if (key) styles.set(key, { ...styles.get(key), ...props })
		}
	}
}

function parseStyleDeclarations(style: string): CssProperties {
	const props: CssProperties = {}

	for (const decl of style.split(';')) {
		const colon = decl.indexOf(':')
		if (colon === -1) continue
		const name = decl.slice(0, colon).trim()
		const value = decl.slice(colon + 1).replace(/!important/, '').trim()
		if (name && value) props[name] = value
	}

	return props
}

// ─────────────────────────────────────────────────────────────────────────────
// Color Parser
// ─────────────────────────────────────────────────────────────────────────────

const NAMED_COLORS: Record<string, string> = namedColors

export function parseColor(value: string | undefined): RgbaColor | null {
	if (!value) return null

	let color = value.trim().toLowerCase()
	if (color === 'none') return null
	if (color === 'transparent') return { r: 0, g: 0, b: 0, a: 0 }
	color = NAMED_COLORS[color] ?? color

	if (color.startsWith('#')) {
		const hex = color.slice(1)
		if (!/^[0-9a-f]+$/.test(hex)) return null

		if (hex.length === 3 || hex.length === 4) {
			const digit = (i: number) => parseInt(hex.charAt(i) + hex.charAt(i), 16)
			return { r: digit(0), g: digit(1), b: digit(2), a: hex.length === 4 ? digit(3) : 255 }
		}
		if (hex.length === 6 || hex.length === 8) {
			const byte = (i: number) => parseInt(hex.slice(i * 2, i * 2 + 2), 16)
			return { r: byte(0), g: byte(1), b: byte(2), a: hex.length === 8 ? byte(3) : 255 }
		}
		return null
	}

	// rgb()/rgba() with numbers or percentages
	const rgbMatch = color.match(/^rgba?\(\s*([\d.]+)(%?)\s*[,\s]\s*([\d.]+)(%?)\s*[,\s]\s*([\d.]+)(%?)\s*(?:[,/]\s*([\d.]+)(%?)\s*)?\)$/)
	if (rgbMatch) {
		const channel = (num: string | undefined, percent: string | undefined) => {
			const v = parseFloat(num ?? '0')
			return clampByte(percent ? v * 2.55 : v)
		}
		return {
			r: channel(rgbMatch[1], rgbMatch[2]),
			g: channel(rgbMatch[3], rgbMatch[4]),
			b: channel(rgbMatch[5], rgbMatch[6]),
			a: parseAlpha(rgbMatch[7], rgbMatch[8]),
		}
	}

	const hslMatch = color.match(/^hsla?\(\s*([\d.]+)\s*,\s*([\d.]+)%\s*,\s*([\d.]+)%\s*(?:,\s*([\d.]+)(%?)\s*)?\)$/)
	if (hslMatch) {
		const h = parseFloat(hslMatch[1] ?? '0') / 360
		const s = parseFloat(hslMatch[2] ?? '0') / 100
		const l = parseFloat(hslMatch[3] ?? '0') / 100
		return { ...hslToRgb(h, s, l), a: parseAlpha(hslMatch[4], hslMatch[5]) }
	}

	return null
}

function parseAlpha(num: string | undefined, percent: string | undefined): number {
	if (num === undefined) return 255
	const v = parseFloat(num)
	return clampByte((percent ? v / 100 : v) * 255)
}

function clampByte(v: number): number {
	return Math.max(0, Math.min(255, Math.round(v)))
}

function hslToRgb(h: number, s: number, l: number): { r: number; g: number; b: number } {
	if (s === 0) {
		const v = clampByte(l * 255)
		return { r: v, g: v, b: v }
	}

	const q = l < 0.5 ? l * (1 + s) : l + s - l * s
	const p = 2 * l - q
	return {
		r: clampByte(hueToRgb(p, q, h + 1 / 3) * 255),
		g: clampByte(hueToRgb(p, q, h) * 255),
		b: clampByte(hueToRgb(p, q, h - 1 / 3) * 255),
	}
}

function hueToRgb(p: number, q: number, t: number): number {
	if (t < 0) t += 1
	if (t > 1) t -= 1
	if (t < 1 / 6) return p + (q - p) * 6 * t
	if (t < 1 / 2) return q
	if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6
	return p
}

export function parsePaint(value: string): SvgPaint {
	const trimmed = value.trim()
	if (trimmed === 'none') return { type: 'none' }
	if (trimmed === 'currentColor') return { type: 'currentColor' }

	// url(#id) with an optional fallback color
	const urlMatch = trimmed.match(/^url\(\s*['"]?#([^'")]+)['"]?\s*\)\s*(.*)$/)
	if (urlMatch) {
		return { type: 'url', id: urlMatch[1] ?? '', fallback: parseColor(urlMatch[2]) ?? undefined }
	}

	const color = parseColor(trimmed)
	return color ? { type: 'color', color } : { type: 'none' }
}

// ─────────────────────────────────────────────────────────────────────────────
// Transform Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseTransform(str: string): SvgTransform[] {
	const transforms: SvgTransform[] = []
	const regex = /(\w+)\s*\(([^)]*)\)/g
	let match: RegExpExecArray | null

	while ((match = regex.exec(str)) !== null) {
		const values = parseNumberList(match[2] ?? '')
		const v = (i: number, fallback: number) => values[i] ?? fallback

		switch (match[1]) {
			case 'translate':
				transforms.push({ type: 'translate', x: v(0, 0), y: v(1, 0) })
				break
			case 'scale':
				transforms.push({ type: 'scale', x: v(0, 1), y: v(1, v(0, 1)) })
				break
			case 'rotate':
				transforms.push({ type: 'rotate', angle: v(0, 0), cx: values[1], cy: values[2] })
				break
			case 'skewX':
				transforms.push({ type: 'skewX', angle: v(0, 0) })
				break
			case 'skewY':
				transforms.push({ type: 'skewY', angle: v(0, 0) })
				break
			case 'matrix':
				transforms.push({ type: 'matrix', a: v(0, 1), b: v(1, 0), c: v(2, 0), d: v(3, 1), e: v(4, 0), f: v(5, 0) })
				break
		}
	}

	return transforms
}

function parseNumberList(str: string): number[] {
	const numbers: number[] = []
	for (const token of str.match(/[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?/gi) ?? []) {
		numbers.push(parseFloat(token))
	}
	return numbers
}

// ─────────────────────────────────────────────────────────────────────────────
// Path Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parsePathCommands(d: string): PathCommand[] {
	const commands: PathCommand[] = []

	// Numbers may run together ("1.5.5", "10-5"), arc flags may be packed ("011")
	const tokenRegex = /([MmLlHhVvCcSsQqTtAaZz])|([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/g
	const tokens: string[] = []
	let tokenMatch: RegExpExecArray | null

	while ((tokenMatch = tokenRegex.exec(d)) !== null) {
		tokens.push(tokenMatch[0])
	}

	let i = 0
	let currentCmd = ''

	function getNumber(): number {
		const val = parseFloat(tokens[i] ?? '')
		i++
		return isNaN(val) ? 0 : val
	}

	function getFlag(): boolean {
		const token = tokens[i] ?? '0'
		// A packed flag token like "01.5" holds the flag in its first digit
		if (token.length > 1 && (token[0] === '0' || token[0] === '1')) {
			tokens[i] = token.slice(1)
			return token[0] === '1'
		}
		return getNumber() !== 0
	}

	while (i < tokens.length) {
		const token = tokens[i] ?? ''

		if (/^[MmLlHhVvCcSsQqTtAaZz]$/.test(token)) {
			currentCmd = token
			i++
			if (currentCmd === 'Z' || currentCmd === 'z') {
				commands.push({ type: 'Z' })
				continue
			}
		}

		switch (currentCmd) {
			case 'M':
				commands.push({ type: 'M', x: getNumber(), y: getNumber() })
				currentCmd = 'L' // Subsequent coords are line-to
				break
			case 'm':
				commands.push({ type: 'm', dx: getNumber(), dy: getNumber() })
				currentCmd = 'l'
				break
			case 'L':
				commands.push({ type: 'L', x: getNumber(), y: getNumber() })
				break
			case 'l':
				commands.push({ type: 'l', dx: getNumber(), dy: getNumber() })
				break
			case 'H':
				commands.push({ type: 'H', x: getNumber() })
				break
			case 'h':
				commands.push({ type: 'h', dx: getNumber() })
				break
			case 'V':
				commands.push({ type: 'V', y: getNumber() })
				break
			case 'v':
				commands.push({ type: 'v', dy: getNumber() })
				break
			case 'C':
				commands.push({
					type: 'C',
					x1: getNumber(), y1: getNumber(),
					x2: getNumber(), y2: getNumber(),
					x: getNumber(), y: getNumber(),
				})
				break
			case 'c':
				commands.push({
					type: 'c',
					dx1: getNumber(), dy1: getNumber(),
					dx2: getNumber(), dy2: getNumber(),
					dx: getNumber(), dy: getNumber(),
				})
				break
			case 'S':
				commands.push({ type: 'S', x2: getNumber(), y2: getNumber(), x: getNumber(), y: getNumber() })
				break
			case 's':
				commands.push({ type: 's', dx2: getNumber(), dy2: getNumber(), dx: getNumber(), dy: getNumber() })
				break
			case 'Q':
				commands.push({ type: 'Q', x1: getNumber(), y1: getNumber(), x: getNumber(), y: getNumber() })
				break
			case 'q':
				commands.push({ type: 'q', dx1: getNumber(), dy1: getNumber(), dx: getNumber(), dy: getNumber() })
				break
			case 'T':
				commands.push({ type: 'T', x: getNumber(), y: getNumber() })
				break
			case 't':
				commands.push({ type: 't', dx: getNumber(), dy: getNumber() })
				break
			case 'A':
				commands.push({
					type: 'A',
					rx: getNumber(), ry: getNumber(),
					angle: getNumber(),
					largeArc: getFlag(),
					sweep: getFlag(),
					x: getNumber(), y: getNumber(),
				})
				break
			case 'a':
				commands.push({
					type: 'a',
					rx: getNumber(), ry: getNumber(),
					angle: getNumber(),
					largeArc: getFlag(),
					sweep: getFlag(),
					dx: getNumber(), dy: getNumber(),
				})
				break
			default:
				i++ // Numbers before the first command
		}
	}

	return commands
}

// ─────────────────────────────────────────────────────────────────────────────
// Main SVG Parser
// ─────────────────────────────────────────────────────────────────────────────

interface ParseContext {
	styles: Map<string, CssProperties>
	defs: Map<string, SvgElement>
	gradients: Map<string, SvgGradient>
}

/**
 * Parse SVG text into a document
 */
export function parseSvg(svgText: string): SvgDocument {
	const root = parseXml(svgText)

	if (!root || root.tag !== 'svg') {
		throw new Error('Invalid SVG: root element must be <svg>')
	}

	const viewBox = parseViewBox(root.attrs.viewBox)
	const width = parseLength(root.attrs.width) ?? viewBox?.width ?? DEFAULT_SIZE
	const height = parseLength(root.attrs.height) ?? viewBox?.height ?? DEFAULT_SIZE

	const ctx: ParseContext = { styles: new Map(), defs: new Map(), gradients: new Map() }
	collectStyles(root, ctx.styles)
	collectGradients(root, ctx)

	const rootStyle = parseStyle(resolveProperties(root, ctx))

	return {
		width,
		height,
		viewBox: viewBox ?? { x: 0, y: 0, width, height },
		style: rootStyle,
		elements: parseChildren(root, ctx),
		defs: ctx.defs,
		gradients: ctx.gradients,
	}
}

function parseLength(value: string | undefined): number | undefined {
	if (!value || value.trim().endsWith('%')) return undefined
	// Units other than px are taken at face value
	const num = parseFloat(value)
	return isNaN(num) || num <= 0 ? undefined : num
}

function parseViewBox(value: string | undefined): ViewBox | undefined {
	if (!value) return undefined
	const [x, y, width, height] = parseNumberList(value)
	if (x === undefined || y === undefined || width === undefined || height === undefined) return undefined
	if (width <= 0 || height <= 0) return undefined
	return { x, y, width, height }
}

function collectStyles(node: XmlNode, styles: Map<string, CssProperties>): void {
	for (const child of node.children) {
		if (child.tag === 'style') {
			parseCss(child.text ?? '', styles)
		} else {
			collectStyles(child, styles)
		}
	}
}

function parseChildren(node: XmlNode, ctx: ParseContext): SvgElement[] {
	const elements: SvgElement[] = []

	for (const child of node.children) {
		// Referenced through <use>, never drawn directly
		if (child.tag === 'defs') {
			parseChildren(child, ctx)
			continue
		}
		if (child.tag === 'symbol') {
			parseElement({ ...child, tag: 'g' }, ctx)
			continue
		}

		const el = parseElement(child, ctx)
		if (el) elements.push(el)
	}

	return elements
}

function parseElement(node: XmlNode, ctx: ParseContext): SvgElement | null {
	const el = parseShape(node, ctx)

	if (el && node.attrs.id && !ctx.defs.has(node.attrs.id)) {
		ctx.defs.set(node.attrs.id, el)
	}

	return el
}

function parseShape(node: XmlNode, ctx: ParseContext): SvgElement | null {
	const { attrs } = node
	const base = parseBaseAttributes(node, resolveProperties(node, ctx))
	const num = (name: string, fallback = 0) => parseNumberAttr(attrs[name]) ?? fallback

	switch (node.tag) {
		case 'rect':
			return {
				type: 'rect',
				...base,
				x: num('x'),
				y: num('y'),
				width: num('width'),
				height: num('height'),
				rx: parseNumberAttr(attrs.rx),
				ry: parseNumberAttr(attrs.ry),
			}
		case 'circle':
			return { type: 'circle', ...base, cx: num('cx'), cy: num('cy'), r: num('r') }
		case 'ellipse':
			return { type: 'ellipse', ...base, cx: num('cx'), cy: num('cy'), rx: num('rx'), ry: num('ry') }
		case 'line':
			return { type: 'line', ...base, x1: num('x1'), y1: num('y1'), x2: num('x2'), y2: num('y2') }
		case 'polyline':
			return { type: 'polyline', ...base, points: parsePoints(attrs.points ?? '') }
		case 'polygon':
			return { type: 'polygon', ...base, points: parsePoints(attrs.points ?? '') }
		case 'path':
			return { type: 'path', ...base, commands: parsePathCommands(attrs.d ?? '') }
		case 'g':
		case 'a':
		case 'switch':
			return { type: 'group', ...base, children: parseChildren(node, ctx) }
		case 'use':
			return {
				type: 'use',
				...base,
				x: num('x'),
				y: num('y'),
				href: (attrs.href ?? attrs['xlink:href'] ?? '').replace(/^#/, ''),
			}
		default:
			return null
	}
}

function parseNumberAttr(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const n = parseFloat(value)
	return isNaN(n) ? undefined : n
}

function parsePoints(str: string): Point[] {
	const values = parseNumberList(str)
	const points: Point[] = []

	for (let i = 0; i + 1 < values.length; i += 2) {
		points.push({ x: values[i] ?? 0, y: values[i + 1] ?? 0 })
	}

	return points
}

// ─────────────────────────────────────────────────────────────────────────────
// Presentation attributes
// ─────────────────────────────────────────────────────────────────────────────

const PRESENTATION_ATTRIBUTES = [
	'fill',
	'fill-rule',
	'fill-opacity',
	'stroke',
	'stroke-width',
	'stroke-linecap',
	'stroke-linejoin',
	'stroke-opacity',
	'opacity',
	'color',
	'display',
] as const

/**
 * Attributes, then tag, class and id rules, then the inline style attribute
 */
function resolveProperties(node: XmlNode, ctx: ParseContext): CssProperties {
	const props: CssProperties = {}

	for (const name of PRESENTATION_ATTRIBUTES) {
		const value = node.attrs[name]
		if (value !== undefined) props[name] = value
	}

	const selectors = [node.tag]
	for (const cls of (node.attrs.class ?? '').split(/\s+/)) {
		if (cls) selectors.push(`.${cls}`)
	}
	if (node.attrs.id) selectors.push(`#${node.attrs.id}`)

	for (const selector of selectors) {
		const rule = ctx.styles.get(selector)
		if (rule) Object.assign(props, rule)
	}

	Object.assign(props, parseStyleDeclarations(node.attrs.style ?? ''))
	return props
}

function parseStyle(props: CssProperties): SvgStyle {
	const value = (name: string) => {
		const v = props[name]?.trim()
		return v && v !== 'inherit' ? v : undefined
	}
	const fill = value('fill')
	const stroke = value('stroke')
	const strokeWidth = parseNumberAttr(value('stroke-width'))

	return {
		fill: fill ? parsePaint(fill) : undefined,
		fillRule: parseFillRule(value('fill-rule')),
		fillOpacity: parseOpacity(value('fill-opacity')),
		stroke: stroke ? parsePaint(stroke) : undefined,
		strokeWidth: strokeWidth !== undefined && strokeWidth >= 0 ? strokeWidth : undefined,
		strokeLinecap: parseLinecap(value('stroke-linecap')),
		strokeLinejoin: parseLinejoin(value('stroke-linejoin')),
		strokeOpacity: parseOpacity(value('stroke-opacity')),
		color: parseColor(value('color')) ?? undefined,
	}
}

function parseBaseAttributes(node: XmlNode, props: CssProperties): SvgBaseElement {
	return {
		...parseStyle(props),
		id: node.attrs.id,
		opacity: parseOpacity(props.opacity),
		transform: node.attrs.transform ? parseTransform(node.attrs.transform) : undefined,
		display: props.display?.trim() === 'none' ? 'none' : undefined,
	}
}

function parseOpacity(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const n = parseFloat(value)
	if (isNaN(n)) return undefined
	const v = value.trim().endsWith('%') ? n / 100 : n
	return Math.max(0, Math.min(1, v))
}

function parseFillRule(value: string | undefined): FillRule | undefined {
	return value === 'nonzero' || value === 'evenodd' ? value : undefined
}

function parseLinecap(value: string | undefined): StrokeLinecap | undefined {
	return value === 'butt' || value === 'round' || value === 'square' ? value : undefined
}

function parseLinejoin(value: string | undefined): StrokeLinejoin | undefined {
	if (value === 'round' || value === 'bevel') return value
	// miter-clip and arcs fall back to miter
	return value?.startsWith('miter') || value === 'arcs' ? 'miter' : undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// Gradients
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Gather every gradient in the tree, resolving href chains for stops and attributes
 */
function collectGradients(root: XmlNode, ctx: ParseContext): void {
	const nodes = new Map<string, XmlNode>()

	const walk = (node: XmlNode) => {
		for (const child of node.children) {
			if ((child.tag === 'linearGradient' || child.tag === 'radialGradient') && child.attrs.id) {
				if (!nodes.has(child.attrs.id)) nodes.set(child.attrs.id, child)
			}
			walk(child)
		}
	}
	walk(root)

	for (const [id, node] of nodes) {
		ctx.gradients.set(id, buildGradient(node, nodes))
	}
}

function buildGradient(node: XmlNode, nodes: Map<string, XmlNode>): SvgGradient {
	// Own attributes first, then the referenced gradients' in chain order
	const chain: XmlNode[] = [node]
	const seen = new Set<XmlNode>([node])
	let current = node
	for (;;) {
		const href = (current.attrs.href ?? current.attrs['xlink:href'])?.replace(/^#/, '')
		const next = href ? nodes.get(href) : undefined
		if (!next || seen.has(next)) break
		chain.push(next)
		seen.add(next)
		current = next
	}

	const attr = (name: string) => {
		for (const n of chain) {
			const v = n.attrs[name]
			if (v !== undefined) return v
		}
		return undefined
	}

	let stops: GradientStop[] = []
	for (const n of chain) {
		stops = parseGradientStops(n)
		if (stops.length > 0) break
	}

	const units: GradientUnits = attr('gradientUnits') === 'userSpaceOnUse' ? 'userSpaceOnUse' : 'objectBoundingBox'
	const spreadAttr = attr('spreadMethod')
	const spread: SpreadMethod = spreadAttr === 'reflect' || spreadAttr === 'repeat' ? spreadAttr : 'pad'
	const transformAttr = attr('gradientTransform')
	const transform = transformAttr ? parseTransform(transformAttr) : undefined
	const coord = (name: string, fallback: number) => parseFraction(attr(name), fallback)

	if (node.tag === 'radialGradient') {
		return { type: 'radialGradient', cx: coord('cx', 0.5), cy: coord('cy', 0.5), r: coord('r', 0.5), stops, units, transform, spread }
	}

	return { type: 'linearGradient', x1: coord('x1', 0), y1: coord('y1', 0), x2: coord('x2', 1), y2: coord('y2', 0), stops, units, transform, spread }
}

function parseFraction(value: string | undefined, fallback: number): number {
	if (value === undefined) return fallback
	const n = parseFloat(value)
	if (isNaN(n)) return fallback
	return value.trim().endsWith('%') ? n / 100 : n
}

function parseGradientStops(node: XmlNode): GradientStop[] {
	const stops: GradientStop[] = []
	let lastOffset = 0

	for (const child of node.children) {
		if (child.tag !== 'stop') continue

		const props = { ...child.attrs, ...parseStyleDeclarations(child.attrs.style ?? '') }
		// Offsets never decrease
		const offset = Math.max(lastOffset, Math.max(0, Math.min(1, parseFraction(props.offset, 0))))
		lastOffset = offset

		const color = parseColor(props['stop-color'] ?? 'black') ?? { r: 0, g: 0, b: 0, a: 255 }
		const opacity = parseOpacity(props['stop-opacity']) ?? 1
		stops.push({ offset, color: { ...color, a: Math.round(color.a * opacity) } })
	}

	return stops
}
