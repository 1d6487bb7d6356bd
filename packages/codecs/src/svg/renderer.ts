/**
 * SVG rasterizer
 * Renders a parsed document at a uniform scale with anti-aliased coverage
 */

import { createImageData, type ImageData } from '@cursorkit/core'
import { applyTransforms, invert, multiply, scaleFactor, transformPoint } from './matrix'
import {
	circleToCommands,
	ellipseElementToCommands,
	flattenPath,
	rectToCommands,
	strokeOutline,
	type Subpath,
} from './path'
import type {
	FillRule,
	Matrix,
	Point,
	RgbaColor,
	StrokeLinecap,
	StrokeLinejoin,
	SvgBaseElement,
	SvgDocument,
	SvgElement,
	SvgGradient,
	SvgPaint,
	SvgStyle,
} from './types'

/** Sub-scanlines sampled per pixel row */
const SUBSAMPLES = 4

const BLACK: RgbaColor = { r: 0, g: 0, b: 0, a: 255 }

export interface RasterizeOptions {
	/** Uniform scale applied to the intrinsic size (default: 1) */
	scale?: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Render Context
// ─────────────────────────────────────────────────────────────────────────────

/** Fully resolved presentation attributes */
interface ComputedStyle {
	fill: SvgPaint
	fillRule: FillRule
	fillOpacity: number
	stroke: SvgPaint
	strokeWidth: number
	strokeLinecap: StrokeLinecap
	strokeLinejoin: StrokeLinejoin
	strokeOpacity: number
	color: RgbaColor
}

/** Premultiplied RGBA, 0-1 per channel */
interface Layer {
	data: Float32Array
}

interface RenderContext {
	width: number
	height: number
	doc: SvgDocument
	layer: Layer
	/** Scratch coverage buffer, one value per pixel */
	coverage: Float32Array
	/** Ids of <use> targets being expanded, to stop reference cycles */
	expanding: Set<string>
}

const INITIAL_STYLE: ComputedStyle = {
	fill: { type: 'color', color: BLACK },
	fillRule: 'nonzero',
	fillOpacity: 1,
	stroke: { type: 'none' },
	strokeWidth: 1,
	strokeLinecap: 'butt',
	strokeLinejoin: 'miter',
	strokeOpacity: 1,
	color: BLACK,
}

function inherit(parent: ComputedStyle, own: SvgStyle): ComputedStyle {
	return {
		fill: own.fill ?? parent.fill,
		fillRule: own.fillRule ?? parent.fillRule,
		fillOpacity: own.fillOpacity ?? parent.fillOpacity,
		stroke: own.stroke ?? parent.stroke,
		strokeWidth: own.strokeWidth ?? parent.strokeWidth,
		strokeLinecap: own.strokeLinecap ?? parent.strokeLinecap,
		strokeLinejoin: own.strokeLinejoin ?? parent.strokeLinejoin,
		strokeOpacity: own.strokeOpacity ?? parent.strokeOpacity,
		color: own.color ?? parent.color,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Renderer
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Rasterize a document to straight-alpha RGBA.
 * The output is trunc(width * scale) x trunc(height * scale) pixels.
 */
export function rasterizeSvg(doc: SvgDocument, options: RasterizeOptions = {}): ImageData {
	const scale = options.scale ?? 1
	if (!Number.isFinite(scale) || scale <= 0) {
		throw new Error(`Invalid SVG scale: ${scale}`)
	}

	const width = Math.trunc(doc.width * scale)
	const height = Math.trunc(doc.height * scale)
	if (width < 1 || height < 1) {
		throw new Error(`SVG renders to an empty image: ${width}x${height}`)
	}

	const ctx: RenderContext = {
		width,
		height,
		doc,
		layer: { data: new Float32Array(width * height * 4) },
		coverage: new Float32Array(width * height),
		expanding: new Set(),
	}

	const base = multiply([scale, 0, 0, scale, 0, 0], viewBoxMatrix(doc))
	const style = inherit(INITIAL_STYLE, doc.style)
	for (const element of doc.elements) {
		renderElement(ctx, element, base, style)
	}

	return toImageData(ctx.layer, width, height)
}

/**
 * Map the viewBox onto the intrinsic size, centered and uniformly scaled (xMidYMid meet)
 */
function viewBoxMatrix(doc: SvgDocument): Matrix {
	const vb = doc.viewBox
	const s = Math.min(doc.width / vb.width, doc.height / vb.height)
	const tx = (doc.width - vb.width * s) / 2 - vb.x * s
	const ty = (doc.height - vb.height * s) / 2 - vb.y * s
	return [s, 0, 0, s, tx, ty]
}

function toImageData(layer: Layer, width: number, height: number): ImageData {
	const image = createImageData(width, height)
	const { data } = image
	const src = layer.data

	for (let i = 0; i < width * height; i++) {
		const o = i * 4
		const a = Math.min(1, src[o + 3] ?? 0)
		const alpha = Math.round(a * 255)
		if (alpha === 0) continue

		data[o] = Math.round(Math.min(1, (src[o] ?? 0) / a) * 255)
		data[o + 1] = Math.round(Math.min(1, (src[o + 1] ?? 0) / a) * 255)
		data[o + 2] = Math.round(Math.min(1, (src[o + 2] ?? 0) / a) * 255)
		data[o + 3] = alpha
	}

	return image
}

// ─────────────────────────────────────────────────────────────────────────────
// Element Renderer
// ─────────────────────────────────────────────────────────────────────────────

function renderElement(ctx: RenderContext, element: SvgElement, parentMatrix: Matrix, parentStyle: ComputedStyle): void {
	if (element.display === 'none') return

	const matrix = applyTransforms(parentMatrix, element.transform)
	const style = inherit(parentStyle, element)
	const opacity = element.opacity ?? 1
	if (opacity <= 0) return

	switch (element.type) {
		case 'group':
			withOpacity(ctx, opacity, () => {
				for (const child of element.children) {
					renderElement(ctx, child, matrix, style)
				}
			})
			return

		case 'use': {
			const target = ctx.doc.defs.get(element.href)
			if (!target || ctx.expanding.has(element.href)) return

			ctx.expanding.add(element.href)
			withOpacity(ctx, opacity, () => {
				renderElement(ctx, target, multiply(matrix, [1, 0, 0, 1, element.x, element.y]), style)
			})
			ctx.expanding.delete(element.href)
			return
		}

		default:
			renderShape(ctx, element, shapeGeometry(element, scaleFactor(matrix)), matrix, style, opacity)
	}
}

/**
 * Render into a fresh layer, then composite it with the group opacity
 */
function withOpacity(ctx: RenderContext, opacity: number, draw: () => void): void {
	if (opacity >= 1) {
		draw()
		return
	}

	const parent = ctx.layer
	const layer: Layer = { data: new Float32Array(parent.data.length) }
	ctx.layer = layer
	try {
		draw()
	} finally {
		ctx.layer = parent
	}

	const dst = parent.data
	const src = layer.data
	for (let i = 0; i < dst.length; i += 4) {
		const sa = (src[i + 3] ?? 0) * opacity
		if (sa <= 0) continue
		const inv = 1 - sa
		dst[i] = (src[i] ?? 0) * opacity + (dst[i] ?? 0) * inv
		dst[i + 1] = (src[i + 1] ?? 0) * opacity + (dst[i + 1] ?? 0) * inv
		dst[i + 2] = (src[i + 2] ?? 0) * opacity + (dst[i + 2] ?? 0) * inv
		dst[i + 3] = sa + (dst[i + 3] ?? 0) * inv
	}
}

function shapeGeometry(element: Exclude<SvgElement, { type: 'group' | 'use' }>, detail: number): Subpath[] {
	switch (element.type) {
		case 'rect':
			return flattenPath(rectToCommands(element), detail)
		case 'circle':
			return flattenPath(circleToCommands(element), detail)
		case 'ellipse':
			return flattenPath(ellipseElementToCommands(element), detail)
		case 'line':
			return [{ points: [{ x: element.x1, y: element.y1 }, { x: element.x2, y: element.y2 }], closed: false }]
		case 'polyline':
			return element.points.length > 0 ? [{ points: element.points, closed: false }] : []
		case 'polygon':
			return element.points.length > 0 ? [{ points: element.points, closed: true }] : []
		case 'path':
			return flattenPath(element.commands, detail)
	}
}

function renderShape(
	ctx: RenderContext,
	element: SvgBaseElement & { type: string },
	subpaths: Subpath[],
	matrix: Matrix,
	style: ComputedStyle,
	opacity: number
): void {
	if (subpaths.length === 0) return

	const bbox = boundingBox(subpaths)
	const device: Subpath[] = subpaths.map(sub => ({
		points: sub.points.map(p => transformPoint(matrix, p.x, p.y)),
		closed: sub.closed,
	}))

	// Lines have no interior
	if (element.type !== 'line') {
		const paint = resolvePaint(ctx, style.fill, style.color, matrix, bbox)
		if (paint) {
			// Open subpaths fill as if closed
			rasterize(ctx, device.map(sub => sub.points), style.fillRule)
			composite(ctx, paint, style.fillOpacity * opacity)
		}
	}

	const halfWidth = (style.strokeWidth * scaleFactor(matrix)) / 2
	if (halfWidth > 0) {
		const paint = resolvePaint(ctx, style.stroke, style.color, matrix, bbox)
		if (paint) {
			rasterize(ctx, strokeOutline(device, halfWidth, style.strokeLinecap, style.strokeLinejoin), 'nonzero')
			composite(ctx, paint, style.strokeOpacity * opacity)
		}
	}
}

interface BoundingBox {
	x: number
	y: number
	width: number
	height: number
}

function boundingBox(subpaths: Subpath[]): BoundingBox {
	let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity
	for (const sub of subpaths) {
		for (const p of sub.points) {
			minX = Math.min(minX, p.x)
			minY = Math.min(minY, p.y)
			maxX = Math.max(maxX, p.x)
			maxY = Math.max(maxY, p.y)
		}
	}
	return { x: minX, y: minY, width: maxX - minX, height: maxY - minY }
}

// ─────────────────────────────────────────────────────────────────────────────
// Coverage
// ─────────────────────────────────────────────────────────────────────────────

interface Edge {
	x0: number
	y0: number
	x1: number
	y1: number
	/** +1 downward, -1 upward */
	dir: number
}

/**
 * Accumulate anti-aliased coverage of closed polygons into ctx.coverage.
 * Each pixel row is sampled on SUBSAMPLES sub-scanlines; spans along a
 * sub-scanline contribute their exact horizontal overlap with each pixel.
 */
function rasterize(ctx: RenderContext, polygons: Point[][], rule: FillRule): void {
	const { width, height, coverage } = ctx
	coverage.fill(0)

	const edges: Edge[] = []
	let minY = Infinity
	let maxY = -Infinity

	for (const polygon of polygons) {
		for (let i = 0; i < polygon.length; i++) {
			const a = polygon[i]
			const b = polygon[(i + 1) % polygon.length]
			if (!a || !b || a.y === b.y) continue
			edges.push({ x0: a.x, y0: a.y, x1: b.x, y1: b.y, dir: b.y > a.y ? 1 : -1 })
			minY = Math.min(minY, a.y, b.y)
			maxY = Math.max(maxY, a.y, b.y)
		}
	}
	if (edges.length === 0) return

	const rowStart = Math.max(0, Math.floor(minY))
	const rowEnd = Math.min(height, Math.ceil(maxY))
	const weight = 1 / SUBSAMPLES
	const crossings: Array<{ x: number; dir: number }> = []

	for (let row = rowStart; row < rowEnd; row++) {
		const rowOffset = row * width

		for (let s = 0; s < SUBSAMPLES; s++) {
			const sy = row + (s + 0.5) / SUBSAMPLES

			crossings.length = 0
			for (const e of edges) {
				const top = Math.min(e.y0, e.y1)
				const bottom = Math.max(e.y0, e.y1)
				if (sy < top || sy >= bottom) continue
				crossings.push({ x: e.x0 + ((sy - e.y0) * (e.x1 - e.x0)) / (e.y1 - e.y0), dir: e.dir })
			}
			if (crossings.length < 2) continue
			crossings.sort((a, b) => a.x - b.x)

			let winding = 0
			for (let i = 0; i < crossings.length - 1; i++) {
				const c = crossings[i]
				const next = crossings[i + 1]
				if (!c || !next) break
				winding += c.dir
				const inside = rule === 'evenodd' ? (winding & 1) !== 0 : winding !== 0
				if (inside) addSpan(coverage, rowOffset, width, c.x, next.x, weight)
			}
		}
	}
}

function addSpan(coverage: Float32Array, rowOffset: number, width: number, x0: number, x1: number, weight: number): void {
	const left = Math.max(0, x0)
	const right = Math.min(width, x1)
	if (right <= left) return

	const first = Math.floor(left)
	const last = Math.floor(right)

	if (first === last) {
		coverage[rowOffset + first] = (coverage[rowOffset + first] ?? 0) + (right - left) * weight
		return
	}

	coverage[rowOffset + first] = (coverage[rowOffset + first] ?? 0) + (first + 1 - left) * weight
	for (let px = first + 1; px < last; px++) {
		coverage[rowOffset + px] = (coverage[rowOffset + px] ?? 0) + weight
	}
	if (last < width) {
		coverage[rowOffset + last] = (coverage[rowOffset + last] ?? 0) + (right - last) * weight
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Paint
// ─────────────────────────────────────────────────────────────────────────────

/** Color at a device pixel center */
type Paint = (x: number, y: number) => RgbaColor

function resolvePaint(
	ctx: RenderContext,
	paint: SvgPaint,
	currentColor: RgbaColor,
	matrix: Matrix,
	bbox: BoundingBox
): Paint | null {
	switch (paint.type) {
		case 'none':
			return null
		case 'color':
			return () => paint.color
		case 'currentColor':
			return () => currentColor
		case 'url': {
			const gradient = ctx.doc.gradients.get(paint.id)
			if (!gradient) {
				const fallback = paint.fallback
				return fallback ? () => fallback : null
			}
			return gradientPaint(gradient, matrix, bbox)
		}
	}
}

function gradientPaint(gradient: SvgGradient, matrix: Matrix, bbox: BoundingBox): Paint | null {
	const { stops } = gradient
	const only = stops[0]
	if (!only) return null
	if (stops.length === 1) return () => only.color

	let space = matrix
	if (gradient.units === 'objectBoundingBox') {
		// Degenerate boxes paint nothing
		if (bbox.width <= 0 || bbox.height <= 0) return null
		space = multiply(space, [bbox.width, 0, 0, bbox.height, bbox.x, bbox.y])
	}
	const inverse = invert(applyTransforms(space, gradient.transform))
	if (!inverse) return null

	return (x, y) => {
		const p = transformPoint(inverse, x, y)
		let t: number

		if (gradient.type === 'linearGradient') {
			const dx = gradient.x2 - gradient.x1
			const dy = gradient.y2 - gradient.y1
			const len = dx * dx + dy * dy
			t = len === 0 ? 0 : ((p.x - gradient.x1) * dx + (p.y - gradient.y1) * dy) / len
		} else {
			const dist = Math.hypot(p.x - gradient.cx, p.y - gradient.cy)
			t = gradient.r > 0 ? dist / gradient.r : 0
		}

		return interpolateStops(gradient, spread(gradient, t))
	}
}

function spread(gradient: SvgGradient, t: number): number {
	if (gradient.spread === 'repeat') return t - Math.floor(t)
	if (gradient.spread === 'reflect') {
		const m = Math.abs(t) % 2
		return m > 1 ? 2 - m : m
	}
	return Math.max(0, Math.min(1, t))
}

function interpolateStops(gradient: SvgGradient, t: number): RgbaColor {
	const { stops } = gradient
	let prev = stops[0]
	if (!prev || t <= prev.offset) return prev?.color ?? BLACK

	for (let i = 1; i < stops.length; i++) {
		const stop = stops[i]
		if (!stop) break
		if (t <= stop.offset) {
			const span = stop.offset - prev.offset
			const ratio = span > 0 ? (t - prev.offset) / span : 1
			const mix = (a: number, b: number) => Math.round(a + (b - a) * ratio)
			return {
				r: mix(prev.color.r, stop.color.r),
				g: mix(prev.color.g, stop.color.g),
				b: mix(prev.color.b, stop.color.b),
				a: mix(prev.color.a, stop.color.a),
			}
		}
		prev = stop
	}

	return prev.color
}

/**
 * Source-over blend of the paint, masked by the current coverage
 */
function composite(ctx: RenderContext, paint: Paint, opacity: number): void {
	if (opacity <= 0) return

	const { width, height, coverage } = ctx
	const dst = ctx.layer.data

	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const cov = Math.min(1, coverage[y * width + x] ?? 0)
			if (cov <= 0) continue

			const color = paint(x + 0.5, y + 0.5)
			const sa = cov * opacity * (color.a / 255)
			if (sa <= 0) continue

			const o = (y * width + x) * 4
			const inv = 1 - sa
			dst[o] = (color.r / 255) * sa + (dst[o] ?? 0) * inv
			dst[o + 1] = (color.g / 255) * sa + (dst[o + 1] ?? 0) * inv
			dst[o + 2] = (color.b / 255) * sa + (dst[o + 2] ?? 0) * inv
			dst[o + 3] = sa + (dst[o + 3] ?? 0) * inv
		}
	}
}
