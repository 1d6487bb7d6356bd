/**
 * Path geometry: shape outlines, curve flattening and stroke outlines
 */

import type {
	PathCommand,
	Point,
	StrokeLinecap,
	StrokeLinejoin,
	SvgCircle,
	SvgEllipse,
	SvgRect,
} from './types'

export interface Subpath {
	points: Point[]
	closed: boolean
}

const MITER_LIMIT = 4

// ─────────────────────────────────────────────────────────────────────────────
// Basic shapes as path commands
// ─────────────────────────────────────────────────────────────────────────────

export function rectToCommands(rect: SvgRect): PathCommand[] {
	const { x, y, width: w, height: h } = rect
	if (w <= 0 || h <= 0) return []

	// A missing radius takes the other one; both are clamped to half the side
	let rx = rect.rx ?? rect.ry ?? 0
	let ry = rect.ry ?? rect.rx ?? 0
	rx = Math.max(0, Math.min(rx, w / 2))
	ry = Math.max(0, Math.min(ry, h / 2))

	if (rx === 0 || ry === 0) {
		return [
			{ type: 'M', x, y },
			{ type: 'H', x: x + w },
			{ type: 'V', y: y + h },
			{ type: 'H', x },
			{ type: 'Z' },
		]
	}

	const corner = (cx: number, cy: number): PathCommand => ({
		type: 'A', rx, ry, angle: 0, largeArc: false, sweep: true, x: cx, y: cy,
	})

	return [
		{ type: 'M', x: x + rx, y },
		{ type: 'H', x: x + w - rx },
		corner(x + w, y + ry),
		{ type: 'V', y: y + h - ry },
		corner(x + w - rx, y + h),
		{ type: 'H', x: x + rx },
		corner(x, y + h - ry),
		{ type: 'V', y: y + ry },
		corner(x + rx, y),
		{ type: 'Z' },
	]
}

export function ellipseToCommands(cx: number, cy: number, rx: number, ry: number): PathCommand[] {
	if (rx <= 0 || ry <= 0) return []

	const half = (x: number): PathCommand => ({
		type: 'A', rx, ry, angle: 0, largeArc: false, sweep: true, x, y: cy,
	})

	return [{ type: 'M', x: cx + rx, y: cy }, half(cx - rx), half(cx + rx), { type: 'Z' }]
}

export function circleToCommands(circle: SvgCircle): PathCommand[] {
	return ellipseToCommands(circle.cx, circle.cy, circle.r, circle.r)
}

export function ellipseElementToCommands(ellipse: SvgEllipse): PathCommand[] {
	return ellipseToCommands(ellipse.cx, ellipse.cy, ellipse.rx, ellipse.ry)
}

// ─────────────────────────────────────────────────────────────────────────────
// Flattening
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Flatten path commands into polylines.
 * `detail` is the device pixels per user unit; curves get finer with it.
 */
export function flattenPath(commands: PathCommand[], detail: number): Subpath[] {
	const subpaths: Subpath[] = []
	let current: Subpath | null = null
	let x = 0, y = 0
	let startX = 0, startY = 0
	// Reflected control point for S/s and T/t
	let lastCx = 0, lastCy = 0
	let lastType: PathCommand['type'] | null = null

	const moveTo = (nx: number, ny: number) => {
		current = { points: [{ x: nx, y: ny }], closed: false }
		subpaths.push(current)
		x = startX = nx
		y = startY = ny
	}

	// Drawing without a preceding moveto starts at the current point
	const active = (): Subpath => {
		if (current) return current
		const sub: Subpath = { points: [{ x, y }], closed: false }
		current = sub
		subpaths.push(sub)
		startX = x
		startY = y
		return sub
	}

	const lineTo = (nx: number, ny: number) => {
		active().points.push({ x: nx, y: ny })
		x = nx
		y = ny
	}

	const closePath = () => {
		if (current) {
			current.closed = true
			current = null
		}
		x = startX
		y = startY
	}

	const cubicTo = (x1: number, y1: number, x2: number, y2: number, nx: number, ny: number) => {
		const points = active().points
		const length = Math.hypot(x1 - x, y1 - y) + Math.hypot(x2 - x1, y2 - y1) + Math.hypot(nx - x2, ny - y2)
		const steps = curveSteps(length, detail)
		for (let i = 1; i <= steps; i++) {
			const t = i / steps
			const mt = 1 - t
			points.push({
				x: mt * mt * mt * x + 3 * mt * mt * t * x1 + 3 * mt * t * t * x2 + t * t * t * nx,
				y: mt * mt * mt * y + 3 * mt * mt * t * y1 + 3 * mt * t * t * y2 + t * t * t * ny,
			})
		}
		lastCx = x2
		lastCy = y2
		x = nx
		y = ny
	}

	const quadTo = (x1: number, y1: number, nx: number, ny: number) => {
		const points = active().points
		const steps = curveSteps(Math.hypot(x1 - x, y1 - y) + Math.hypot(nx - x1, ny - y1), detail)
		for (let i = 1; i <= steps; i++) {
			const t = i / steps
			const mt = 1 - t
			points.push({
				x: mt * mt * x + 2 * mt * t * x1 + t * t * nx,
				y: mt * mt * y + 2 * mt * t * y1 + t * t * ny,
			})
		}
		lastCx = x1
		lastCy = y1
		x = nx
		y = ny
	}

	const arcTo = (rx: number, ry: number, angle: number, largeArc: boolean, sweep: boolean, nx: number, ny: number) => {
		arcToPoints(active().points, x, y, rx, ry, angle, largeArc, sweep, nx, ny, detail)
		x = nx
		y = ny
	}

	// Without a matching previous curve the control point is the current point
	const reflect = (kinds: Array<PathCommand['type'] | null>): Point =>
		kinds.includes(lastType) ? { x: 2 * x - lastCx, y: 2 * y - lastCy } : { x, y }

	for (const cmd of commands) {
		switch (cmd.type) {
			case 'M':
				moveTo(cmd.x, cmd.y)
				break
			case 'm':
				moveTo(x + cmd.dx, y + cmd.dy)
				break
			case 'L':
				lineTo(cmd.x, cmd.y)
				break
			case 'l':
				lineTo(x + cmd.dx, y + cmd.dy)
				break
			case 'H':
				lineTo(cmd.x, y)
				break
			case 'h':
				lineTo(x + cmd.dx, y)
				break
			case 'V':
				lineTo(x, cmd.y)
				break
			case 'v':
				lineTo(x, y + cmd.dy)
				break
			case 'C':
				cubicTo(cmd.x1, cmd.y1, cmd.x2, cmd.y2, cmd.x, cmd.y)
				break
			case 'c':
				cubicTo(x + cmd.dx1, y + cmd.dy1, x + cmd.dx2, y + cmd.dy2, x + cmd.dx, y + cmd.dy)
				break
			case 'S': {
				const c1 = reflect(['C', 'c', 'S', 's'])
				cubicTo(c1.x, c1.y, cmd.x2, cmd.y2, cmd.x, cmd.y)
				break
			}
			case 's': {
				const c1 = reflect(['C', 'c', 'S', 's'])
				cubicTo(c1.x, c1.y, x + cmd.dx2, y + cmd.dy2, x + cmd.dx, y + cmd.dy)
				break
			}
			case 'Q':
				quadTo(cmd.x1, cmd.y1, cmd.x, cmd.y)
				break
			case 'q':
				quadTo(x + cmd.dx1, y + cmd.dy1, x + cmd.dx, y + cmd.dy)
				break
			case 'T': {
				const c = reflect(['Q', 'q', 'T', 't'])
				quadTo(c.x, c.y, cmd.x, cmd.y)
				break
			}
			case 't': {
				const c = reflect(['Q', 'q', 'T', 't'])
				quadTo(c.x, c.y, x + cmd.dx, y + cmd.dy)
				break
			}
			case 'A':
				arcTo(cmd.rx, cmd.ry, cmd.angle, cmd.largeArc, cmd.sweep, cmd.x, cmd.y)
				break
			case 'a':
				arcTo(cmd.rx, cmd.ry, cmd.angle, cmd.largeArc, cmd.sweep, x + cmd.dx, y + cmd.dy)
				break
			case 'Z':
				closePath()
				break
		}
		lastType = cmd.type
	}

	return subpaths
}

function curveSteps(length: number, detail: number): number {
	return Math.max(4, Math.min(64, Math.ceil((length * detail) / 2)))
}

function arcToPoints(
	points: Point[],
	x1: number, y1: number,
	rx: number, ry: number,
	angle: number,
	largeArc: boolean,
	sweep: boolean,
	x2: number, y2: number,
	detail: number
): void {
	rx = Math.abs(rx)
	ry = Math.abs(ry)

	// Degenerate arcs are straight lines
	if (rx === 0 || ry === 0 || (x1 === x2 && y1 === y2)) {
		points.push({ x: x2, y: y2 })
		return
	}

	const phi = (angle * Math.PI) / 180
	const cosPhi = Math.cos(phi)
	const sinPhi = Math.sin(phi)

	// Endpoint to center parameterization
	const dx = (x1 - x2) / 2
	const dy = (y1 - y2) / 2
	const x1p = cosPhi * dx + sinPhi * dy
	const y1p = -sinPhi * dx + cosPhi * dy

	// Scale up radii that cannot span the endpoints
	const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry)
	if (lambda > 1) {
		const s = Math.sqrt(lambda)
		rx *= s
		ry *= s
	}

	const rx2 = rx * rx
	const ry2 = ry * ry
	const num = rx2 * ry2 - rx2 * y1p * y1p - ry2 * x1p * x1p
	const den = rx2 * y1p * y1p + ry2 * x1p * x1p
	const coef = (largeArc !== sweep ? 1 : -1) * Math.sqrt(Math.max(0, num / den))
	const cxp = (coef * rx * y1p) / ry
	const cyp = (-coef * ry * x1p) / rx

	const cx = cosPhi * cxp - sinPhi * cyp + (x1 + x2) / 2
	const cy = sinPhi * cxp + cosPhi * cyp + (y1 + y2) / 2

	const startAngle = Math.atan2((y1p - cyp) / ry, (x1p - cxp) / rx)
	let dAngle = Math.atan2((-y1p - cyp) / ry, (-x1p - cxp) / rx) - startAngle
	if (sweep && dAngle < 0) dAngle += 2 * Math.PI
	if (!sweep && dAngle > 0) dAngle -= 2 * Math.PI

	const arcLength = Math.abs(dAngle) * Math.max(rx, ry)
	const steps = Math.max(4, Math.min(128, Math.ceil((arcLength * detail) / 2)))
	for (let i = 1; i < steps; i++) {
		const t = startAngle + (i / steps) * dAngle
		const ex = rx * Math.cos(t)
		const ey = ry * Math.sin(t)
		points.push({ x: cx + ex * cosPhi - ey * sinPhi, y: cy + ex * sinPhi + ey * cosPhi })
	}
	// Land exactly on the endpoint
	points.push({ x: x2, y: y2 })
}

// ─────────────────────────────────────────────────────────────────────────────
// Stroking
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Outline a stroke as polygons, all wound the same way so a nonzero fill
 * of their union paints the stroke. Input points are in device space.
 */
export function strokeOutline(
	subpaths: Subpath[],
	halfWidth: number,
	linecap: StrokeLinecap,
	linejoin: StrokeLinejoin
): Point[][] {
	const polygons: Point[][] = []
	if (halfWidth <= 0) return polygons

	for (const subpath of subpaths) {
		const points = dedupe(subpath.points)
		const closed = subpath.closed && points.length > 2

		if (points.length === 1) {
			// Zero-length subpath: only round and square caps paint a dot
			const p = points[0]
			if (p && linecap === 'round') polygons.push(circlePolygon(p, halfWidth))
			if (p && linecap === 'square') {
				polygons.push(oriented([
					{ x: p.x - halfWidth, y: p.y - halfWidth },
					{ x: p.x + halfWidth, y: p.y - halfWidth },
					{ x: p.x + halfWidth, y: p.y + halfWidth },
					{ x: p.x - halfWidth, y: p.y + halfWidth },
				]))
			}
			continue
		}

		const segmentCount = closed ? points.length : points.length - 1
		for (let i = 0; i < segmentCount; i++) {
			const a = at(points, i)
			const b = at(points, i + 1)
			let start = a
			let end = b

			if (!closed && linecap === 'square') {
				const d = direction(a, b)
				if (i === 0) start = { x: a.x - d.x * halfWidth, y: a.y - d.y * halfWidth }
				if (i === segmentCount - 1) end = { x: b.x + d.x * halfWidth, y: b.y + d.y * halfWidth }
			}

			polygons.push(segmentQuad(start, end, halfWidth))
		}

		// Joins at interior vertices, and at every vertex of a closed subpath
		const first = closed ? 0 : 1
		const last = closed ? points.length : points.length - 1
		for (let i = first; i < last; i++) {
			const join = joinPolygon(at(points, i - 1), at(points, i), at(points, i + 1), halfWidth, linejoin)
			if (join) polygons.push(join)
		}

		if (!closed && linecap === 'round') {
			polygons.push(circlePolygon(at(points, 0), halfWidth))
			polygons.push(circlePolygon(at(points, points.length - 1), halfWidth))
		}
	}

	return polygons
}

function at(points: Point[], i: number): Point {
	const n = points.length
	return points[((i % n) + n) % n] ?? { x: 0, y: 0 }
}

function dedupe(points: Point[]): Point[] {
	const out: Point[] = []
	for (const p of points) {
		const prev = out[out.length - 1]
		if (!prev || Math.abs(prev.x - p.x) > 1e-9 || Math.abs(prev.y - p.y) > 1e-9) out.push(p)
	}
	// A closing point equal to the start is implied by the closed flag
	const head = out[0]
	const tail = out[out.length - 1]
	if (out.length > 2 && head && tail && Math.abs(head.x - tail.x) < 1e-9 && Math.abs(head.y - tail.y) < 1e-9) {
		out.pop()
	}
	return out
}

function direction(a: Point, b: Point): Point {
	const len = Math.hypot(b.x - a.x, b.y - a.y)
	return len === 0 ? { x: 0, y: 0 } : { x: (b.x - a.x) / len, y: (b.y - a.y) / len }
}

function segmentQuad(a: Point, b: Point, hw: number): Point[] {
	const d = direction(a, b)
	const nx = -d.y * hw
	const ny = d.x * hw
	return oriented([
		{ x: a.x + nx, y: a.y + ny },
		{ x: b.x + nx, y: b.y + ny },
		{ x: b.x - nx, y: b.y - ny },
		{ x: a.x - nx, y: a.y - ny },
	])
}

function joinPolygon(prev: Point, p: Point, next: Point, hw: number, join: StrokeLinejoin): Point[] | null {
	const d0 = direction(prev, p)
	const d1 = direction(p, next)
	const cross = d0.x * d1.y - d0.y * d1.x
	const dot = d0.x * d1.x + d0.y * d1.y

	// Collinear: the segment quads already meet
	if (Math.abs(cross) < 1e-9 && dot > 0) return null

	if (join === 'round') return circlePolygon(p, hw)

	// Outer side of the turn
	const side = cross > 0 ? -1 : 1
	const o0 = { x: p.x - d0.y * hw * side, y: p.y + d0.x * hw * side }
	const o1 = { x: p.x - d1.y * hw * side, y: p.y + d1.x * hw * side }

	if (join === 'miter') {
		// Miter length ratio is 1 / sin(theta / 2) for the angle theta between segments
		const cosTheta = -dot
		const sinHalf = Math.sqrt(Math.max(0, (1 - cosTheta) / 2))
		// The miter tip lies along the outer bisector
		const bx = (o0.x + o1.x) / 2 - p.x
		const by = (o0.y + o1.y) / 2 - p.y
		const bl = Math.hypot(bx, by)
		if (sinHalf > 0 && 1 / sinHalf <= MITER_LIMIT && bl > 0) {
			const length = hw / sinHalf
			const tip = { x: p.x + (bx / bl) * length, y: p.y + (by / bl) * length }
			return oriented([p, o0, tip, o1])
		}
	}

	return oriented([p, o0, o1])
}

function circlePolygon(c: Point, r: number): Point[] {
	const steps = Math.max(8, Math.min(64, Math.ceil(r * 4)))
	const points: Point[] = []
	for (let i = 0; i < steps; i++) {
		const t = (i / steps) * 2 * Math.PI
		points.push({ x: c.x + r * Math.cos(t), y: c.y + r * Math.sin(t) })
	}
	return oriented(points)
}

/**
 * Normalize winding so every stroke piece has positive signed area
 */
function oriented(points: Point[]): Point[] {
	let area = 0
	for (let i = 0; i < points.length; i++) {
		const a = at(points, i)
		const b = at(points, i + 1)
		area += a.x * b.y - b.x * a.y
	}
	return area < 0 ? points.reverse() : points
}
