/**
 * SVG types - the subset cursor artwork uses
 */

export interface SvgDecodeOptions {
	/** Uniform scale applied to the intrinsic size (default: 1) */
	scale?: number
}

export interface SvgInfo {
	width: number
	height: number
	viewBox: ViewBox
}

export interface ViewBox {
	x: number
	y: number
	width: number
	height: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Paint
// ─────────────────────────────────────────────────────────────────────────────

export interface RgbaColor {
	r: number
	g: number
	b: number
	a: number
}

export interface GradientStop {
	offset: number // 0-1
	color: RgbaColor
}

export type GradientUnits = 'userSpaceOnUse' | 'objectBoundingBox'
export type SpreadMethod = 'pad' | 'reflect' | 'repeat'

export interface LinearGradient {
	type: 'linearGradient'
	x1: number
	y1: number
	x2: number
	y2: number
	stops: GradientStop[]
	units: GradientUnits
	transform?: SvgTransform[]
	spread: SpreadMethod
}

export interface RadialGradient {
	type: 'radialGradient'
	cx: number
	cy: number
	r: number
	stops: GradientStop[]
	units: GradientUnits
	transform?: SvgTransform[]
	spread: SpreadMethod
}

export type SvgGradient = LinearGradient | RadialGradient

export type SvgPaint =
	| { type: 'none' }
	| { type: 'color'; color: RgbaColor }
	| { type: 'url'; id: string; fallback?: RgbaColor }
	| { type: 'currentColor' }

export type FillRule = 'nonzero' | 'evenodd'
export type StrokeLinecap = 'butt' | 'round' | 'square'
export type StrokeLinejoin = 'miter' | 'round' | 'bevel'

// ─────────────────────────────────────────────────────────────────────────────
// Elements
// ─────────────────────────────────────────────────────────────────────────────

export type SvgElement =
	| SvgRect
	| SvgCircle
	| SvgEllipse
	| SvgLine
	| SvgPolyline
	| SvgPolygon
	| SvgPath
	| SvgGroup
	| SvgUse

/** Presentation attributes; unset values inherit from the parent */
export interface SvgStyle {
	fill?: SvgPaint
	fillRule?: FillRule
	fillOpacity?: number
	stroke?: SvgPaint
	strokeWidth?: number
	strokeLinecap?: StrokeLinecap
	strokeLinejoin?: StrokeLinejoin
	strokeOpacity?: number
	color?: RgbaColor
}

export interface SvgBaseElement extends SvgStyle {
	id?: string
	/** Group opacity, not inherited */
	opacity?: number
	transform?: SvgTransform[]
	display?: 'none' | 'inline'
}

export interface SvgRect extends SvgBaseElement {
	type: 'rect'
	x: number
	y: number
	width: number
	height: number
	rx?: number
	ry?: number
}

export interface SvgCircle extends SvgBaseElement {
	type: 'circle'
	cx: number
	cy: number
	r: number
}

export interface SvgEllipse extends SvgBaseElement {
	type: 'ellipse'
	cx: number
	cy: number
	rx: number
	ry: number
}

export interface SvgLine extends SvgBaseElement {
	type: 'line'
	x1: number
	y1: number
	x2: number
	y2: number
}

export interface SvgPolyline extends SvgBaseElement {
	type: 'polyline'
	points: Point[]
}

export interface SvgPolygon extends SvgBaseElement {
	type: 'polygon'
	points: Point[]
}

export interface SvgPath extends SvgBaseElement {
	type: 'path'
	commands: PathCommand[]
}

export interface SvgGroup extends SvgBaseElement {
	type: 'group'
	children: SvgElement[]
}

export interface SvgUse extends SvgBaseElement {
	type: 'use'
	x: number
	y: number
	href: string
}

export interface Point {
	x: number
	y: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Transform types
// ─────────────────────────────────────────────────────────────────────────────

export type SvgTransform =
	| { type: 'translate'; x: number; y: number }
	| { type: 'scale'; x: number; y: number }
	| { type: 'rotate'; angle: number; cx?: number; cy?: number }
	| { type: 'skewX'; angle: number }
	| { type: 'skewY'; angle: number }
	| { type: 'matrix'; a: number; b: number; c: number; d: number; e: number; f: number }

/** Affine matrix [a b c d e f] mapping (x, y) to (a*x + c*y + e, b*x + d*y + f) */
export type Matrix = readonly [number, number, number, number, number, number]

// ─────────────────────────────────────────────────────────────────────────────
// Path commands
// ─────────────────────────────────────────────────────────────────────────────

export type PathCommand =
	| { type: 'M'; x: number; y: number }
	| { type: 'm'; dx: number; dy: number }
	| { type: 'L'; x: number; y: number }
	| { type: 'l'; dx: number; dy: number }
	| { type: 'H'; x: number }
	| { type: 'h'; dx: number }
	| { type: 'V'; y: number }
	| { type: 'v'; dy: number }
	| { type: 'C'; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
	| { type: 'c'; dx1: number; dy1: number; dx2: number; dy2: number; dx: number; dy: number }
	| { type: 'S'; x2: number; y2: number; x: number; y: number }
	| { type: 's'; dx2: number; dy2: number; dx: number; dy: number }
	| { type: 'Q'; x1: number; y1: number; x: number; y: number }
	| { type: 'q'; dx1: number; dy1: number; dx: number; dy: number }
	| { type: 'T'; x: number; y: number }
	| { type: 't'; dx: number; dy: number }
	| { type: 'A'; rx: number; ry: number; angle: number; largeArc: boolean; sweep: boolean; x: number; y: number }
	| { type: 'a'; rx: number; ry: number; angle: number; largeArc: boolean; sweep: boolean; dx: number; dy: number }
	| { type: 'Z' }

// ─────────────────────────────────────────────────────────────────────────────
// Document
// ─────────────────────────────────────────────────────────────────────────────

export interface SvgDocument {
	/** Intrinsic size in user units */
	width: number
	height: number
	viewBox: ViewBox
	/** Presentation attributes set on the root element */
	style: SvgStyle
	elements: SvgElement[]
	/** Elements and gradients addressable by id */
	defs: Map<string, SvgElement>
	gradients: Map<string, SvgGradient>
}
