/**
 * Affine transform helpers
 */

import type { Matrix, Point, SvgTransform } from './types'

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0]

/**
 * Compose two transforms: the result applies `n` first, then `m`
 */
export function multiply(m: Matrix, n: Matrix): Matrix {
	return [
		m[0] * n[0] + m[2] * n[1],
		m[1] * n[0] + m[3] * n[1],
		m[0] * n[2] + m[2] * n[3],
		m[1] * n[2] + m[3] * n[3],
		m[0] * n[4] + m[2] * n[5] + m[4],
		m[1] * n[4] + m[3] * n[5] + m[5],
	]
}

export function invert(m: Matrix): Matrix | null {
	const det = m[0] * m[3] - m[1] * m[2]
	if (det === 0 || !Number.isFinite(det)) return null

	return [
		m[3] / det,
		-m[1] / det,
		-m[2] / det,
		m[0] / det,
		(m[2] * m[5] - m[3] * m[4]) / det,
		(m[1] * m[4] - m[0] * m[5]) / det,
	]
}

export function transformPoint(m: Matrix, x: number, y: number): Point {
	return {
		x: m[0] * x + m[2] * y + m[4],
		y: m[1] * x + m[3] * y + m[5],
	}
}

/**
 * Average linear scale factor, used for stroke widths and curve flattening
 */
export function scaleFactor(m: Matrix): number {
	return Math.sqrt(Math.abs(m[0] * m[3] - m[1] * m[2]))
}

export function toMatrix(t: SvgTransform): Matrix {
	switch (t.type) {
		case 'translate':
			return [1, 0, 0, 1, t.x, t.y]
		case 'scale':
			return [t.x, 0, 0, t.y, 0, 0]
		case 'rotate': {
			const rad = (t.angle * Math.PI) / 180
			const cos = Math.cos(rad)
			const sin = Math.sin(rad)
			const cx = t.cx ?? 0
			const cy = t.cy ?? 0
			// Rotate around (cx, cy)
			return [cos, sin, -sin, cos, cx - cos * cx + sin * cy, cy - sin * cx - cos * cy]
		}
		case 'skewX':
			return [1, 0, Math.tan((t.angle * Math.PI) / 180), 1, 0, 0]
		case 'skewY':
			return [1, Math.tan((t.angle * Math.PI) / 180), 0, 1, 0, 0]
		case 'matrix':
			return [t.a, t.b, t.c, t.d, t.e, t.f]
	}
}

/**
 * Apply a transform list (left to right, as written in the attribute) on top of `m`
 */
export function applyTransforms(m: Matrix, transforms: SvgTransform[] | undefined): Matrix {
	let result = m
	for (const t of transforms ?? []) {
		result = multiply(result, toMatrix(t))
	}
	return result
}
