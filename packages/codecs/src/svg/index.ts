/**
 * SVG codec
 *
 * Features:
 * - Shapes: rect (rounded), circle, ellipse, line, polyline, polygon, path
 * - Groups, <use> references, <defs> and <symbol>
 * - Presentation attributes, style attributes and <style> rules
 * - Solid colors, currentColor, linear and radial gradients
 * - Transforms, nonzero/evenodd fill rules, strokes with caps and joins
 * - Anti-aliased coverage rasterization at any scale
 */

export * from './types'
export { decodeSvg, isSvg, parseSvgInfo } from './decoder'
export { parseColor, parsePathCommands, parseSvg, parseTransform } from './parser'
export { rasterizeSvg, type RasterizeOptions } from './renderer'
