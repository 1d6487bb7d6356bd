/**
 * Cursor image codecs
 *
 * - Xcursor: multi-size, animated X11 cursor files
 * - SVG: vector cursors rasterized at any scale
 * - PNG: frame export
 */

export * from './xcursor'
export * from './svg'
export * from './png'
