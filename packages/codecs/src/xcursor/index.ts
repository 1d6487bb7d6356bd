/**
 * Xcursor (X11 cursor) codec
 *
 * Features:
 * - Multiple nominal sizes per file
 * - Animation frames with per-frame delay
 * - Copyright/license/other comment chunks
 */

export * from './types'
export * from './decoder'
export * from './encoder'
