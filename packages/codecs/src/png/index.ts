/**
 * PNG encoder
 * 8-bit RGBA output with optional tEXt metadata
 */

export * from './types'
export { encodePng, crc32 } from './encoder'
export { adler32, deflateStored } from './deflate'
