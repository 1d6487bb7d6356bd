/**
 * @cursorkit/core - pixel types shared by the codecs and the theme engine
 */

export * from './types'
export * from './format'
