import { describe, expect, it } from 'vitest'
import { alternateShapeNames, CURSOR_SHAPES, isCursorShape } from './shapes'

describe('cursor shapes', () => {
	it('lists the standard names', () => {
		expect(CURSOR_SHAPES.length).toBe(34)
		expect(CURSOR_SHAPES[0]).toBe('default')
		expect(CURSOR_SHAPES).toContain('nwse-resize')
	})

	it('recognizes standard names only', () => {
		expect(isCursorShape('wait')).toBe(true)
		expect(isCursorShape('left_ptr')).toBe(false)
		expect(isCursorShape('toString')).toBe(false)
	})

	it('maps to legacy names', () => {
		expect(alternateShapeNames('default')).toEqual(['left_ptr', 'arrow', 'top_left_arrow', 'left_arrow'])
		expect(alternateShapeNames('wait')).toEqual(['watch', 'clock'])
		expect(alternateShapeNames('zoom-in')).toEqual([])
	})
})
