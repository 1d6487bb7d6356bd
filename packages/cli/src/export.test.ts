import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { CursorFrame } from '@cursorkit/theme'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { describeFrame, encodeFrame, exportFrames, frameFileName } from './export'

function frame(overrides: Partial<CursorFrame> = {}): CursorFrame {
	return {
		size: 2,
		width: 2,
		height: 2,
		hotspotX: 1,
		hotspotY: 0,
		delay: 0,
		data: new Uint8Array(16).fill(255),
		...overrides,
	}
}

describe('frame export', () => {
	let dir: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'cursorkit-cli-'))
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	it('names files by shape, size and index', () => {
		expect(frameFileName('wait', 48, 3)).toBe('wait-48-3.png')
	})

	it('writes one PNG per frame', () => {
		const out = join(dir, 'out')
		const exported = exportFrames([frame(), frame({ delay: 40 })], 'wait', 32, out)

		expect(exported.map((e) => e.path)).toEqual([join(out, 'wait-32-0.png'), join(out, 'wait-32-1.png')])
		const png = readFileSync(join(out, 'wait-32-1.png'))
		expect([...png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47])
	})

	it('writes nothing on a dry run', () => {
		const out = join(dir, 'out')
		const exported = exportFrames([frame()], 'wait', 32, out, true)

		expect(exported.length).toBe(1)
		expect(existsSync(out)).toBe(false)
	})

	it('stores hotspot and delay as text', () => {
		const text = new TextDecoder('latin1').decode(encodeFrame(frame({ hotspotX: 5, hotspotY: 7, delay: 30 })))
		expect(text).toContain('tEXtHotspot\u00005,7')
		expect(text).toContain('tEXtDelay\u000030')
	})

	it('describes frames', () => {
		expect(describeFrame(frame())).toBe('2x2  hotspot (1, 0)')
		expect(describeFrame(frame({ delay: 50 }))).toBe('2x2  hotspot (1, 0)  delay 50ms')
	})
})
