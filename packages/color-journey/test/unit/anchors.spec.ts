import { describe, expect, it } from 'vitest'
import { parseColor } from '../../src/anchors.ts'
import { createRgb, rgbToOklab } from '../../src/color.ts'
import { JourneyError } from '../../src/errors.ts'

describe('parseColor', () => {
	it('copies RGB objects', () => {
		const input = { r: 0.1, g: 0.2, b: 0.3 }
		const parsed = parseColor(input)
		expect(parsed).toEqual(createRgb(0.1, 0.2, 0.3))
		expect(parsed).not.toBe(input)
	})

	it('converts OKLab objects', () => {
		const lab = rgbToOklab(createRgb(0.25, 0.5, 0.75))
		const parsed = parseColor(lab)
		expect(parsed.r).toBeCloseTo(0.25, 6)
		expect(parsed.g).toBeCloseTo(0.5, 6)
		expect(parsed.b).toBeCloseTo(0.75, 6)
	})

	it('parses CSS strings into linear RGB', () => {
		const red = parseColor('#ff0000')
		expect(red.r).toBeCloseTo(1, 6)
		expect(red.g).toBeCloseTo(0, 6)
		expect(red.b).toBeCloseTo(0, 6)

		// sRGB 50% gray is about 21.4% in linear light
		const gray = parseColor('rgb(50% 50% 50%)')
		expect(gray.r).toBeCloseTo(0.214, 3)
		expect(gray.g).toBeCloseTo(gray.r, 12)
		expect(gray.b).toBeCloseTo(gray.r, 12)
	})

	it('parses OKLCH strings', () => {
		const parsed = parseColor('oklch(0.6 0.1 250)')
		const lab = rgbToOklab(parsed)
		expect(lab.L).toBeCloseTo(0.6, 3)
		expect(Math.hypot(lab.a, lab.b)).toBeCloseTo(0.1, 3)
	})

	it('reports unparsable strings as JourneyError', () => {
		expect(() => parseColor('not-a-color')).toThrow(JourneyError)
		expect(() => parseColor('not-a-color')).toThrow(/cannot parse color 'not-a-color'/)
	})
})
