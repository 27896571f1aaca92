import Color from 'colorjs.io'
import { describe, expect, it } from 'vitest'
import { createRgb } from '../../src/color.ts'
import { linearGradient, paletteCss, toCssColor } from '../../src/css.ts'
import { defineJourney } from '../../src/options.ts'

function parsedSrgbLinear(css: string): number[] {
	return new Color(css).to('srgb-linear').coords.map((c) => Number(c))
}

describe('toCssColor', () => {
	it('serializes hex', () => {
		const css = toCssColor(createRgb(1, 0, 0))
		expect(css).toMatch(/^#[0-9a-f]{3,6}$/)
		const [r, g, b] = parsedSrgbLinear(css)
		expect(r).toBeCloseTo(1, 6)
		expect(g).toBeCloseTo(0, 6)
		expect(b).toBeCloseTo(0, 6)
	})

	it('serializes oklch', () => {
		const css = toCssColor(createRgb(0.2, 0.4, 0.6), 'oklch')
		expect(css.startsWith('oklch(')).toBe(true)
		const [r, g, b] = parsedSrgbLinear(css)
		expect(r).toBeCloseTo(0.2, 2)
		expect(g).toBeCloseTo(0.4, 2)
		expect(b).toBeCloseTo(0.6, 2)
	})

	it('serializes linear sRGB', () => {
		const css = toCssColor(createRgb(0.25, 0.5, 0.75), 'srgb-linear')
		expect(css).toBe('color(srgb-linear 0.25 0.5 0.75)')
	})
})

describe('paletteCss', () => {
	it('declares one custom property per color', () => {
		const css = paletteCss([createRgb(1, 1, 1), createRgb(0, 0, 0)], {
			selector: ':root',
			output: 'brand',
		})
		const lines = css.split('\n')
		expect(lines).toHaveLength(4)
		expect(lines[0]).toBe(':root {')
		expect(lines[1]).toMatch(/^\t--brand-0: #f{3}(f{3})?;$/)
		expect(lines[2]).toMatch(/^\t--brand-1: #0{3}(0{3})?;$/)
		expect(lines[3]).toBe('}')
	})

	it('defaults the prefix to journey', () => {
		const css = paletteCss([createRgb(0.25, 0.5, 0.75)], { selector: '.a', format: 'srgb-linear' })
		expect(css).toBe('.a {\n\t--journey-0: color(srgb-linear 0.25 0.5 0.75);\n}')
	})

	it('rejects invalid output names', () => {
		expect(() => paletteCss([], { selector: '.a', output: '1bad' })).toThrow(/Invalid output name/)
	})
})

describe('linearGradient', () => {
	it('samples the journey at evenly spaced stops', () => {
		const journey = defineJourney({ anchors: ['#000000', '#ffffff'], midJourneyVibrancy: 0 })
		const gradient = linearGradient(journey, { stops: 3, angle: '45deg' })
		expect(gradient.startsWith('linear-gradient(45deg, ')).toBe(true)
		expect(gradient.endsWith(' 100%)')).toBe(true)

		const stops = gradient.slice('linear-gradient(45deg, '.length, -1).split(', ')
		expect(stops.map((stop) => stop.split(' ')[1])).toEqual(['0%', '50%', '100%'])
		expect(stops[0]).toMatch(/^#0{3}(0{3})? 0%$/)
		expect(stops[2]).toMatch(/^#f{3}(f{3})? 100%$/)
	})

	it('uses at least two stops', () => {
		const journey = defineJourney({ anchors: ['#336699'] })
		expect(linearGradient(journey, { stops: 0 }).split('%').length - 1).toBe(2)
	})
})
