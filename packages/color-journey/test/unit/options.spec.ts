import { describe, expect, it } from 'vitest'
import { createRgb } from '../../src/color.ts'
import { JourneyError } from '../../src/errors.ts'
import { defineJourney, toJourneyConfig } from '../../src/options.ts'
import { VariationDimension } from '../../src/variation.ts'

const anchors = [createRgb(0.3, 0.5, 0.8)]

describe('toJourneyConfig', () => {
	it('starts from the defaults', () => {
		const config = toJourneyConfig({ anchors })
		expect(config.anchorCount).toBe(1)
		expect(config.lightnessBias).toBe('neutral')
		expect(config.contrastLevel).toBe('medium')
		expect(config.loopMode).toBe('open')
		expect(config.variationEnabled).toBe(false)
	})

	it('maps keywords and custom objects', () => {
		const config = toJourneyConfig({
			anchors,
			lightness: { weight: 0.5 },
			chroma: 'vivid',
			contrast: { threshold: 0.2 },
			temperature: 'cool',
			loop: 'pingpong',
			midJourneyVibrancy: 0.8,
		})
		expect(config.lightnessBias).toBe('custom')
		expect(config.lightnessCustomWeight).toBe(0.5)
		expect(config.chromaBias).toBe('vivid')
		expect(config.contrastLevel).toBe('custom')
		expect(config.contrastCustomThreshold).toBe(0.2)
		expect(config.temperatureBias).toBe('cool')
		expect(config.loopMode).toBe('pingpong')
		expect(config.midJourneyVibrancy).toBe(0.8)
	})

	it('applies styles before explicit options', () => {
		const night = toJourneyConfig({ anchors, style: 'nightMode' })
		expect(night.lightnessBias).toBe('darker')
		expect(night.chromaBias).toBe('custom')
		expect(night.chromaCustomMultiplier).toBe(0.8)

		const overridden = toJourneyConfig({ anchors, style: 'vividLoop', loop: 'open' })
		expect(overridden.chromaBias).toBe('vivid')
		expect(overridden.contrastLevel).toBe('high')
		expect(overridden.midJourneyVibrancy).toBe(0.5)
		expect(overridden.loopMode).toBe('open')
	})

	it('enables variation with defaults', () => {
		const config = toJourneyConfig({ anchors, variation: true })
		expect(config.variationEnabled).toBe(true)
		expect(config.variationDimensions).toBe(VariationDimension.All)
		expect(config.variationStrength).toBe('subtle')
		expect(config.variationSeed).toBe(0x123456789abcdef0n)
	})

	it('maps variation options', () => {
		const config = toJourneyConfig({
			anchors,
			variation: { dimensions: ['hue', 'chroma'], strength: { magnitude: 0.1 }, seed: 42 },
		})
		expect(config.variationDimensions).toBe(VariationDimension.Hue | VariationDimension.Chroma)
		expect(config.variationStrength).toBe('custom')
		expect(config.variationCustomMagnitude).toBe(0.1)
		expect(config.variationSeed).toBe(42n)
	})
})

describe('defineJourney', () => {
	it('builds a journey from CSS anchors', () => {
		const journey = defineJourney({ anchors: ['#ff0000', 'oklch(0.5 0.1 250)'] })
		expect(journey.anchors).toHaveLength(2)
		expect(journey.waypoints).toHaveLength(2)
	})

	it('throws JourneyError for invalid options', () => {
		expect(() => defineJourney({ anchors: [] })).toThrow(JourneyError)
		expect(() => defineJourney({ anchors, midJourneyVibrancy: 2 })).toThrow(
			/midJourneyVibrancy must be within \[0, 1\], got 2/,
		)
		expect(() => defineJourney({ anchors, variation: { seed: 1.5 } })).toThrow(
			/variationSeed must be an unsigned 64-bit integer, got -1/,
		)
	})

	it('exposes every issue on the error', () => {
		try {
			defineJourney({ anchors: [], lightness: { weight: 3 } })
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(JourneyError)
			if (error instanceof JourneyError) {
				expect(error.code).toBe('InvalidConfig')
				expect(error.issues).toEqual([
					'anchorCount must be an integer from 1 to 8, got 0',
					'lightnessCustomWeight must be within [-1, 1], got 3',
				])
			}
		}
	})
})
