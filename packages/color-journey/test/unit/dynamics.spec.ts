import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { applyDynamics, type DynamicsSettings, vibrancyBoost } from '../../src/dynamics.ts'

const neutral: DynamicsSettings = {
	lightnessBias: 'neutral',
	lightnessCustomWeight: 0,
	chromaBias: 'neutral',
	chromaCustomMultiplier: 1,
	midJourneyVibrancy: 0,
}

const color = { L: 0.5, C: 0.1, h: 2 }

describe('vibrancyBoost', () => {
	it('peaks at the middle of the journey', () => {
		expect(vibrancyBoost(0.3, 0.5)).toBeCloseTo(1.18, 12)
		expect(vibrancyBoost(1, 0.5)).toBeCloseTo(1.6, 12)
	})

	it('is 1 outside the window', () => {
		expect(vibrancyBoost(0.3, 0)).toBe(1)
		expect(vibrancyBoost(0.3, 0.1)).toBe(1)
		expect(vibrancyBoost(0.3, 0.9)).toBe(1)
		expect(vibrancyBoost(0.3, 1)).toBe(1)
	})

	it('decreases away from the middle', () => {
		const offsetArb = fc.double({ min: 0, max: 0.5, noNaN: true })
		fc.assert(
			fc.property(offsetArb, offsetArb, (x, y) => {
				const [near, far] = x < y ? [x, y] : [y, x]
				expect(vibrancyBoost(0.5, 0.5 + near)).toBeGreaterThanOrEqual(vibrancyBoost(0.5, 0.5 + far))
				expect(vibrancyBoost(0.5, 0.5 - near)).toBeGreaterThanOrEqual(vibrancyBoost(0.5, 0.5 - far))
			}),
		)
	})
})

describe('applyDynamics', () => {
	it('passes colors through with neutral settings', () => {
		expect(applyDynamics(color, 0.5, neutral)).toEqual(color)
	})

	it('biases lightness', () => {
		expect(applyDynamics(color, 0, { ...neutral, lightnessBias: 'lighter' }).L).toBeCloseTo(0.6, 12)
		expect(applyDynamics(color, 0, { ...neutral, lightnessBias: 'darker' }).L).toBeCloseTo(0.4, 12)
		expect(
			applyDynamics(color, 0, { ...neutral, lightnessBias: 'custom', lightnessCustomWeight: -1 }).L,
		).toBeCloseTo(0.3, 12)
	})

	it('ignores the custom weight unless the bias is custom', () => {
		expect(applyDynamics(color, 0, { ...neutral, lightnessCustomWeight: 1 }).L).toBe(0.5)
	})

	it('scales chroma', () => {
		expect(applyDynamics(color, 0, { ...neutral, chromaBias: 'muted' }).C).toBeCloseTo(0.06, 12)
		expect(applyDynamics(color, 0, { ...neutral, chromaBias: 'vivid' }).C).toBeCloseTo(0.14, 12)
		expect(
			applyDynamics(color, 0, { ...neutral, chromaBias: 'custom', chromaCustomMultiplier: 2 }).C,
		).toBeCloseTo(0.2, 12)
	})

	it('applies the vibrancy bump to chroma', () => {
		const boosted = applyDynamics(color, 0.5, { ...neutral, midJourneyVibrancy: 0.3 })
		expect(boosted.C).toBeCloseTo(0.118, 12)
		expect(boosted.h).toBe(2)
	})

	it('clamps lightness and chroma', () => {
		const result = applyDynamics({ L: 0.95, C: 0.35, h: 1 }, 0.5, {
			...neutral,
			lightnessBias: 'custom',
			lightnessCustomWeight: 1,
			chromaBias: 'vivid',
			midJourneyVibrancy: 1,
		})
		expect(result).toEqual({ L: 1, C: 0.4, h: 1 })
	})
})
