/**
 * Perceptual biases applied to every sampled color.
 */

import {
	CHROMA_MUTED,
	CHROMA_VIVID,
	LIGHTNESS_BIAS_STEP,
	LIGHTNESS_CUSTOM_SCALE,
	MAX_CHROMA,
	VIBRANCY_HALF_WIDTH,
	VIBRANCY_PEAK,
} from './constants.ts'
import type { JourneyConfig, LChColor } from './types.ts'
import { clamp, lerp } from './util.ts'

export type DynamicsSettings = Pick<
	JourneyConfig,
	| 'lightnessBias'
	| 'lightnessCustomWeight'
	| 'chromaBias'
	| 'chromaCustomMultiplier'
	| 'midJourneyVibrancy'
>

function biasLightness(L: number, settings: DynamicsSettings): number {
	switch (settings.lightnessBias) {
		case 'lighter':
			return lerp(L, 1, LIGHTNESS_BIAS_STEP)
		case 'darker':
			return lerp(L, 0, LIGHTNESS_BIAS_STEP)
		case 'custom':
			return L + settings.lightnessCustomWeight * LIGHTNESS_CUSTOM_SCALE
		case 'neutral':
			return L
	}
}

function biasChroma(C: number, settings: DynamicsSettings): number {
	switch (settings.chromaBias) {
		case 'muted':
			return C * CHROMA_MUTED
		case 'vivid':
			return C * CHROMA_VIVID
		case 'custom':
			return C * settings.chromaCustomMultiplier
		case 'neutral':
			return C
	}
}

/**
 * Chroma multiplier of the mid-journey bump: 1 at the edges, peaking at
 * 1 + vibrancy * 0.6 for t = 0.5, zero boost beyond |t - 0.5| >= 0.35.
 */
export function vibrancyBoost(vibrancy: number, t: number): number {
	const envelope = Math.max(0, 1 - Math.abs(t - 0.5) / VIBRANCY_HALF_WIDTH)
	return 1 + vibrancy * VIBRANCY_PEAK * envelope
}

/**
 * Apply lightness bias, chroma bias and the vibrancy bump, then clamp
 * L to [0, 1] and C to [0, 0.4]. Hue passes through untouched.
 */
export function applyDynamics(color: LChColor, t: number, settings: DynamicsSettings): LChColor {
	const L = biasLightness(color.L, settings)
	const C = biasChroma(color.C, settings) * vibrancyBoost(settings.midJourneyVibrancy, t)

	return {
		L: clamp(0, L, 1),
		C: clamp(0, C, MAX_CHROMA),
		h: color.h,
	}
}
