/**
 * Minimum-ΔE enforcement between neighbouring palette colors.
 */

import { clipToRgbGamut, deltaE, lchToOklab, oklabToLch } from './color.ts'
import {
	CONTRAST_CHROMA_BOOST,
	CONTRAST_HIGH,
	CONTRAST_HUE_STEP,
	CONTRAST_LOW,
	CONTRAST_MARGIN,
	CONTRAST_MAX_ITERATIONS,
	CONTRAST_MEDIUM,
	MAX_CHROMA,
} from './constants.ts'
import type { JourneyConfig, LabColor } from './types.ts'
import { clamp, normalizeHue } from './util.ts'

export function resolveMinDeltaE(
	config: Pick<JourneyConfig, 'contrastLevel' | 'contrastCustomThreshold'>,
): number {
	switch (config.contrastLevel) {
		case 'low':
			return CONTRAST_LOW
		case 'medium':
			return CONTRAST_MEDIUM
		case 'high':
			return CONTRAST_HIGH
		case 'custom':
			return config.contrastCustomThreshold
	}
}

function farthest(candidates: readonly LabColor[], reference: LabColor): LabColor | undefined {
	let best: LabColor | undefined
	let bestDistance = -1
	for (const candidate of candidates) {
		const distance = deltaE(candidate, reference)
		if (distance > bestDistance) {
			best = candidate
			bestDistance = distance
		}
	}
	return best
}

/**
 * Move lightness so that, with the current a/b offset, the distance reaches
 * `minDeltaE`. Lightness moves away from the reference toward mid-gray first
 * (lighter below L 0.5, darker from 0.5 up); when the gamut-clipped result
 * falls short the other side is used if it does better.
 */
function nudgeLightness(color: LabColor, reference: LabColor, minDeltaE: number): LabColor {
	const da = color.a - reference.a
	const db = color.b - reference.b
	const offset = Math.sqrt(Math.max(0, minDeltaE * minDeltaE - da * da - db * db)) + CONTRAST_MARGIN
	const side = reference.L < 0.5 ? 1 : -1

	const candidates = [side, -side].map((direction) =>
		clipToRgbGamut({ L: clamp(0, reference.L + direction * offset, 1), a: color.a, b: color.b }),
	)

	const satisfying = candidates.find((candidate) => deltaE(candidate, reference) >= minDeltaE)
	return satisfying ?? farthest(candidates, reference) ?? color
}

/**
 * Rotate hue by a growing step (whichever direction separates more) and boost
 * chroma a little.
 */
function rotateAndSaturate(color: LabColor, reference: LabColor, iteration: number): LabColor {
	const lch = oklabToLch(color)
	const C = lch.C > 1e-5 ? Math.min(lch.C * CONTRAST_CHROMA_BOOST, MAX_CHROMA) : lch.C
	const step = CONTRAST_HUE_STEP * (iteration + 1)

	const candidates = [step, -step].map((rotation) =>
		clipToRgbGamut(lchToOklab({ L: lch.L, C, h: normalizeHue(lch.h + rotation) })),
	)

	return farthest(candidates, reference) ?? color
}

/**
 * Adjust `color` until its OKLab distance to `reference` is at least
 * `minDeltaE`. Lightness is tried first, then hue rotation with a chroma
 * boost. Candidates are clipped to the RGB gamut before being measured, so the
 * distance survives conversion to output RGB.
 *
 * Best effort: after a bounded number of rounds the farthest candidate seen is
 * returned, even if it is still short of the threshold.
 */
export function enforceMinimumContrast(
	color: LabColor,
	reference: LabColor,
	minDeltaE: number,
): LabColor {
	let bestDistance = deltaE(color, reference)
	if (bestDistance >= minDeltaE) {
		return color
	}

	let best = color
	let current = color

	for (let iteration = 0; iteration < CONTRAST_MAX_ITERATIONS; iteration++) {
		current = nudgeLightness(current, reference, minDeltaE)
		let distance = deltaE(current, reference)
		if (distance >= minDeltaE) {
			return current
		}
		if (distance > bestDistance) {
			best = current
			bestDistance = distance
		}

		current = rotateAndSaturate(current, reference, iteration)
		distance = deltaE(current, reference)
		if (distance >= minDeltaE) {
			return current
		}
		if (distance > bestDistance) {
			best = current
			bestDistance = distance
		}
	}

	return best
}
