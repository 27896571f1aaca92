/**
 * Discrete palettes: evenly spaced swatches with chained contrast enforcement.
 *
 * Two orderings exist. `generatePalette(count)` spreads `count` swatches over
 * the whole journey. The index sequence (`discreteAt`, `discreteRange`,
 * `discreteSequence`) steps a fixed 0.05 along the journey per index, so an
 * index keeps its color no matter how many neighbours are requested.
 */

import { BLACK, clampRgb, lchToRgb, oklabToLch, oklabToRgb, rgbToOklab } from './color.ts'
import {
	CHROMA_PULSE_AMPLITUDE,
	CHROMA_PULSE_PERIOD,
	CHROMA_PULSE_THRESHOLD,
	DISCRETE_INDEX_SPACING,
	MAX_CHROMA,
} from './constants.ts'
import { enforceMinimumContrast, resolveMinDeltaE } from './contrast.ts'
import { sampleRgb } from './sampler.ts'
import type { JourneyState, LoopMode, RGBColor } from './types.ts'
import { clamp } from './util.ts'

/**
 * Journey position of swatch `index` in a palette of `count`.
 * closed: index / count (the wrap point is not repeated)
 * open: index / (count - 1) (both ends included)
 * pingpong: out and back over index / (count - 1)
 * A single swatch sits at the midpoint.
 */
export function discretePosition(index: number, count: number, mode: LoopMode): number {
	if (count <= 1) {
		return 0.5
	}

	switch (mode) {
		case 'closed':
			return index / count
		case 'open':
			return index / (count - 1)
		case 'pingpong': {
			const t = (2 * index) / (count - 1)
			return t > 1 ? 2 - t : t
		}
	}
}

/**
 * Journey position of an entry in the index sequence.
 */
export function sequencePosition(index: number): number {
	return (index * DISCRETE_INDEX_SPACING) % 1
}

/**
 * Push `color` away from `previous` until their ΔE reaches the threshold.
 */
export function separateFrom(
	color: RGBColor,
	previous: RGBColor | undefined,
	minDeltaE: number,
): RGBColor {
	if (previous === undefined) {
		return color
	}

	const lab = rgbToOklab(color)
	const enforced = enforceMinimumContrast(lab, rgbToOklab(previous), minDeltaE)
	return enforced === lab ? color : clampRgb(oklabToRgb(enforced))
}

/**
 * Periodic saturation rhythm for large palettes:
 * C *= 1 + 0.1 * cos(i * π / 5), re-clamped.
 */
export function applyChromaPulse(colors: readonly RGBColor[]): RGBColor[] {
	return colors.map((color, i) => {
		const lch = oklabToLch(rgbToOklab(color))
		const pulse = 1 + CHROMA_PULSE_AMPLITUDE * Math.cos((i * Math.PI) / CHROMA_PULSE_PERIOD)
		return lchToRgb({ L: lch.L, C: clamp(0, lch.C * pulse, MAX_CHROMA), h: lch.h })
	})
}

export function generatePalette(state: JourneyState, count: number): RGBColor[] {
	if (!Number.isFinite(count) || count < 1) {
		return []
	}

	const size = Math.floor(count)
	const minDeltaE = resolveMinDeltaE(state.config)
	const colors: RGBColor[] = []

	for (let i = 0; i < size; i++) {
		const sampled = sampleRgb(state, discretePosition(i, size, state.config.loopMode))
		colors.push(separateFrom(sampled, colors[i - 1], minDeltaE))
	}

	return size > CHROMA_PULSE_THRESHOLD ? applyChromaPulse(colors) : colors
}

/**
 * The index sequence, lazily. Each color is separated from the one before
 * it, starting at index 0. Holding on to the iterator is the way to walk far
 * into the sequence without replaying it.
 */
export function* discreteSequence(state: JourneyState): Generator<RGBColor, void, undefined> {
	const minDeltaE = resolveMinDeltaE(state.config)
	let previous: RGBColor | undefined

	for (let index = 0; ; index++) {
		const color = separateFrom(sampleRgb(state, sequencePosition(index)), previous, minDeltaE)
		previous = color
		yield color
	}
}

/**
 * Colors of the index sequence from `start` (inclusive), `count` of them.
 * Replays from index 0 so every color is chained to its true predecessor.
 */
export function discreteRange(state: JourneyState, start: number, count: number): RGBColor[] {
	if (!(Number.isFinite(start) && Number.isFinite(count)) || start < 0 || count < 1) {
		return []
	}

	const first = Math.floor(start)
	const end = first + Math.floor(count)
	const colors: RGBColor[] = []
	let index = 0

	for (const color of discreteSequence(state)) {
		if (index >= first) {
			colors.push(color)
		}
		index++
		if (index >= end) {
			break
		}
	}

	return colors
}

/**
 * Single entry of the index sequence. Costs O(index).
 */
export function discreteAt(state: JourneyState, index: number): RGBColor {
	const [color] = discreteRange(state, index, 1)
	return color ?? BLACK
}
