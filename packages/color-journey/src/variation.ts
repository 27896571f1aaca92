/**
 * Seeded micro-variation.
 *
 * The generator is a small xoshiro-inspired mixer over a 64-bit state split
 * into two 32-bit halves. Its exact bit sequence is part of the public
 * contract: the same seed must yield the same palette on every platform.
 *
 *   s0 = state & 0xffffffff, s1 = state >> 32
 *   out = s0 + s1
 *   s1 ^= s0
 *   s0 = ((s0 << 24) | (s0 >> 8)) ^ s1 ^ (s1 << 16)
 *   s1 = (s1 << 37) | (s1 >> 27)                 (64-bit shifts)
 *   state = (s1 << 32) | s0                      (truncated to 64 bits)
 *   draw = (out & 0xffffff) / 2^24
 */

import {
	DEFAULT_SEED,
	MAX_CHROMA,
	VARIATION_NOTICEABLE,
	VARIATION_POSITION_SCALE,
	VARIATION_SUBTLE,
} from './constants.ts'
import type { JourneyConfig, LChColor } from './types.ts'
import { clamp, normalizeHue } from './util.ts'

export const VariationDimension = {
	None: 0,
	Hue: 1 << 0,
	Lightness: 1 << 1,
	Chroma: 1 << 2,
	All: (1 << 0) | (1 << 1) | (1 << 2),
} as const

export type VariationDimensionName = 'hue' | 'lightness' | 'chroma'

export type VariationSettings = Pick<
	JourneyConfig,
	| 'variationEnabled'
	| 'variationDimensions'
	| 'variationStrength'
	| 'variationCustomMagnitude'
>

const MASK_32 = 0xffffffffn
const DRAW_MASK = 0xffffffn
const DRAW_SCALE = 16777216

interface MixResult {
	readonly output: bigint
	readonly state: bigint
}

/**
 * Advance the generator once.
 */
export function mixState(state: bigint): MixResult {
	let s0 = state & MASK_32
	let s1 = state >> 32n
	const output = s0 + s1

	s1 ^= s0
	s0 = BigInt.asUintN(64, ((s0 << 24n) | (s0 >> 8n)) ^ s1 ^ (s1 << 16n))
	s1 = BigInt.asUintN(64, (s1 << 37n) | (s1 >> 27n))

	return {
		output,
		state: BigInt.asUintN(64, (s1 << 32n) | s0),
	}
}

/**
 * Create a stream of uniform draws in [0, 1). Each stream owns its state.
 */
export function createRandom(seed: bigint): () => number {
	let state = BigInt.asUintN(64, seed)
	return () => {
		const { output, state: next } = mixState(state)
		state = next
		return Number(output & DRAW_MASK) / DRAW_SCALE
	}
}

/**
 * Seed 0 selects the documented default.
 */
export function resolveSeed(seed: bigint): bigint {
	return seed === 0n ? DEFAULT_SEED : BigInt.asUintN(64, seed)
}

/**
 * Position-keyed seed: journeySeed XOR floor(t * 1e6).
 */
export function positionSeed(seed: bigint, t: number): bigint {
	const key = BigInt.asUintN(64, BigInt(Math.floor(t * VARIATION_POSITION_SCALE)))
	return seed ^ key
}

export function variationMagnitude(settings: VariationSettings): number {
	switch (settings.variationStrength) {
		case 'subtle':
			return VARIATION_SUBTLE
		case 'noticeable':
			return VARIATION_NOTICEABLE
		case 'custom':
			return settings.variationCustomMagnitude
	}
}

/**
 * Perturb hue, lightness and chroma (each only if enabled in the bitmask) with
 * draws from a generator seeded by the journey seed and the position.
 * Draws are consumed in hue, lightness, chroma order.
 */
export function applyVariation(
	color: LChColor,
	t: number,
	seed: bigint,
	settings: VariationSettings,
): LChColor {
	if (!settings.variationEnabled || !Number.isFinite(t)) {
		return color
	}

	const random = createRandom(positionSeed(seed, t))
	const magnitude = variationMagnitude(settings)
	const dimensions = settings.variationDimensions
	let { L, C, h } = color

	if (dimensions & VariationDimension.Hue) {
		h = normalizeHue(h + (random() - 0.5) * magnitude * Math.PI)
	}
	if (dimensions & VariationDimension.Lightness) {
		L = clamp(0, L + (random() - 0.5) * magnitude, 1)
	}
	if (dimensions & VariationDimension.Chroma) {
		C = clamp(0, C + (random() - 0.5) * magnitude * 0.5, MAX_CHROMA)
	}

	return { L, C, h }
}
