import { DEFAULT_SEED, MAX_ANCHORS, MIN_ANCHORS } from './constants.ts'
import type { JourneyConfig, RGBColor } from './types.ts'
import { VariationDimension } from './variation.ts'

const defaults: JourneyConfig = {
	anchors: [],
	anchorCount: 0,
	lightnessBias: 'neutral',
	lightnessCustomWeight: 0,
	chromaBias: 'neutral',
	chromaCustomMultiplier: 1,
	contrastLevel: 'medium',
	contrastCustomThreshold: 0.1,
	midJourneyVibrancy: 0.3,
	temperatureBias: 'neutral',
	loopMode: 'open',
	variationEnabled: false,
	variationDimensions: VariationDimension.None,
	variationStrength: 'subtle',
	variationCustomMagnitude: 0,
	variationSeed: DEFAULT_SEED,
}

const DEFAULT_CONFIG = Object.freeze(defaults)

const LIGHTNESS_BIASES = new Set(['neutral', 'lighter', 'darker', 'custom'])
const CHROMA_BIASES = new Set(['neutral', 'muted', 'vivid', 'custom'])
const CONTRAST_LEVELS = new Set(['low', 'medium', 'high', 'custom'])
const TEMPERATURE_BIASES = new Set(['neutral', 'warm', 'cool'])
const LOOP_MODES = new Set(['open', 'closed', 'pingpong'])
const VARIATION_STRENGTHS = new Set(['subtle', 'noticeable', 'custom'])

const SEED_LIMIT = 1n << 64n

/**
 * Defaults: no anchors, neutral biases, medium contrast, vibrancy 0.3, open
 * loop, variation off. Anchors must be supplied before use.
 */
export function initDefaultConfig(): JourneyConfig {
	return DEFAULT_CONFIG
}

/**
 * Copy of `config` with its anchors replaced. Keeps `anchorCount` in step.
 */
export function withAnchors(config: JourneyConfig, anchors: readonly RGBColor[]): JourneyConfig {
	return { ...config, anchors: [...anchors], anchorCount: anchors.length }
}

function inRange(value: number, min: number, max: number): boolean {
	return Number.isFinite(value) && value >= min && value <= max
}

/**
 * List every problem with `config`. An empty list means the journey can be
 * built. Custom values are only checked when their mode selects them.
 */
export function validateConfig(config: JourneyConfig): string[] {
	const issues: string[] = []

	if (!Number.isInteger(config.anchorCount) || !inRange(config.anchorCount, MIN_ANCHORS, MAX_ANCHORS)) {
		issues.push(`anchorCount must be an integer from ${MIN_ANCHORS} to ${MAX_ANCHORS}, got ${config.anchorCount}`)
	} else if (config.anchorCount !== config.anchors.length) {
		issues.push(
			`anchorCount (${config.anchorCount}) does not match the ${config.anchors.length} anchors supplied`,
		)
	}

	config.anchors.forEach((anchor, i) => {
		if (![anchor.r, anchor.g, anchor.b].every(Number.isFinite)) {
			issues.push(`anchor ${i} has a non-finite channel`)
		}
	})

	if (!LIGHTNESS_BIASES.has(config.lightnessBias)) {
		issues.push(`unknown lightnessBias '${config.lightnessBias}'`)
	} else if (config.lightnessBias === 'custom' && !inRange(config.lightnessCustomWeight, -1, 1)) {
		issues.push(`lightnessCustomWeight must be within [-1, 1], got ${config.lightnessCustomWeight}`)
	}

	if (!CHROMA_BIASES.has(config.chromaBias)) {
		issues.push(`unknown chromaBias '${config.chromaBias}'`)
	} else if (config.chromaBias === 'custom' && !inRange(config.chromaCustomMultiplier, 0.5, 2)) {
		issues.push(`chromaCustomMultiplier must be within [0.5, 2], got ${config.chromaCustomMultiplier}`)
	}

	if (!CONTRAST_LEVELS.has(config.contrastLevel)) {
		issues.push(`unknown contrastLevel '${config.contrastLevel}'`)
	} else if (
		config.contrastLevel === 'custom' &&
		!inRange(config.contrastCustomThreshold, 0, Number.MAX_VALUE)
	) {
		issues.push(`contrastCustomThreshold must be finite and >= 0, got ${config.contrastCustomThreshold}`)
	}

	if (!inRange(config.midJourneyVibrancy, 0, 1)) {
		issues.push(`midJourneyVibrancy must be within [0, 1], got ${config.midJourneyVibrancy}`)
	}

	if (!TEMPERATURE_BIASES.has(config.temperatureBias)) {
		issues.push(`unknown temperatureBias '${config.temperatureBias}'`)
	}

	if (!LOOP_MODES.has(config.loopMode)) {
		issues.push(`unknown loopMode '${config.loopMode}'`)
	}

	if (!VARIATION_STRENGTHS.has(config.variationStrength)) {
		issues.push(`unknown variationStrength '${config.variationStrength}'`)
	} else if (
		config.variationStrength === 'custom' &&
		!inRange(config.variationCustomMagnitude, 0, Number.MAX_VALUE)
	) {
		issues.push(
			`variationCustomMagnitude must be finite and >= 0, got ${config.variationCustomMagnitude}`,
		)
	}

	if (
		!Number.isInteger(config.variationDimensions) ||
		!inRange(config.variationDimensions, VariationDimension.None, VariationDimension.All)
	) {
		issues.push(`variationDimensions must be a bitmask from 0 to 7, got ${config.variationDimensions}`)
	}

	if (config.variationSeed < 0n || config.variationSeed >= SEED_LIMIT) {
		issues.push(`variationSeed must be an unsigned 64-bit integer, got ${config.variationSeed}`)
	}

	return issues
}
