/**
 * Ergonomic journey options layered over the flat `JourneyConfig`.
 */

import { type ColorInput, parseColor } from './anchors.ts'
import { initDefaultConfig, withAnchors } from './config.ts'
import { createJourney, type Journey } from './journey.ts'
import type {
	ChromaBias,
	ContrastLevel,
	JourneyConfig,
	LightnessBias,
	LoopMode,
	TemperatureBias,
	VariationStrength,
} from './types.ts'
import { VariationDimension, type VariationDimensionName } from './variation.ts'

export type JourneyStyle =
	| 'balanced'
	| 'pastelDrift'
	| 'vividLoop'
	| 'nightMode'
	| 'warmEarth'
	| 'coolSky'

export interface VariationOptions {
	/** Defaults to all three. */
	readonly dimensions?: readonly VariationDimensionName[]
	readonly strength?: Exclude<VariationStrength, 'custom'> | { readonly magnitude: number }
	readonly seed?: number | bigint
}

export interface JourneyOptions {
	readonly anchors: readonly ColorInput[]
	/** Preset applied first; explicit options override it. */
	readonly style?: JourneyStyle
	readonly lightness?: Exclude<LightnessBias, 'custom'> | { readonly weight: number }
	readonly chroma?: Exclude<ChromaBias, 'custom'> | { readonly multiplier: number }
	readonly contrast?: Exclude<ContrastLevel, 'custom'> | { readonly threshold: number }
	readonly temperature?: TemperatureBias
	readonly loop?: LoopMode
	readonly midJourneyVibrancy?: number
	/** `true` enables variation with its defaults. */
	readonly variation?: boolean | VariationOptions
}

type StylePreset = Partial<Omit<JourneyConfig, 'anchors' | 'anchorCount'>>

const STYLES: Record<JourneyStyle, StylePreset> = {
	balanced: {},
	pastelDrift: {
		lightnessBias: 'lighter',
		chromaBias: 'muted',
		contrastLevel: 'low',
		midJourneyVibrancy: 0.1,
	},
	vividLoop: {
		chromaBias: 'vivid',
		contrastLevel: 'high',
		loopMode: 'closed',
		midJourneyVibrancy: 0.5,
	},
	nightMode: {
		lightnessBias: 'darker',
		chromaBias: 'custom',
		chromaCustomMultiplier: 0.8,
		contrastLevel: 'medium',
	},
	warmEarth: {
		temperatureBias: 'warm',
		chromaBias: 'custom',
		chromaCustomMultiplier: 0.9,
		lightnessBias: 'custom',
		lightnessCustomWeight: -0.1,
	},
	coolSky: {
		temperatureBias: 'cool',
		lightnessBias: 'lighter',
		chromaBias: 'neutral',
	},
}

const ALL_DIMENSIONS: readonly VariationDimensionName[] = ['hue', 'lightness', 'chroma']

const DIMENSION_FLAGS: Record<VariationDimensionName, number> = {
	hue: VariationDimension.Hue,
	lightness: VariationDimension.Lightness,
	chroma: VariationDimension.Chroma,
}

function lightnessConfig(option: JourneyOptions['lightness']): StylePreset {
	if (option === undefined) {
		return {}
	}
	return typeof option === 'string'
		? { lightnessBias: option }
		: { lightnessBias: 'custom', lightnessCustomWeight: option.weight }
}

function chromaConfig(option: JourneyOptions['chroma']): StylePreset {
	if (option === undefined) {
		return {}
	}
	return typeof option === 'string'
		? { chromaBias: option }
		: { chromaBias: 'custom', chromaCustomMultiplier: option.multiplier }
}

function contrastConfig(option: JourneyOptions['contrast']): StylePreset {
	if (option === undefined) {
		return {}
	}
	return typeof option === 'string'
		? { contrastLevel: option }
		: { contrastLevel: 'custom', contrastCustomThreshold: option.threshold }
}

/**
 * Number seeds that are not safe integers become -1, which validation rejects.
 */
function toSeed(seed: number | bigint): bigint {
	if (typeof seed === 'bigint') {
		return seed
	}
	return Number.isSafeInteger(seed) ? BigInt(seed) : -1n
}

function variationConfig(option: JourneyOptions['variation']): StylePreset {
	if (option === undefined || option === false) {
		return {}
	}

	const settings: VariationOptions = option === true ? {} : option
	const names = settings.dimensions ?? ALL_DIMENSIONS
	const dimensions = names.reduce((mask, name) => mask | DIMENSION_FLAGS[name], 0)
	const strength = settings.strength ?? 'subtle'
	const magnitude: StylePreset =
		typeof strength === 'string'
			? { variationStrength: strength }
			: { variationStrength: 'custom', variationCustomMagnitude: strength.magnitude }

	return {
		variationEnabled: true,
		variationDimensions: dimensions,
		...magnitude,
		...(settings.seed === undefined ? {} : { variationSeed: toSeed(settings.seed) }),
	}
}

/**
 * Resolve options to a flat config: defaults, then the style, then every
 * explicit option.
 *
 * @throws JourneyError when an anchor string cannot be parsed
 */
export function toJourneyConfig(options: JourneyOptions): JourneyConfig {
	const base: JourneyConfig = {
		...initDefaultConfig(),
		...STYLES[options.style ?? 'balanced'],
		...lightnessConfig(options.lightness),
		...chromaConfig(options.chroma),
		...contrastConfig(options.contrast),
		...(options.temperature === undefined ? {} : { temperatureBias: options.temperature }),
		...(options.loop === undefined ? {} : { loopMode: options.loop }),
		...(options.midJourneyVibrancy === undefined
			? {}
			: { midJourneyVibrancy: options.midJourneyVibrancy }),
		...variationConfig(options.variation),
	}

	return withAnchors(base, options.anchors.map(parseColor))
}

/**
 * Build a journey from options.
 *
 * @throws JourneyError when the options do not describe a valid journey
 *
 * @example
 * ```ts
 * const sunset = defineJourney({
 *   anchors: ['#ff6b35', 'oklch(0.45 0.15 300)'],
 *   style: 'warmEarth',
 *   contrast: 'high',
 * })
 * const swatches = sunset.discrete(6)
 * ```
 */
export function defineJourney(options: JourneyOptions): Journey {
	const result = createJourney(toJourneyConfig(options))
	if (result.type === 'error') {
		throw result.error
	}
	return result.journey
}
