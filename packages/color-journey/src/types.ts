/**
 * Shared type definitions for color-journey.
 */

/**
 * Linear-light RGB. Channels are nominally in [0, 1]; intermediate values may
 * leave that range and are clamped before being handed out.
 */
export interface RGBColor {
	readonly r: number
	readonly g: number
	readonly b: number
}

/**
 * OKLab: L in [0, 1], a/b roughly in [-0.4, 0.4].
 */
export interface LabColor {
	readonly L: number
	readonly a: number
	readonly b: number
}

/**
 * Cylindrical OKLab. C >= 0, h in radians normalized to [0, 2π).
 */
export interface LChColor {
	readonly L: number
	readonly C: number
	readonly h: number
}

export interface Waypoint {
	readonly anchor: LChColor
	/** Always 1 today; carried through for future weighting. */
	readonly weight: number
}

export type LightnessBias = 'neutral' | 'lighter' | 'darker' | 'custom'
export type ChromaBias = 'neutral' | 'muted' | 'vivid' | 'custom'
export type ContrastLevel = 'low' | 'medium' | 'high' | 'custom'
export type TemperatureBias = 'neutral' | 'warm' | 'cool'
export type LoopMode = 'open' | 'closed' | 'pingpong'
export type VariationStrength = 'subtle' | 'noticeable' | 'custom'

/**
 * Flat engine configuration. Custom values are only read when the matching
 * bias/level/strength is `'custom'`.
 */
export interface JourneyConfig {
	readonly anchors: readonly RGBColor[]
	readonly anchorCount: number
	readonly lightnessBias: LightnessBias
	/** [-1, 1] */
	readonly lightnessCustomWeight: number
	readonly chromaBias: ChromaBias
	/** [0.5, 2] */
	readonly chromaCustomMultiplier: number
	readonly contrastLevel: ContrastLevel
	/** Minimum OKLab ΔE between neighbours. */
	readonly contrastCustomThreshold: number
	/** [0, 1] */
	readonly midJourneyVibrancy: number
	readonly temperatureBias: TemperatureBias
	readonly loopMode: LoopMode
	readonly variationEnabled: boolean
	/** Bitmask of `VariationDimension` flags. */
	readonly variationDimensions: number
	readonly variationStrength: VariationStrength
	readonly variationCustomMagnitude: number
	/** Unsigned 64-bit seed; 0 selects the default seed. */
	readonly variationSeed: bigint
}

/**
 * Everything a journey computes once at construction.
 */
export interface JourneyState {
	readonly config: JourneyConfig
	readonly anchors: readonly LChColor[]
	readonly waypoints: readonly Waypoint[]
	readonly seed: bigint
}
