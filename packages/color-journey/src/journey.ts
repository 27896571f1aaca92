/**
 * Journey lifecycle and public sampling API.
 */

import { BLACK, rgbToLch } from './color.ts'
import { validateConfig } from './config.ts'
import { JourneyError } from './errors.ts'
import {
	discreteAt as paletteAt,
	discreteRange as paletteRange,
	discreteSequence as paletteSequence,
	generatePalette,
} from './palette.ts'
import { sampleRgb } from './sampler.ts'
import type { JourneyConfig, JourneyState, LChColor, RGBColor, Waypoint } from './types.ts'
import { resolveSeed } from './variation.ts'
import { buildWaypoints } from './waypoints.ts'

export interface Journey {
	readonly config: JourneyConfig
	/** Anchors in OKLCH, as captured at construction. Empty once destroyed. */
	readonly anchors: readonly LChColor[]
	readonly waypoints: readonly Waypoint[]
	/** Effective seed (0 has already been replaced by the default). */
	readonly seed: bigint
	readonly destroyed: boolean

	/** Continuous color at `t`; out-of-range `t` is mapped by the loop mode. */
	sample(t: number): RGBColor
	/** `count` evenly spaced, contrast-separated swatches. */
	discrete(count: number): RGBColor[]
	/** Entry `index` of the index sequence. */
	discreteAt(index: number): RGBColor
	/** `count` entries of the index sequence starting at `start`. */
	discreteRange(start: number, count: number): RGBColor[]
	/** The index sequence as a lazy iterator. */
	discreteSequence(): Generator<RGBColor, void, undefined>
	/** Release the journey. Further calls return black or empty results. */
	destroy(): void
}

export type CreateJourneyResult =
	| { readonly type: 'journey'; readonly journey: Journey }
	| { readonly type: 'error'; readonly error: JourneyError }

function* emptySequence(): Generator<RGBColor, void, undefined> {
	yield* []
}

class JourneyImpl implements Journey {
	readonly config: JourneyConfig
	readonly seed: bigint
	#state: JourneyState | undefined

	constructor(state: JourneyState) {
		this.config = state.config
		this.seed = state.seed
		this.#state = state
	}

	get anchors(): readonly LChColor[] {
		return this.#state?.anchors ?? []
	}

	get waypoints(): readonly Waypoint[] {
		return this.#state?.waypoints ?? []
	}

	get destroyed(): boolean {
		return this.#state === undefined
	}

	sample(t: number): RGBColor {
		return this.#state === undefined ? BLACK : sampleRgb(this.#state, t)
	}

	discrete(count: number): RGBColor[] {
		return this.#state === undefined ? [] : generatePalette(this.#state, count)
	}

	discreteAt(index: number): RGBColor {
		return this.#state === undefined ? BLACK : paletteAt(this.#state, index)
	}

	discreteRange(start: number, count: number): RGBColor[] {
		return this.#state === undefined ? [] : paletteRange(this.#state, start, count)
	}

	discreteSequence(): Generator<RGBColor, void, undefined> {
		return this.#state === undefined ? emptySequence() : paletteSequence(this.#state)
	}

	destroy(): void {
		this.#state = undefined
	}
}

function freezeAll<T extends object>(items: readonly T[]): readonly T[] {
	for (const item of items) {
		Object.freeze(item)
	}
	return Object.freeze([...items])
}

/**
 * Validate `config` and precompute anchors, waypoints and seed.
 * Never throws; failures come back as `{ type: 'error' }`.
 */
export function createJourney(config: JourneyConfig): CreateJourneyResult {
	const issues = validateConfig(config)
	if (issues.length > 0) {
		return { type: 'error', error: new JourneyError('InvalidConfig', issues) }
	}

	const frozen: JourneyConfig = Object.freeze({
		...config,
		anchors: freezeAll(config.anchors.map((anchor) => ({ ...anchor }))),
	})
	const anchors = freezeAll(frozen.anchors.map(rgbToLch))
	const waypoints = freezeAll(
		buildWaypoints(anchors, frozen.temperatureBias).map((waypoint) => ({
			...waypoint,
			anchor: Object.freeze({ ...waypoint.anchor }),
		})),
	)

	return {
		type: 'journey',
		journey: new JourneyImpl({
			config: frozen,
			anchors,
			waypoints,
			seed: resolveSeed(frozen.variationSeed),
		}),
	}
}

export type MaybeJourney = Journey | null | undefined

export function destroyJourney(journey: MaybeJourney): void {
	journey?.destroy()
}

export function sample(journey: MaybeJourney, t: number): RGBColor {
	return journey?.sample(t) ?? BLACK
}

export function discrete(journey: MaybeJourney, count: number): RGBColor[] {
	return journey?.discrete(count) ?? []
}

export function discreteAt(journey: MaybeJourney, index: number): RGBColor {
	return journey?.discreteAt(index) ?? BLACK
}

export function discreteRange(journey: MaybeJourney, start: number, count: number): RGBColor[] {
	return journey?.discreteRange(start, count) ?? []
}
