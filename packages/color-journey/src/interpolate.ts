/**
 * Parametric interpolation across waypoints.
 */

import { NEUTRAL_GRAY_LCH } from './constants.ts'
import type { LChColor, LoopMode, Waypoint } from './types.ts'
import { clamp, lerp, normalizeHue, shortestHueDelta, smoothstep } from './util.ts'

/**
 * Map an unbounded journey parameter into [0, 1] according to the loop mode.
 *
 * - open: clamp
 * - closed: wrap, so 0 and 1 meet
 * - pingpong: reflect every other unit, so t and 2 - t coincide
 *
 * NaN maps to 0. Infinite values clamp in open mode and map to 0 otherwise.
 */
export function normalizeLoopPosition(t: number, mode: LoopMode): number {
	if (Number.isNaN(t)) {
		return 0
	}

	switch (mode) {
		case 'open':
			return clamp(0, t, 1)
		case 'closed': {
			if (!Number.isFinite(t)) {
				return 0
			}
			const wrapped = t % 1
			return wrapped < 0 ? (wrapped + 1) % 1 : wrapped
		}
		case 'pingpong': {
			if (!Number.isFinite(t)) {
				return 0
			}
			const remainder = t % 2
			const wrapped = remainder < 0 ? remainder + 2 : remainder
			return wrapped > 1 ? 2 - wrapped : wrapped
		}
	}
}

/**
 * Blend two LCh colors. Lightness and chroma are linear; hue travels the short
 * way around the wheel.
 */
export function mixLch(from: LChColor, to: LChColor, t: number): LChColor {
	return {
		L: lerp(from.L, to.L, t),
		C: lerp(from.C, to.C, t),
		h: normalizeHue(from.h + shortestHueDelta(from.h, to.h) * t),
	}
}

/**
 * Interpolate the waypoint path at a position in [0, 1].
 *
 * The path is split into equal-width segments, one per consecutive pair of
 * waypoints, and each segment is eased with smoothstep.
 */
export function interpolateWaypoints(waypoints: readonly Waypoint[], position: number): LChColor {
	const [first] = waypoints
	if (first === undefined) {
		return { ...NEUTRAL_GRAY_LCH }
	}
	if (waypoints.length === 1) {
		return first.anchor
	}

	const t = clamp(0, position, 1)
	const segmentCount = waypoints.length - 1
	const width = 1 / segmentCount
	const segment = Math.min(Math.floor(t / width), segmentCount - 1)
	const local = smoothstep((t - segment * width) / width)

	const from = waypoints[segment]
	const to = waypoints[segment + 1]
	if (from === undefined || to === undefined) {
		return first.anchor
	}

	return mixLch(from.anchor, to.anchor, local)
}
