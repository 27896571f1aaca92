import { lchToRgb } from './color.ts'
import { applyDynamics } from './dynamics.ts'
import { interpolateWaypoints, normalizeLoopPosition } from './interpolate.ts'
import type { JourneyState, LChColor, RGBColor } from './types.ts'
import { applyVariation } from './variation.ts'

/**
 * Continuous sampling pipeline: loop mapping → waypoint interpolation →
 * dynamics → variation. Dynamics and variation see the loop-mapped position,
 * so closed and ping-pong journeys repeat exactly.
 */
export function sampleLch(state: JourneyState, t: number): LChColor {
	const position = normalizeLoopPosition(t, state.config.loopMode)
	const base = interpolateWaypoints(state.waypoints, position)
	const shaped = applyDynamics(base, position, state.config)
	return applyVariation(shaped, position, state.seed, state.config)
}

export function sampleRgb(state: JourneyState, t: number): RGBColor {
	return lchToRgb(sampleLch(state, t))
}
