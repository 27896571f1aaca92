/**
 * Designed waypoints: the control points a journey passes through.
 */

import {
	SINGLE_ANCHOR_WAYPOINTS,
	TAU,
	TEMPERATURE_SHIFT,
	WAYPOINT_CHROMA_SWELL,
	WAYPOINT_LIGHTNESS_WAVE,
} from './constants.ts'
import type { LChColor, TemperatureBias, Waypoint } from './types.ts'
import { normalizeHue, smoothstep } from './util.ts'

/**
 * A single anchor becomes a full revolution of the hue wheel. Hue advances on
 * a smoothstep curve, chroma swells toward the middle and lightness makes one
 * gentle oscillation.
 */
function buildWheelWaypoints(base: LChColor): Waypoint[] {
	const waypoints: Waypoint[] = []
	const last = SINGLE_ANCHOR_WAYPOINTS - 1

	for (let i = 0; i < SINGLE_ANCHOR_WAYPOINTS; i++) {
		const t = i / last
		waypoints.push({
			anchor: {
				L: base.L * (1 + WAYPOINT_LIGHTNESS_WAVE * Math.sin(t * TAU)),
				C: base.C * (1 + WAYPOINT_CHROMA_SWELL * Math.sin(t * Math.PI)),
				h: base.h + smoothstep(t) * TAU,
			},
			weight: 1,
		})
	}

	return waypoints
}

function temperatureShift(bias: TemperatureBias): number {
	switch (bias) {
		case 'warm':
			return TEMPERATURE_SHIFT
		case 'cool':
			return -TEMPERATURE_SHIFT
		case 'neutral':
			return 0
	}
}

/**
 * Build the waypoint list for a set of anchors (already in LCh).
 * Multiple anchors are used as-is, in order.
 */
export function buildWaypoints(
	anchors: readonly LChColor[],
	temperature: TemperatureBias,
): readonly Waypoint[] {
	const [first] = anchors
	if (first === undefined) {
		return []
	}

	const designed =
		anchors.length === 1
			? buildWheelWaypoints(first)
			: anchors.map((anchor) => ({ anchor, weight: 1 }))

	const shift = temperatureShift(temperature)

	return designed.map(({ anchor, weight }) => ({
		anchor: { L: anchor.L, C: anchor.C, h: normalizeHue(anchor.h + shift) },
		weight,
	}))
}
