import { TAU } from './constants.ts'

export function clamp(min: number, value: number, max: number): number {
	return Math.max(min, Math.min(max, value))
}

export function lerp(a: number, b: number, t: number): number {
	return a + (b - a) * t
}

/**
 * Cubic ease (3x² - 2x³). Input is clamped to [0, 1] first.
 */
export function smoothstep(t: number): number {
	const x = clamp(0, t, 1)
	return x * x * (3 - 2 * x)
}

/**
 * Wrap a hue angle into [0, 2π).
 */
export function normalizeHue(h: number): number {
	const wrapped = h % TAU
	const positive = wrapped < 0 ? wrapped + TAU : wrapped
	// -1e-17 + TAU rounds up to TAU
	return positive >= TAU ? 0 : positive
}

/**
 * Wrap a hue difference into (-π, π] so that blending takes the short arc.
 */
export function shortestHueDelta(from: number, to: number): number {
	let delta = (to - from) % TAU
	if (delta > Math.PI) {
		delta -= TAU
	} else if (delta <= -Math.PI) {
		delta += TAU
	}
	return delta
}
