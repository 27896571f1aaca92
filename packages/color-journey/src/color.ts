/**
 * Linear RGB ⇄ OKLab ⇄ OKLCH conversions and perceptual distance.
 *
 * Matrices are Björn Ottosson's reference OKLab coefficients. Cube roots use
 * `Math.cbrt` (full double precision) rather than a bit-trick approximation.
 */

import { READABLE_MAX_LIGHTNESS, READABLE_MIN_LIGHTNESS } from './constants.ts'
import type { LabColor, LChColor, RGBColor } from './types.ts'
import { clamp, normalizeHue } from './util.ts'

class RGBColorImpl implements RGBColor {
	readonly r: number
	readonly g: number
	readonly b: number

	constructor(r: number, g: number, b: number) {
		this.r = r
		this.g = g
		this.b = b
	}
}

/**
 * Create a new RGB color. Channels are not clamped.
 */
export function createRgb(r: number, g: number, b: number): RGBColor {
	return new RGBColorImpl(r, g, b)
}

export const BLACK: RGBColor = Object.freeze(createRgb(0, 0, 0))

export function rgbToOklab(rgb: RGBColor): LabColor {
	const { r, g, b } = rgb

	// Cone response
	const l = 0.4122214708 * r + 0.5363325363 * g + 0.0514459929 * b
	const m = 0.2119034982 * r + 0.6806995451 * g + 0.1073969566 * b
	const s = 0.0883024619 * r + 0.2817188376 * g + 0.6299787005 * b

	const l_ = Math.cbrt(l)
	const m_ = Math.cbrt(m)
	const s_ = Math.cbrt(s)

	return {
		L: 0.2104542553 * l_ + 0.793617785 * m_ - 0.0040720468 * s_,
		a: 1.9779984951 * l_ - 2.428592205 * m_ + 0.4505937099 * s_,
		b: 0.0259040371 * l_ + 0.7827717662 * m_ - 0.808675766 * s_,
	}
}

/**
 * Inverse of `rgbToOklab`. The result may fall outside the RGB cube; pass it
 * through `clampRgb` before treating it as final.
 */
export function oklabToRgb(lab: LabColor): RGBColor {
	const l_ = lab.L + 0.3963377774 * lab.a + 0.2158037573 * lab.b
	const m_ = lab.L - 0.1055613458 * lab.a - 0.0638541728 * lab.b
	const s_ = lab.L - 0.0894841775 * lab.a - 1.291485548 * lab.b

	const l = l_ * l_ * l_
	const m = m_ * m_ * m_
	const s = s_ * s_ * s_

	return createRgb(
		4.0767416621 * l - 3.3077115913 * m + 0.2309699292 * s,
		-1.2684380046 * l + 2.6097574011 * m - 0.3413193965 * s,
		-0.0041960863 * l - 0.7034186147 * m + 1.707614701 * s,
	)
}

export function oklabToLch(lab: LabColor): LChColor {
	return {
		L: lab.L,
		C: Math.sqrt(lab.a * lab.a + lab.b * lab.b),
		h: normalizeHue(Math.atan2(lab.b, lab.a)),
	}
}

export function lchToOklab(lch: LChColor): LabColor {
	return {
		L: lch.L,
		a: lch.C * Math.cos(lch.h),
		b: lch.C * Math.sin(lch.h),
	}
}

/**
 * Euclidean distance in OKLab (ΔE-OK).
 */
export function deltaE(x: LabColor, y: LabColor): number {
	const dL = x.L - y.L
	const da = x.a - y.a
	const db = x.b - y.b
	return Math.sqrt(dL * dL + da * da + db * db)
}

export function clampRgb(rgb: RGBColor): RGBColor {
	return createRgb(clamp(0, rgb.r, 1), clamp(0, rgb.g, 1), clamp(0, rgb.b, 1))
}

/**
 * Map an OKLab color to the Lab value of its clamped RGB output, i.e. the
 * color that will actually be emitted.
 */
export function clipToRgbGamut(lab: LabColor): LabColor {
	return rgbToOklab(clampRgb(oklabToRgb(lab)))
}

/**
 * Convert a journey color to final, in-gamut RGB.
 */
export function lchToRgb(lch: LChColor): RGBColor {
	return clampRgb(oklabToRgb(lchToOklab(lch)))
}

export function rgbToLch(rgb: RGBColor): LChColor {
	return oklabToLch(rgbToOklab(rgb))
}

/**
 * True when lightness is comfortably away from black and white.
 */
export function isReadable(lab: LabColor): boolean {
	return lab.L >= READABLE_MIN_LIGHTNESS && lab.L <= READABLE_MAX_LIGHTNESS
}
