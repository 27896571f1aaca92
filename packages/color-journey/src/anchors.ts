/**
 * Anchor inputs: linear RGB objects, OKLab objects or CSS color strings.
 */

import Color from 'colorjs.io'
import { createRgb, oklabToRgb } from './color.ts'
import { JourneyError } from './errors.ts'
import type { LabColor, RGBColor } from './types.ts'

export type ColorInput = RGBColor | LabColor | string

function isRgb(input: RGBColor | LabColor): input is RGBColor {
	return 'r' in input
}

// `none` components come through as NaN
function channel(value: number): number {
	return Number.isNaN(value) ? 0 : value
}

/**
 * Convert any supported anchor input to linear RGB. CSS strings accept every
 * syntax colorjs.io understands; wide-gamut colors are not clipped here.
 *
 * @throws JourneyError when a string cannot be parsed
 */
export function parseColor(input: ColorInput): RGBColor {
	if (typeof input === 'string') {
		let color: Color
		try {
			color = new Color(input)
		} catch (error) {
			throw new JourneyError('InvalidConfig', [`cannot parse color '${input}'`], { cause: error })
		}
		const [r, g, b] = color.to('srgb-linear').coords
		return createRgb(channel(r), channel(g), channel(b))
	}

	if (isRgb(input)) {
		return createRgb(input.r, input.g, input.b)
	}

	return oklabToRgb(input)
}
