/**
 * CSS serialization of journey colors.
 */

import Color from 'colorjs.io'
import type { Journey } from './journey.ts'
import type { RGBColor } from './types.ts'

export type CssColorFormat = 'hex' | 'oklch' | 'srgb-linear'

export interface GradientOptions {
	/** Number of evenly spaced samples, at least 2. Default 10. */
	readonly stops?: number
	readonly angle?: string
	readonly format?: CssColorFormat
}

export interface PaletteCssOptions {
	readonly selector: string
	/** Custom property prefix: `--<output>-<index>`. Default `journey`. */
	readonly output?: string
	readonly format?: CssColorFormat
}

const OUTPUT_REGEX = /^[a-z][a-z0-9_-]*$/i

const css = {
	number: (n: number, precision = 4) => n.toFixed(precision).replace(/\.?0+$/, '') || '0',
	declaration: (name: string, value: string) => `\t--${name}: ${value};`,
} as const

export function toCssColor(rgb: RGBColor, format: CssColorFormat = 'hex'): string {
	const color = new Color('srgb-linear', [rgb.r, rgb.g, rgb.b])

	switch (format) {
		case 'hex':
			return color.to('srgb').toString({ format: 'hex' })
		case 'oklch':
			return color.to('oklch').toString({ precision: 4 })
		case 'srgb-linear':
			return color.toString({ precision: 6 })
	}
}

/**
 * A `linear-gradient()` following the continuous journey from t = 0 to 1.
 */
export function linearGradient(journey: Journey, options: GradientOptions = {}): string {
	const stops = Math.max(2, Math.floor(options.stops ?? 10))
	const angle = options.angle ?? '90deg'
	const format = options.format ?? 'hex'

	const entries: string[] = []
	for (let i = 0; i < stops; i++) {
		const t = i / (stops - 1)
		entries.push(`${toCssColor(journey.sample(t), format)} ${css.number(t * 100, 2)}%`)
	}

	return `linear-gradient(${angle}, ${entries.join(', ')})`
}

/**
 * A rule declaring one custom property per color.
 *
 * @example
 * ```ts
 * paletteCss(journey.discrete(3), { selector: ':root', output: 'brand' })
 * // :root {
 * //   --brand-0: #…;
 * //   --brand-1: #…;
 * //   --brand-2: #…;
 * // }
 * ```
 */
export function paletteCss(colors: readonly RGBColor[], options: PaletteCssOptions): string {
	const output = options.output ?? 'journey'
	if (!OUTPUT_REGEX.test(output)) {
		throw new Error(
			`Invalid output name '${output}'. Output names must start with a letter and contain only letters, numbers, hyphens, and underscores.`,
		)
	}

	const declarations = colors.map((color, i) =>
		css.declaration(`${output}-${i}`, toCssColor(color, options.format)),
	)

	return [`${options.selector} {`, ...declarations, '}'].join('\n')
}
