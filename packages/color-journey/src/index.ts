/**
 * color-journey - perceptually uniform color journeys in OKLab
 */

export { type ColorInput, parseColor } from './anchors.ts'
export {
	BLACK,
	clampRgb,
	createRgb,
	deltaE,
	isReadable,
	lchToOklab,
	oklabToLch,
	oklabToRgb,
	rgbToOklab,
} from './color.ts'
export { initDefaultConfig, validateConfig, withAnchors } from './config.ts'
export { DEFAULT_SEED } from './constants.ts'
export { enforceMinimumContrast } from './contrast.ts'
export {
	type CssColorFormat,
	type GradientOptions,
	linearGradient,
	type PaletteCssOptions,
	paletteCss,
	toCssColor,
} from './css.ts'
export { JourneyError, type JourneyErrorCode } from './errors.ts'
export {
	type CreateJourneyResult,
	createJourney,
	destroyJourney,
	discrete,
	discreteAt,
	discreteRange,
	type Journey,
	type MaybeJourney,
	sample,
} from './journey.ts'
export {
	defineJourney,
	type JourneyOptions,
	type JourneyStyle,
	toJourneyConfig,
	type VariationOptions,
} from './options.ts'
export type {
	ChromaBias,
	ContrastLevel,
	JourneyConfig,
	LabColor,
	LChColor,
	LightnessBias,
	LoopMode,
	RGBColor,
	TemperatureBias,
	VariationStrength,
	Waypoint,
} from './types.ts'
export { createRandom, VariationDimension, type VariationDimensionName } from './variation.ts'
