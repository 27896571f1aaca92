/**
 * Shared constants for the journey engine.
 *
 * Every tunable number of the pipeline lives here so that the sampler,
 * the discrete palette generator and the tests agree on the same values.
 */

export const TAU = 2 * Math.PI

// =============================================================================
// Anchors & Waypoints
// =============================================================================

export const MIN_ANCHORS = 1
export const MAX_ANCHORS = 8

/** Waypoints generated around the wheel for a single-anchor journey. */
export const SINGLE_ANCHOR_WAYPOINTS = 8

/** Peak of the single-hump chroma envelope: C * (1 + 0.2 * sin(t * π)). */
export const WAYPOINT_CHROMA_SWELL = 0.2

/** Amplitude of the one-period lightness wave: L * (1 + 0.1 * sin(t * 2π)). */
export const WAYPOINT_LIGHTNESS_WAVE = 0.1

/** Hue rotation (radians) applied to every waypoint by a warm or cool bias. */
export const TEMPERATURE_SHIFT = 0.3

/** Returned by the sampler when there is nothing to interpolate. */
export const NEUTRAL_GRAY_LCH = { L: 0.5, C: 0.1, h: 0 } as const

// =============================================================================
// Dynamics
// =============================================================================

/** Fraction of the way toward white (lighter) or black (darker). */
export const LIGHTNESS_BIAS_STEP = 0.2

/** Scale applied to the custom lightness weight, giving a shift in [-0.2, 0.2]. */
export const LIGHTNESS_CUSTOM_SCALE = 0.2

export const CHROMA_MUTED = 0.6
export const CHROMA_VIVID = 1.4

/**
 * Triangular vibrancy bump centered on t = 0.5:
 * C *= 1 + vibrancy * VIBRANCY_PEAK * max(0, 1 - |t - 0.5| / VIBRANCY_HALF_WIDTH)
 */
export const VIBRANCY_PEAK = 0.6
export const VIBRANCY_HALF_WIDTH = 0.35

/** Practical chroma ceiling for OKLCH colors near the sRGB gamut. */
export const MAX_CHROMA = 0.4

// =============================================================================
// Variation
// =============================================================================

/** Used whenever a configuration asks for seed 0. */
export const DEFAULT_SEED = 0x123456789abcdef0n

/** Resolution of the position key mixed into the seed: floor(t * 1e6). */
export const VARIATION_POSITION_SCALE = 1_000_000

export const VARIATION_SUBTLE = 0.02
export const VARIATION_NOTICEABLE = 0.05

// =============================================================================
// Contrast
// =============================================================================

export const CONTRAST_LOW = 0.05
export const CONTRAST_MEDIUM = 0.1
export const CONTRAST_HIGH = 0.15

/** Upper bound on refinement rounds before the best candidate is returned. */
export const CONTRAST_MAX_ITERATIONS = 5

/** Overshoot added to the solved lightness offset so rounding cannot land short. */
export const CONTRAST_MARGIN = 1e-4

/** Hue step (radians) of the first rotation round, growing linearly per round. */
export const CONTRAST_HUE_STEP = 0.2

/** Multiplicative chroma boost per rotation round. */
export const CONTRAST_CHROMA_BOOST = 1.15

// =============================================================================
// Discrete Palettes
// =============================================================================

/** Journey spacing between consecutive indices of the index sequence (20 per cycle). */
export const DISCRETE_INDEX_SPACING = 0.05

/** Palettes longer than this receive the periodic chroma pulse. */
export const CHROMA_PULSE_THRESHOLD = 20

/** Chroma pulse: C *= 1 + CHROMA_PULSE_AMPLITUDE * cos(i * π / CHROMA_PULSE_PERIOD). */
export const CHROMA_PULSE_AMPLITUDE = 0.1
export const CHROMA_PULSE_PERIOD = 5

// =============================================================================
// Readability
// =============================================================================

export const READABLE_MIN_LIGHTNESS = 0.2
export const READABLE_MAX_LIGHTNESS = 0.95
