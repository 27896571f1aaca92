/**
 * Print a palette, its neighbour distances and a gradient for a few anchor sets.
 *
 * Usage: tsx scripts/preview-journey.ts [count]
 */

import { deltaE, rgbToOklab } from '../src/color.ts'
import { linearGradient, paletteCss, toCssColor } from '../src/css.ts'
import { defineJourney, type JourneyOptions } from '../src/options.ts'

const count = Number(process.argv[2] ?? 8)

const presets: Record<string, JourneyOptions> = {
	single: { anchors: ['oklch(0.6 0.12 250)'] },
	sunset: { anchors: ['#ff6b35', '#f7c59f', '#2e294e'], style: 'warmEarth' },
	loop: { anchors: ['crimson', 'gold', 'teal'], style: 'vividLoop' },
	varied: {
		anchors: ['#3a86ff', '#ff006e'],
		variation: { strength: 'noticeable', seed: 42 },
	},
}

for (const [name, options] of Object.entries(presets)) {
	const journey = defineJourney(options)
	const colors = journey.discrete(count)

	console.log(`\n=== ${name} ===`)
	colors.forEach((color, i) => {
		const previous = colors[i - 1]
		const distance = previous ? deltaE(rgbToOklab(previous), rgbToOklab(color)).toFixed(4) : '-'
		console.log(`${String(i).padStart(2)}  ${toCssColor(color)}  ${toCssColor(color, 'oklch')}  ΔE ${distance}`)
	})

	console.log(paletteCss(colors, { selector: `.${name}`, output: name }))
	console.log(linearGradient(journey, { stops: 6 }))
}
