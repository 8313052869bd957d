import { DaliConst } from './dali-const.js'
import { DaliRangeError } from './dali-errors.js'

/*
 * The standard logarithmic dimming curve: arc level 1 is 0.1% and 254 is 100%, with
 * X = 10 ^ ((n - 1) / (253 / 3) - 1).
 */

/** Converts a DALI arc level between 0 and 254 to a percentage between 0 and 100. */
export function arcLevelToPercentage(arcLevel: number): number {
	if (!Number.isInteger(arcLevel) || arcLevel < 0 || arcLevel > DaliConst.MAX_LEVEL) {
		throw new DaliRangeError(`Invalid arc level: ${arcLevel}`)
	}
	if (arcLevel === 0) {
		return 0
	}

	return Math.pow(10, 3 * (arcLevel - 1) / 253 - 1)
}

/** Converts a percentage brightness between 0 and 100 to a DALI arc level between 0 and 254. Anything above 0 is at least level 1. */
export function percentageToArcLevel(percentage: number): number {
	if (Number.isNaN(percentage) || percentage < 0 || percentage > 100) {
		throw new DaliRangeError(`Invalid percentage brightness: ${percentage}`)
	}
	if (percentage === 0) {
		return 0
	}

	return Math.min(DaliConst.MAX_LEVEL, Math.max(1, Math.round((Math.log10(percentage) + 1) * 253 / 3 + 1)))
}
