/**
 * Z-score anomaly scorer
 *
 * Pure: the result depends only on the arguments.
 */

import type { ScoreResult } from './types';

export const DEFAULT_STDDEV_FLOOR = 1e-9;

export interface ScoreOptions {
	floor?: number;          // Lower bound applied to stdDev (default 1e-9)
	warmingUp?: boolean;     // Suppress flagging while statistics settle
}

export function scoreSample(
	value: number,
	mean: number,
	stdDev: number,
	sensitivity: number,
	options: ScoreOptions = {}
): ScoreResult {
	if (options.warmingUp || !Number.isFinite(stdDev)) {
		return { deviationScore: 0, isAnomaly: false };
	}

	const floor = options.floor ?? DEFAULT_STDDEV_FLOOR;
	const deviationScore = Math.abs(value - mean) / Math.max(stdDev, floor);

	return {
		deviationScore,
		isAnomaly: deviationScore > sensitivity,
	};
}

/**
 * Whether the next sample, preceded by priorCount samples since start,
 * falls inside the warm-up period
 */
export function isWarmingUp(priorCount: number, warmupCount: number): boolean {
	return priorCount + 1 < warmupCount;
}
