/**
 * WINDOWED STATISTICS TRACKERS
 * =============================
 *
 * Online mean/variance over a bounded horizon, one update per sample.
 */

import type { DetectorConfig, StatisticsTracker, WindowStats } from './types';
import {
	createBuffer,
	addValue,
	clearBuffer,
	getMean,
	getVariance,
	getRecentValues,
	type WindowBuffer,
} from './buffer';
import { InvalidParameterError } from './errors';

const EMPTY_STATS: Readonly<WindowStats> = Object.freeze({
	count: 0,
	mean: 0,
	variance: 0,
	stdDev: Infinity,
});

/**
 * Fixed sliding window over the last N values
 */
export class SlidingWindowTracker implements StatisticsTracker {
	readonly strategy = 'sliding' as const;
	private buffer: WindowBuffer;

	constructor(windowSize: number, resyncInterval: number = windowSize) {
		if (!Number.isInteger(windowSize) || windowSize < 2) {
			throw new InvalidParameterError('windowSize', 'must be an integer >= 2');
		}
		if (!Number.isInteger(resyncInterval) || resyncInterval < 1) {
			throw new InvalidParameterError('resyncInterval', 'must be an integer >= 1');
		}
		this.buffer = createBuffer(windowSize, resyncInterval);
	}

	get windowSize(): number {
		return this.buffer.maxSize;
	}

	update(value: number): WindowStats {
		addValue(this.buffer, value);
		return this.snapshot();
	}

	snapshot(): WindowStats {
		if (this.buffer.size === 0) return { ...EMPTY_STATS };

		const variance = getVariance(this.buffer);
		return {
			count: this.buffer.size,
			mean: getMean(this.buffer),
			variance,
			stdDev: Math.sqrt(variance),
		};
	}

	/**
	 * Buffered values, oldest first
	 */
	values(): number[] {
		return getRecentValues(this.buffer, this.buffer.size);
	}

	clear(): void {
		clearBuffer(this.buffer);
	}
}

/**
 * Exponentially weighted window parameterised by half-life (in samples)
 */
export class DecayWindowTracker implements StatisticsTracker {
	readonly strategy = 'decay' as const;
	readonly alpha: number;
	private count = 0;
	private mean = 0;
	private variance = 0;

	constructor(readonly halfLife: number) {
		if (!Number.isFinite(halfLife) || halfLife <= 0) {
			throw new InvalidParameterError('halfLife', 'must be a positive number');
		}
		// Weight of a sample halves every halfLife updates
		this.alpha = 1 - Math.pow(2, -1 / halfLife);
	}

	update(value: number): WindowStats {
		if (this.count === 0) {
			this.mean = value;
			this.variance = 0;
		} else {
			const delta = value - this.mean;
			this.mean += this.alpha * delta;
			this.variance += this.alpha * (delta * delta * (1 - this.alpha) - this.variance);
			this.variance = Math.max(0, this.variance);
		}
		this.count++;
		return this.snapshot();
	}

	snapshot(): WindowStats {
		if (this.count === 0) return { ...EMPTY_STATS };

		return {
			count: this.count,
			mean: this.mean,
			variance: this.variance,
			stdDev: Math.sqrt(this.variance),
		};
	}

	clear(): void {
		this.count = 0;
		this.mean = 0;
		this.variance = 0;
	}
}

/**
 * Build the tracker matching the configured strategy
 */
export function createTracker(config: DetectorConfig): StatisticsTracker {
	switch (config.strategy) {
		case 'sliding':
			if (config.windowSize === undefined) {
				throw new InvalidParameterError('windowSize', 'required for the sliding strategy');
			}
			return new SlidingWindowTracker(config.windowSize, config.resyncInterval ?? config.windowSize);
		case 'decay':
			if (config.halfLife === undefined) {
				throw new InvalidParameterError('halfLife', 'required for the decay strategy');
			}
			return new DecayWindowTracker(config.halfLife);
	}
}
