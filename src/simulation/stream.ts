/**
 * SIMULATED DATA STREAM
 * =====================
 *
 * Noisy sawtooth signal with injected spikes and occasional corrupt
 * readings, for exercising the detector without a live feed.
 *
 *   value = base + uniform(-noise, noise) + (i mod period)
 *         [+ uniform(spikeMin, spikeMax) with probability anomalyRatio]
 *   corrupt readings are emitted as NaN with probability faultRatio
 */

import type { Sample } from '../anomaly/types';
import type { DataSource, SimulatedStreamOptions, SimulatedStreamStats } from './types';
import { DEFAULT_STREAM_OPTIONS } from './types';

export class SimulatedStream implements DataSource {
	private readonly options: SimulatedStreamOptions;
	private index = 0;
	private spikes = 0;
	private faults = 0;

	constructor(options: Partial<SimulatedStreamOptions> = {}) {
		this.options = {
			...DEFAULT_STREAM_OPTIONS,
			startTime: Date.now(),
			random: Math.random,
			...options,
		};
	}

	next(): Sample | undefined {
		const { points, baseValue, noise, seasonalPeriod, anomalyRatio, faultRatio, stepMs, startTime } = this.options;
		if (this.index >= points) return undefined;

		const i = this.index++;
		let value = baseValue + this.uniform(-noise, noise) + (i % seasonalPeriod);

		if (this.options.random() < anomalyRatio) {
			value += this.uniform(this.options.spikeRange[0], this.options.spikeRange[1]);
			this.spikes++;
		}

		if (this.options.random() < faultRatio) {
			value = NaN;
			this.faults++;
		}

		return { timestamp: startTime + i * stepMs, value };
	}

	get exhausted(): boolean {
		return this.index >= this.options.points;
	}

	getStats(): SimulatedStreamStats {
		return {
			emitted: this.index,
			spikes: this.spikes,
			faults: this.faults,
		};
	}

	private uniform(min: number, max: number): number {
		return min + this.options.random() * (max - min);
	}
}
