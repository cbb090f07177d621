/**
 * SIMULATION - TYPE DEFINITIONS
 * ==============================
 *
 * Contracts for anything that feeds samples into the detector.
 */

import type { Sample } from '../anomaly/types';

/**
 * Produces ordered numeric samples, one per call
 * Returns undefined once exhausted
 */
export interface DataSource {
	next(): Sample | undefined;
}

/**
 * Simulated stream shape
 */
export interface SimulatedStreamOptions {
	points: number;                   // Total samples before exhaustion
	anomalyRatio: number;             // Probability of a spike per sample
	faultRatio: number;               // Probability of a corrupt (NaN) reading
	baseValue: number;
	noise: number;                    // Uniform noise amplitude (+/-)
	seasonalPeriod: number;           // Sawtooth period in samples
	spikeRange: [number, number];     // Added to the value on a spike
	stepMs: number;                   // Timestamp increment per sample
	startTime: number;
	random: () => number;             // Uniform [0, 1) source
}

export interface SimulatedStreamStats {
	emitted: number;
	spikes: number;
	faults: number;
}

export const DEFAULT_STREAM_OPTIONS: Omit<SimulatedStreamOptions, 'startTime' | 'random'> = {
	points: 1000,
	anomalyRatio: 0.05,
	faultRatio: 0.01,
	baseValue: 100,
	noise: 10,
	seasonalPeriod: 100,
	spikeRange: [50, 100],
	stepMs: 10,
};
