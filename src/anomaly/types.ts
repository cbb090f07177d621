/**
 * ANOMALY ENGINE - TYPE DEFINITIONS
 * ==================================
 *
 * Single-stream anomaly detection: samples, window statistics,
 * classification results and run state.
 */

/**
 * One timestamped reading from the monitored stream
 */
export interface Sample {
	readonly timestamp: number;        // Unix timestamp (ms)
	readonly value: number;
}

/**
 * Statistical horizon strategy
 */
export type WindowStrategy =
	| 'sliding'       // Fixed-size circular buffer
	| 'decay';        // Exponentially weighted (half-life)

/**
 * Statistics exposed by a tracker
 */
export interface WindowStats {
	count: number;                     // Samples inside the active horizon
	mean: number;
	variance: number;                  // Always >= 0
	stdDev: number;                    // Infinity before the first sample
}

/**
 * Online statistics tracker - all strategies implement this
 */
export interface StatisticsTracker {
	readonly strategy: WindowStrategy;
	update(value: number): WindowStats;
	snapshot(): WindowStats;
	clear(): void;
}

/**
 * Scorer output
 */
export interface ScoreResult {
	deviationScore: number;            // |value - mean| in standard deviations
	isAnomaly: boolean;
}

/**
 * Sample after classification
 */
export interface ClassifiedSample extends ScoreResult {
	readonly sample: Sample;
	readonly sequence: number;         // 1-based per run, gaps mean evictions
	readonly mean: number;             // Baseline the sample was scored against
	readonly stdDev: number;
}

/**
 * Controller run state
 */
export type RunState = 'running' | 'paused' | 'stopped';

/**
 * Named sensitivity levels (higher sensitivity = lower threshold)
 */
export type SensitivityLevel = 'low' | 'medium' | 'high';

export const SENSITIVITY_LEVELS: Record<SensitivityLevel, number> = {
	low: 4,
	medium: 3,
	high: 2,
};

/**
 * Event channel delivery mode
 */
export type ChannelMode = 'single' | 'fanout';

/**
 * Resolved detector configuration
 */
export interface DetectorConfig {
	strategy: WindowStrategy;
	windowSize?: number;               // Sliding strategy only
	halfLife?: number;                 // Decay strategy only (in samples)
	resyncInterval?: number;           // Sliding strategy: full recompute period
	sensitivity: number;
	warmupCount: number;
	channelCapacity: number;
	fanOut: boolean;
	stdDevFloor: number;
}

/**
 * Controller counters
 */
export interface DetectorStats {
	state: RunState;
	sensitivity: number;
	processed: number;
	anomalies: number;
	invalidSamples: number;
	droppedInactive: number;
	window: WindowStats;
	channel: {
		size: number;
		dropped: number;
	};
}
