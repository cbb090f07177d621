/**
 * DETECTION CONTROLLER - PIPELINE & RUN STATE
 * ============================================
 *
 * Owns the run state machine and the per-sample pipeline:
 *   snapshot statistics -> score -> update window -> publish
 *
 * Every operation is synchronous and runs to completion on the
 * event loop, so a control call (stop, setSensitivity) can never
 * observe a half-applied window update.
 *
 * Events emitted:
 * - 'state': (next: RunState, previous: RunState)
 * - 'sensitivity': (next: number, previous: number)
 * - 'anomaly': ClassifiedSample
 */

import { EventEmitter } from 'events';
import type { Logger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import type {
	ClassifiedSample,
	DetectorConfig,
	DetectorStats,
	RunState,
	Sample,
	SensitivityLevel,
	StatisticsTracker,
	WindowStats,
} from './types';
import { SENSITIVITY_LEVELS } from './types';
import { createTracker } from './trackers';
import { scoreSample, isWarmingUp } from './scorer';
import { EventChannel } from './channel';
import { InvalidParameterError, InvalidSampleError } from './errors';

export interface DetectionControllerOptions {
	channel?: EventChannel<ClassifiedSample>;
	logger?: Logger;
}

export class DetectionController extends EventEmitter {
	readonly channel: EventChannel<ClassifiedSample>;
	private readonly config: DetectorConfig;
	private readonly logger?: Logger;
	private state: RunState = 'stopped';
	private tracker?: StatisticsTracker;
	private sensitivity: number;

	// Per run
	private sequence = 0;
	private lastTimestamp = -Infinity;

	// Lifetime counters
	private processed = 0;
	private anomalies = 0;
	private invalidSamples = 0;
	private droppedInactive = 0;

	constructor(config: DetectorConfig, options: DetectionControllerOptions = {}) {
		super();
		this.config = config;
		this.logger = options.logger;
		this.sensitivity = validateSensitivity(config.sensitivity);
		this.channel = options.channel ?? new EventChannel<ClassifiedSample>({
			capacity: config.channelCapacity,
			mode: config.fanOut ? 'fanout' : 'single',
		});
	}

	getState(): RunState {
		return this.state;
	}

	getSensitivity(): number {
		return this.sensitivity;
	}

	/**
	 * Stopped/Paused -> Running
	 * From Stopped a fresh window is allocated; from Paused it is reused
	 */
	start(): void {
		if (this.state === 'running') return;

		if (this.state === 'stopped' || !this.tracker) {
			this.tracker = createTracker(this.config);
			this.sequence = 0;
			this.lastTimestamp = -Infinity;
		}
		this.transition('running');
	}

	/**
	 * Running -> Paused, window preserved untouched
	 */
	pause(): void {
		if (this.state !== 'running') return;
		this.transition('paused');
	}

	/**
	 * Paused -> Running, continuing from the preserved window
	 * Does nothing from Stopped: only start() allocates a model
	 */
	resume(): void {
		if (this.state !== 'paused') return;
		this.transition('running');
	}

	/**
	 * Any -> Stopped, discarding the window
	 */
	stop(): void {
		this.tracker = undefined;
		this.sequence = 0;
		this.lastTimestamp = -Infinity;
		if (this.state !== 'stopped') {
			this.transition('stopped');
		}
	}

	/**
	 * Discard the window without changing run state
	 */
	reset(): void {
		this.tracker?.clear();
		this.sequence = 0;
		this.lastTimestamp = -Infinity;
		this.logger?.info('Detection window reset', {
			component: LogComponents.CONTROLLER,
			state: this.state,
		});
	}

	/**
	 * Replace the anomaly threshold; applies from the next sample
	 * Accepts a number of standard deviations or a named level
	 */
	setSensitivity(value: number | SensitivityLevel): void {
		let next: number;
		try {
			next = typeof value === 'number'
				? validateSensitivity(value)
				: resolveSensitivityLevel(value);
		} catch (error) {
			this.logger?.warn('Rejected sensitivity update', {
				component: LogComponents.CONTROLLER,
				requested: value,
				retained: this.sensitivity,
			});
			throw error;
		}

		const previous = this.sensitivity;
		this.sensitivity = next;
		if (next !== previous) {
			this.logger?.info('Sensitivity updated', {
				component: LogComponents.CONTROLLER,
				previous,
				sensitivity: next,
			});
			this.emit('sensitivity', next, previous);
		}
	}

	/**
	 * Ingest one sample
	 * Returns the classification, or undefined when not running
	 */
	submit(sample: Sample): ClassifiedSample | undefined {
		if (this.state !== 'running' || !this.tracker) {
			this.droppedInactive++;
			return undefined;
		}

		const reason = this.checkSample(sample);
		if (reason) {
			this.invalidSamples++;
			this.logger?.debug('Dropping invalid sample', {
				component: LogComponents.CONTROLLER,
				reason,
				timestamp: sample.timestamp,
				value: sample.value,
			});
			throw new InvalidSampleError(reason);
		}

		// Score against the baseline before this sample joins it
		const baseline = this.tracker.snapshot();
		const score = scoreSample(sample.value, baseline.mean, baseline.stdDev, this.sensitivity, {
			floor: this.config.stdDevFloor,
			warmingUp: isWarmingUp(this.sequence, this.config.warmupCount),
		});
		this.tracker.update(sample.value);

		this.sequence++;
		this.lastTimestamp = sample.timestamp;
		this.processed++;

		const classified: ClassifiedSample = Object.freeze({
			sample: Object.freeze({ timestamp: sample.timestamp, value: sample.value }),
			sequence: this.sequence,
			mean: baseline.mean,
			stdDev: baseline.stdDev,
			deviationScore: score.deviationScore,
			isAnomaly: score.isAnomaly,
		});

		this.channel.publish(classified);

		if (classified.isAnomaly) {
			this.anomalies++;
			this.emit('anomaly', classified);
		}

		return classified;
	}

	/**
	 * Current window statistics (empty stats while stopped)
	 */
	getWindowStats(): WindowStats {
		if (!this.tracker) {
			return { count: 0, mean: 0, variance: 0, stdDev: Infinity };
		}
		return this.tracker.snapshot();
	}

	getStats(): DetectorStats {
		return {
			state: this.state,
			sensitivity: this.sensitivity,
			processed: this.processed,
			anomalies: this.anomalies,
			invalidSamples: this.invalidSamples,
			droppedInactive: this.droppedInactive,
			window: this.getWindowStats(),
			channel: {
				size: this.channel.size,
				dropped: this.channel.dropped,
			},
		};
	}

	private checkSample(sample: Sample): string | undefined {
		if (typeof sample.value !== 'number' || !Number.isFinite(sample.value)) {
			return 'value must be a finite number';
		}
		if (typeof sample.timestamp !== 'number' || !Number.isFinite(sample.timestamp)) {
			return 'timestamp must be a finite number';
		}
		if (sample.timestamp < this.lastTimestamp) {
			return `timestamp ${sample.timestamp} precedes previous sample at ${this.lastTimestamp}`;
		}
		return undefined;
	}

	private transition(next: RunState): void {
		const previous = this.state;
		this.state = next;

		this.logger?.info(`Detection ${next}`, {
			component: LogComponents.CONTROLLER,
			previous,
			strategy: this.config.strategy,
			sensitivity: this.sensitivity,
		});
		this.emit('state', next, previous);
	}
}

function validateSensitivity(value: number): number {
	if (!Number.isFinite(value) || value < 0) {
		throw new InvalidParameterError('sensitivity', `must be a finite number >= 0, received ${value}`);
	}
	return value;
}

function isSensitivityLevel(level: string): level is SensitivityLevel {
	return Object.prototype.hasOwnProperty.call(SENSITIVITY_LEVELS, level);
}

function resolveSensitivityLevel(level: string): number {
	if (!isSensitivityLevel(level)) {
		throw new InvalidParameterError('sensitivity', `unknown level "${level}"`);
	}
	return SENSITIVITY_LEVELS[level];
}
