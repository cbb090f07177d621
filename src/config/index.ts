/**
 * Configuration Module
 * ====================
 *
 * Schema validation and environment loading for the detector
 * and the simulated data source.
 */

import { z } from 'zod';
import type { DetectorConfig } from '../anomaly/types';
import { InvalidParameterError } from '../anomaly/errors';

export const DEFAULT_WINDOW_SIZE = 100;

/**
 * Detector options as supplied by callers
 * windowSize and halfLife are mutually exclusive and pick the strategy
 */
export const DetectorConfigSchema = z.object({
	windowSize: z.number().int().min(2).optional(),
	halfLife: z.number().finite().positive().optional(),
	resyncInterval: z.number().int().min(1).optional(),
	sensitivity: z.number().finite().min(0).default(3),
	warmupCount: z.number().int().min(1).default(10),
	channelCapacity: z.number().int().min(1).default(200),
	fanOut: z.boolean().default(false),
	stdDevFloor: z.number().finite().positive().default(1e-9),
}).strict().superRefine((config, ctx) => {
	if (config.windowSize !== undefined && config.halfLife !== undefined) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ['halfLife'],
			message: 'cannot be combined with windowSize',
		});
	}
	if (config.halfLife !== undefined && config.resyncInterval !== undefined) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ['resyncInterval'],
			message: 'only applies to the sliding window strategy',
		});
	}
});

export type DetectorConfigInput = z.input<typeof DetectorConfigSchema>;

/**
 * Simulated stream options
 */
export const SimulatorConfigSchema = z.object({
	points: z.number().int().min(1).default(1000),
	anomalyRatio: z.number().min(0).max(1).default(0.05),
	faultRatio: z.number().min(0).max(1).default(0.01),
	intervalMs: z.number().int().min(1).default(50),
}).strict();

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;
export type SimulatorConfigInput = z.input<typeof SimulatorConfigSchema>;

export interface AppConfig {
	detector: DetectorConfig;
	simulator: SimulatorConfig;
}

function toInvalidParameter(error: z.ZodError): InvalidParameterError {
	const issue = error.issues[0];
	const parameter = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
	return new InvalidParameterError(parameter, issue ? issue.message : 'invalid configuration');
}

/**
 * Validate detector options and resolve the window strategy
 * Throws InvalidParameterError naming the first offending option
 */
export function parseConfig(input: DetectorConfigInput = {}): DetectorConfig {
	const result = DetectorConfigSchema.safeParse(input);
	if (!result.success) {
		throw toInvalidParameter(result.error);
	}

	const { windowSize, halfLife, resyncInterval, ...rest } = result.data;

	if (halfLife !== undefined) {
		return { strategy: 'decay', halfLife, ...rest };
	}

	const size = windowSize ?? DEFAULT_WINDOW_SIZE;
	return {
		strategy: 'sliding',
		windowSize: size,
		resyncInterval: resyncInterval ?? size,
		...rest,
	};
}

export function parseSimulatorConfig(input: SimulatorConfigInput = {}): SimulatorConfig {
	const result = SimulatorConfigSchema.safeParse(input);
	if (!result.success) {
		throw toInvalidParameter(result.error);
	}
	return result.data;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
	const raw = env[key];
	if (raw === undefined || raw.trim() === '') return undefined;
	return Number(raw);
}

function readBoolean(env: Env, key: string, parameter: string): boolean | undefined {
	const raw = env[key];
	if (raw === undefined || raw.trim() === '') return undefined;

	const normalized = raw.trim().toLowerCase();
	if (normalized === 'true' || normalized === '1') return true;
	if (normalized === 'false' || normalized === '0') return false;
	throw new InvalidParameterError(parameter, `expected true or false, received "${raw}"`);
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: Env = process.env): AppConfig {
	const detector = parseConfig({
		windowSize: readNumber(env, 'DETECTOR_WINDOW_SIZE'),
		halfLife: readNumber(env, 'DETECTOR_HALF_LIFE'),
		resyncInterval: readNumber(env, 'DETECTOR_RESYNC_INTERVAL'),
		sensitivity: readNumber(env, 'DETECTOR_SENSITIVITY'),
		warmupCount: readNumber(env, 'DETECTOR_WARMUP_COUNT'),
		channelCapacity: readNumber(env, 'DETECTOR_CHANNEL_CAPACITY'),
		fanOut: readBoolean(env, 'DETECTOR_FAN_OUT', 'fanOut'),
		stdDevFloor: readNumber(env, 'DETECTOR_STDDEV_FLOOR'),
	});

	const simulator = parseSimulatorConfig({
		points: readNumber(env, 'SIMULATOR_POINTS'),
		anomalyRatio: readNumber(env, 'SIMULATOR_ANOMALY_RATIO'),
		faultRatio: readNumber(env, 'SIMULATOR_FAULT_RATIO'),
		intervalMs: readNumber(env, 'SIMULATOR_INTERVAL_MS'),
	});

	return { detector, simulator };
}

/**
 * Get human-readable configuration summary
 */
export function getConfigSummary(config: DetectorConfig): string {
	const horizon = config.strategy === 'sliding'
		? `sliding window of ${config.windowSize} samples (resync every ${config.resyncInterval})`
		: `decay window with half-life ${config.halfLife} samples`;

	return `
Anomaly Detection Configuration:
  Horizon: ${horizon}
  Sensitivity: ${config.sensitivity}σ
  Warm-up: ${config.warmupCount} samples
  StdDev floor: ${config.stdDevFloor}
  Channel: capacity ${config.channelCapacity}, ${config.fanOut ? 'fan-out' : 'single consumer'}
	`.trim();
}
