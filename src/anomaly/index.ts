/**
 * Streaming anomaly detection engine
 */

export { DetectionController } from './controller';
export type { DetectionControllerOptions } from './controller';
export { EventChannel, ChannelReader } from './channel';
export type { ChannelOptions } from './channel';
export { SlidingWindowTracker, DecayWindowTracker, createTracker } from './trackers';
export { scoreSample, isWarmingUp, DEFAULT_STDDEV_FLOOR } from './scorer';
export type { ScoreOptions } from './scorer';
export {
	DetectorError,
	InvalidParameterError,
	InvalidSampleError,
	IllegalStateTransitionError,
	isDetectorError,
} from './errors';
export type { DetectorErrorCode } from './errors';
export { SENSITIVITY_LEVELS } from './types';
export type {
	Sample,
	WindowStrategy,
	WindowStats,
	StatisticsTracker,
	ScoreResult,
	ClassifiedSample,
	RunState,
	SensitivityLevel,
	ChannelMode,
	DetectorConfig,
	DetectorStats,
} from './types';
