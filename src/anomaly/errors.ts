/**
 * Detector errors
 */

import type { RunState } from './types';

export type DetectorErrorCode =
	| 'INVALID_PARAMETER'
	| 'INVALID_SAMPLE'
	| 'ILLEGAL_STATE_TRANSITION';

export class DetectorError extends Error {
	readonly code: DetectorErrorCode;

	constructor(code: DetectorErrorCode, message: string) {
		super(message);
		this.name = 'DetectorError';
		this.code = code;
	}
}

export class InvalidParameterError extends DetectorError {
	readonly parameter: string;

	constructor(parameter: string, reason: string) {
		super('INVALID_PARAMETER', `Invalid ${parameter}: ${reason}`);
		this.name = 'InvalidParameterError';
		this.parameter = parameter;
	}
}

export class InvalidSampleError extends DetectorError {
	readonly reason: string;

	constructor(reason: string) {
		super('INVALID_SAMPLE', `Invalid sample: ${reason}`);
		this.name = 'InvalidSampleError';
		this.reason = reason;
	}
}

// No current transition raises this; every control call is defined from every state.
export class IllegalStateTransitionError extends DetectorError {
	readonly from: RunState;
	readonly action: string;

	constructor(from: RunState, action: string) {
		super('ILLEGAL_STATE_TRANSITION', `Cannot ${action} while ${from}`);
		this.name = 'IllegalStateTransitionError';
		this.from = from;
		this.action = action;
	}
}

export function isDetectorError(error: unknown): error is DetectorError {
	return error instanceof DetectorError;
}
