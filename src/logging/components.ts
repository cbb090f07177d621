/**
 * Logging Component Names
 *
 * Standardized component names for structured logging.
 *
 * Usage:
 *   logger.info('Detection started', { component: LogComponents.CONTROLLER });
 */

export const LogComponents = {
	// Engine
	CONTROLLER: 'DetectionController',

	// Collaborators
	PUMP: 'StreamPump',
	MONITOR: 'Monitor',

	CONFIG: 'Config',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
