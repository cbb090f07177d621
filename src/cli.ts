#!/usr/bin/env node
/**
 * Stream anomaly monitor
 *
 * Signals:
 *   SIGINT / SIGTERM  - stop and exit
 *   SIGUSR2           - pause / resume
 *   SIGHUP            - cycle sensitivity (low, medium, high)
 */

import dotenv from 'dotenv';
import { loadConfigFromEnv } from './config';
import { createLogger } from './logging/logger';
import { LogComponents } from './logging/components';
import { isDetectorError } from './anomaly/errors';
import { startMonitor } from './monitor';

dotenv.config();

const logger = createLogger('stream-anomaly');

async function main(): Promise<void> {
	const config = loadConfigFromEnv();
	const monitor = startMonitor({ config, logger });

	process.on('SIGINT', monitor.shutdown);
	process.on('SIGTERM', monitor.shutdown);
	process.on('SIGUSR2', monitor.togglePause);
	process.on('SIGHUP', () => {
		const level = monitor.cycleSensitivity();
		logger.info(`Sensitivity set to ${level}`, { component: LogComponents.MONITOR });
	});

	await monitor.done;
}

main().catch(error => {
	logger.error('Monitor failed', {
		component: LogComponents.MONITOR,
		code: isDetectorError(error) ? error.code : undefined,
		error: error instanceof Error ? error.message : String(error),
	});
	process.exitCode = 1;
});
