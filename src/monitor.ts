/**
 * CONSOLE MONITOR
 * ===============
 *
 * Wires a data source, the detection controller and a channel consumer
 * that logs every flagged sample. Operator actions map onto controller
 * calls; rendering is left to whatever reads the channel.
 */

import type { Logger } from './logging/logger';
import { LogComponents } from './logging/components';
import type { AppConfig } from './config';
import { getConfigSummary } from './config';
import { DetectionController } from './anomaly/controller';
import type { ChannelReader } from './anomaly/channel';
import type { ClassifiedSample, DetectorStats, SensitivityLevel } from './anomaly/types';
import { SENSITIVITY_LEVELS } from './anomaly/types';
import { StreamPump } from './simulation/pump';
import { SimulatedStream } from './simulation/stream';
import type { DataSource } from './simulation/types';

export interface MonitorOptions {
	config: AppConfig;
	logger: Logger;
	source?: DataSource;
}

export interface MonitorHandle {
	controller: DetectionController;
	pump: StreamPump;
	/**
	 * Toggle between running and paused
	 */
	togglePause(): void;
	setSensitivity(value: number | SensitivityLevel): void;
	/**
	 * Step to the next named level (low, medium, high, then low again)
	 */
	cycleSensitivity(): SensitivityLevel;
	shutdown(): void;
	/**
	 * Resolves with final counters once the consumer has drained.
	 * Rejects with the pump's error when the source failed.
	 */
	done: Promise<DetectorStats>;
}

const LEVEL_ORDER: SensitivityLevel[] = ['low', 'medium', 'high'];

async function consume(reader: ChannelReader<ClassifiedSample>, logger: Logger): Promise<void> {
	for await (const item of reader) {
		if (!item.isAnomaly) continue;

		logger.warn('Anomaly detected', {
			component: LogComponents.MONITOR,
			sequence: item.sequence,
			timestamp: item.sample.timestamp,
			value: item.sample.value,
			deviationScore: Number(item.deviationScore.toFixed(2)),
			baseline: Number(item.mean.toFixed(2)),
		});
	}
}

export function startMonitor(options: MonitorOptions): MonitorHandle {
	const { config, logger } = options;

	logger.info(getConfigSummary(config.detector), { component: LogComponents.CONFIG });

	const controller = new DetectionController(config.detector, { logger });
	const source = options.source ?? new SimulatedStream({
		points: config.simulator.points,
		anomalyRatio: config.simulator.anomalyRatio,
		faultRatio: config.simulator.faultRatio,
	});
	const pump = new StreamPump(source, controller, {
		intervalMs: config.simulator.intervalMs,
		logger,
	});

	const reader = controller.channel.subscribe();
	let stopped = false;

	const shutdown = (): void => {
		if (stopped) return;
		stopped = true;
		pump.stop();
		controller.stop();
		controller.channel.close();
	};

	const togglePause = (): void => {
		if (controller.getState() === 'running') {
			controller.pause();
		} else {
			controller.resume();
		}
	};

	const setSensitivity = (value: number | SensitivityLevel): void => {
		controller.setSensitivity(value);
	};

	const cycleSensitivity = (): SensitivityLevel => {
		const current = controller.getStats().sensitivity;
		const index = LEVEL_ORDER.findIndex(level => SENSITIVITY_LEVELS[level] === current);
		const next = LEVEL_ORDER[(index + 1) % LEVEL_ORDER.length];
		controller.setSensitivity(next);
		return next;
	};

	let failure: Error | undefined;

	pump.on('end', () => {
		logger.info('Data source exhausted', { component: LogComponents.MONITOR });
		shutdown();
	});

	pump.on('failed', (error: Error) => {
		failure = error;
		shutdown();
	});

	const done = consume(reader, logger).then(() => {
		const stats = controller.getStats();
		logger.info('Monitor finished', {
			component: LogComponents.MONITOR,
			processed: stats.processed,
			anomalies: stats.anomalies,
			invalidSamples: stats.invalidSamples,
			dropped: reader.dropped,
			failed: failure !== undefined,
		});
		if (failure) {
			throw failure;
		}
		return stats;
	});

	controller.start();
	pump.start();

	return { controller, pump, togglePause, setSensitivity, cycleSensitivity, shutdown, done };
}
