/**
 * STREAM PUMP
 * ===========
 *
 * Moves samples from a data source into the detection controller on a
 * fixed interval. Invalid samples are counted and skipped; the pump
 * stops itself once the source is exhausted.
 *
 * Events emitted:
 * - 'end': source exhausted
 * - 'failed': a scheduled tick threw; the pump has stopped
 */

import { EventEmitter } from 'events';
import type { Logger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { ClassifiedSample, Sample } from '../anomaly/types';
import { InvalidSampleError } from '../anomaly/errors';
import type { DataSource } from './types';

/**
 * The controller surface the pump needs
 */
export interface SampleSink {
	submit(sample: Sample): ClassifiedSample | undefined;
}

export interface StreamPumpOptions {
	intervalMs: number;
	logger?: Logger;
}

export interface StreamPumpStatus {
	running: boolean;
	startedAt?: number;
	pulled: number;
	rejected: number;
	exhausted: boolean;
}

export class StreamPump extends EventEmitter {
	private readonly source: DataSource;
	private readonly sink: SampleSink;
	private readonly intervalMs: number;
	private readonly logger?: Logger;
	private timer?: NodeJS.Timeout;
	private startedAt?: number;
	private pulled = 0;
	private rejected = 0;
	private exhausted = false;

	constructor(source: DataSource, sink: SampleSink, options: StreamPumpOptions) {
		super();
		this.source = source;
		this.sink = sink;
		this.intervalMs = options.intervalMs;
		this.logger = options.logger;
	}

	start(): void {
		if (this.timer || this.exhausted) {
			return;
		}

		this.logger?.info('Starting stream pump', {
			component: LogComponents.PUMP,
			intervalMs: this.intervalMs,
		});

		this.startedAt = Date.now();
		this.timer = setInterval(() => {
			try {
				this.tick();
			} catch (error) {
				const failure = error instanceof Error ? error : new Error(String(error));
				this.logger?.error('Stream pump failed', {
					component: LogComponents.PUMP,
					error: failure.message,
				});
				this.stop();
				this.emit('failed', failure);
			}
		}, this.intervalMs);
	}

	stop(): void {
		if (!this.timer) {
			return;
		}

		clearInterval(this.timer);
		this.timer = undefined;

		this.logger?.info('Stream pump stopped', {
			component: LogComponents.PUMP,
			pulled: this.pulled,
			rejected: this.rejected,
			durationMs: this.startedAt ? Date.now() - this.startedAt : 0,
		});
	}

	/**
	 * Pull and submit one sample
	 * Errors other than InvalidSampleError propagate
	 */
	tick(): void {
		const sample = this.source.next();
		if (!sample) {
			this.exhausted = true;
			this.stop();
			this.emit('end');
			return;
		}

		this.pulled++;
		try {
			this.sink.submit(sample);
		} catch (error) {
			if (!(error instanceof InvalidSampleError)) {
				throw error;
			}
			this.rejected++;
			this.logger?.debug('Skipped invalid sample', {
				component: LogComponents.PUMP,
				reason: error.reason,
			});
		}
	}

	getStatus(): StreamPumpStatus {
		return {
			running: this.timer !== undefined,
			startedAt: this.startedAt,
			pulled: this.pulled,
			rejected: this.rejected,
			exhausted: this.exhausted,
		};
	}
}
