import { match, useFakeTimers, type SinonFakeTimers } from 'sinon';
import { startMonitor } from '../../src/monitor';
import { parseConfig, parseSimulatorConfig, type AppConfig } from '../../src/config';
import { createMockLogger, loggedMessages, type MockLogger } from '../helpers/mock-logger';
import { ArraySource, samplesOf } from '../helpers/fixtures';
import type { DataSource } from '../../src/simulation/types';

describe('startMonitor', () => {
	let clock: SinonFakeTimers;
	let logger: MockLogger;
	const config: AppConfig = {
		detector: parseConfig({ windowSize: 5, warmupCount: 3 }),
		simulator: parseSimulatorConfig({ intervalMs: 10 }),
	};

	beforeEach(() => {
		clock = useFakeTimers();
		logger = createMockLogger();
	});

	afterEach(() => {
		clock.restore();
	});

	it('should log flagged samples and finish when the source runs dry', async () => {
		const source = new ArraySource(samplesOf([10, 10, 10, 10, 10, 100]));
		const monitor = startMonitor({ config, logger, source });

		clock.tick(70);
		const stats = await monitor.done;

		expect(stats.processed).toBe(6);
		expect(stats.anomalies).toBe(1);
		expect(stats.state).toBe('stopped');
		expect(logger.warn.calledOnceWith('Anomaly detected', match({ value: 100, sequence: 6, baseline: 10 }))).toBe(true);

		const messages = loggedMessages(logger.info);
		expect(messages[0]).toContain('Anomaly Detection Configuration:');
		expect(messages).toContain('Data source exhausted');
		expect(messages[messages.length - 1]).toBe('Monitor finished');
	});

	it('should toggle between running and paused', async () => {
		const monitor = startMonitor({ config, logger, source: new ArraySource([]) });

		monitor.togglePause();
		expect(monitor.controller.getState()).toBe('paused');

		monitor.togglePause();
		expect(monitor.controller.getState()).toBe('running');

		monitor.shutdown();
		const stats = await monitor.done;
		expect(stats.processed).toBe(0);
		expect(monitor.pump.getStatus().running).toBe(false);
	});

	it('should drop samples submitted while paused', async () => {
		const source = new ArraySource(samplesOf([1, 2, 3]));
		const monitor = startMonitor({ config, logger, source });

		monitor.togglePause();
		clock.tick(40);
		const stats = await monitor.done;

		expect(stats.processed).toBe(0);
		expect(stats.droppedInactive).toBe(3);
	});

	it('should shut down and reject when the source fails', async () => {
		const source: DataSource = {
			next: () => {
				throw new Error('feed lost');
			},
		};
		const monitor = startMonitor({ config, logger, source });

		clock.tick(10);

		await expect(monitor.done).rejects.toThrow('feed lost');
		expect(monitor.controller.getState()).toBe('stopped');
		expect(monitor.controller.channel.closed).toBe(true);
		expect(logger.info.calledWith('Monitor finished', match({ failed: true }))).toBe(true);
	});

	describe('Sensitivity', () => {
		it('should pass an explicit sensitivity to the controller', async () => {
			const monitor = startMonitor({ config, logger, source: new ArraySource([]) });

			monitor.setSensitivity('high');
			expect(monitor.controller.getStats().sensitivity).toBe(2);

			monitor.setSensitivity(4.5);
			expect(monitor.controller.getStats().sensitivity).toBe(4.5);

			monitor.shutdown();
			await monitor.done;
		});

		it('should cycle through the named levels', async () => {
			const monitor = startMonitor({ config, logger, source: new ArraySource([]) });

			expect([monitor.cycleSensitivity(), monitor.cycleSensitivity(), monitor.cycleSensitivity()])
				.toEqual(['high', 'low', 'medium']);
			expect(monitor.controller.getStats().sensitivity).toBe(3);

			monitor.shutdown();
			await monitor.done;
		});

		it('should start the cycle at low from a custom value', async () => {
			const monitor = startMonitor({ config, logger, source: new ArraySource([]) });
			monitor.setSensitivity(7);

			expect(monitor.cycleSensitivity()).toBe('low');
			expect(monitor.controller.getStats().sensitivity).toBe(4);

			monitor.shutdown();
			await monitor.done;
		});
	});
});
