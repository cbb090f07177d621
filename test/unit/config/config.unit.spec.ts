import {
	parseConfig,
	parseSimulatorConfig,
	loadConfigFromEnv,
	getConfigSummary,
} from '../../../src/config';
import { InvalidParameterError } from '../../../src/anomaly/errors';

function parameterOf(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (error) {
		if (error instanceof InvalidParameterError) return error.parameter;
		throw error;
	}
	return undefined;
}

describe('Configuration', () => {
	describe('parseConfig', () => {
		it('should apply defaults with a sliding window', () => {
			expect(parseConfig()).toEqual({
				strategy: 'sliding',
				windowSize: 100,
				resyncInterval: 100,
				sensitivity: 3,
				warmupCount: 10,
				channelCapacity: 200,
				fanOut: false,
				stdDevFloor: 1e-9,
			});
		});

		it('should default resyncInterval to the window size', () => {
			expect(parseConfig({ windowSize: 5 }).resyncInterval).toBe(5);
			expect(parseConfig({ windowSize: 5, resyncInterval: 50 }).resyncInterval).toBe(50);
		});

		it('should select the decay strategy from halfLife', () => {
			const config = parseConfig({ halfLife: 20, sensitivity: 2 });

			expect(config.strategy).toBe('decay');
			expect(config.halfLife).toBe(20);
			expect(config.windowSize).toBeUndefined();
			expect(config.sensitivity).toBe(2);
		});

		it('should reject windowSize combined with halfLife', () => {
			expect(parameterOf(() => parseConfig({ windowSize: 10, halfLife: 5 }))).toBe('halfLife');
		});

		it('should reject resyncInterval with the decay strategy', () => {
			expect(parameterOf(() => parseConfig({ halfLife: 5, resyncInterval: 10 }))).toBe('resyncInterval');
		});

		it('should name the offending option', () => {
			expect(parameterOf(() => parseConfig({ windowSize: 1 }))).toBe('windowSize');
			expect(parameterOf(() => parseConfig({ sensitivity: -1 }))).toBe('sensitivity');
			expect(parameterOf(() => parseConfig({ warmupCount: 0 }))).toBe('warmupCount');
			expect(parameterOf(() => parseConfig({ channelCapacity: 2.5 }))).toBe('channelCapacity');
			expect(parameterOf(() => parseConfig({ stdDevFloor: 0 }))).toBe('stdDevFloor');
			expect(parameterOf(() => parseConfig({ sensitivity: Infinity }))).toBe('sensitivity');
		});

		it('should reject unknown options', () => {
			const input = { sensitivity: 2, window: 5 };

			expect(parameterOf(() => parseConfig(input))).toBe('config');
		});
	});

	describe('parseSimulatorConfig', () => {
		it('should apply defaults', () => {
			expect(parseSimulatorConfig()).toEqual({
				points: 1000,
				anomalyRatio: 0.05,
				faultRatio: 0.01,
				intervalMs: 50,
			});
		});

		it('should reject ratios outside [0, 1]', () => {
			expect(parameterOf(() => parseSimulatorConfig({ anomalyRatio: 2 }))).toBe('anomalyRatio');
		});
	});

	describe('loadConfigFromEnv', () => {
		it('should read detector and simulator variables', () => {
			const config = loadConfigFromEnv({
				DETECTOR_WINDOW_SIZE: '5',
				DETECTOR_SENSITIVITY: '2.5',
				DETECTOR_FAN_OUT: 'true',
				SIMULATOR_POINTS: '20',
			});

			expect(config.detector).toEqual({
				strategy: 'sliding',
				windowSize: 5,
				resyncInterval: 5,
				sensitivity: 2.5,
				warmupCount: 10,
				channelCapacity: 200,
				fanOut: true,
				stdDevFloor: 1e-9,
			});
			expect(config.simulator.points).toBe(20);
			expect(config.simulator.intervalMs).toBe(50);
		});

		it('should use defaults for an empty environment', () => {
			const config = loadConfigFromEnv({});

			expect(config.detector).toEqual(parseConfig());
			expect(config.simulator).toEqual(parseSimulatorConfig());
		});

		it('should ignore blank variables', () => {
			expect(loadConfigFromEnv({ DETECTOR_HALF_LIFE: '  ' }).detector.strategy).toBe('sliding');
		});

		it('should select the decay strategy', () => {
			const config = loadConfigFromEnv({ DETECTOR_HALF_LIFE: '30' });

			expect(config.detector.strategy).toBe('decay');
			expect(config.detector.halfLife).toBe(30);
		});

		it('should reject malformed numbers', () => {
			expect(parameterOf(() => loadConfigFromEnv({ DETECTOR_WINDOW_SIZE: 'abc' }))).toBe('windowSize');
		});

		it('should reject malformed booleans', () => {
			expect(parameterOf(() => loadConfigFromEnv({ DETECTOR_FAN_OUT: 'maybe' }))).toBe('fanOut');
		});

		it('should accept numeric booleans', () => {
			expect(loadConfigFromEnv({ DETECTOR_FAN_OUT: '1' }).detector.fanOut).toBe(true);
			expect(loadConfigFromEnv({ DETECTOR_FAN_OUT: '0' }).detector.fanOut).toBe(false);
		});
	});

	describe('getConfigSummary', () => {
		it('should describe a sliding window', () => {
			const summary = getConfigSummary(parseConfig());

			expect(summary.split('\n')).toEqual([
				'Anomaly Detection Configuration:',
				'  Horizon: sliding window of 100 samples (resync every 100)',
				'  Sensitivity: 3σ',
				'  Warm-up: 10 samples',
				'  StdDev floor: 1e-9',
				'  Channel: capacity 200, single consumer',
			]);
		});

		it('should describe a decay window', () => {
			const summary = getConfigSummary(parseConfig({ halfLife: 20, fanOut: true }));

			expect(summary).toContain('  Horizon: decay window with half-life 20 samples');
			expect(summary).toContain('  Channel: capacity 200, fan-out');
		});

		it('should show a custom stddev floor', () => {
			expect(getConfigSummary(parseConfig({ stdDevFloor: 0.5 }))).toContain('  StdDev floor: 0.5');
		});
	});
});
