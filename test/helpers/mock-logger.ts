/**
 * Mock Logger for Testing
 * =======================
 *
 * Sinon-stubbed logger satisfying the engine's Logger interface.
 */

import { stub, type SinonStub } from 'sinon';
import type { Logger } from '../../src/logging/logger';

export type MockLogger = { [K in keyof Logger]: SinonStub };

export function createMockLogger(): MockLogger {
	return {
		debug: stub(),
		info: stub(),
		warn: stub(),
		error: stub(),
	};
}

/**
 * Messages passed to one level, in call order
 */
export function loggedMessages(method: SinonStub): string[] {
	return method.getCalls().map(call => String(call.args[0]));
}
