/**
 * Test fixtures
 */

import type { Sample } from '../../src/anomaly/types';
import type { DataSource } from '../../src/simulation/types';

/**
 * Samples one millisecond apart, starting at t = 1
 */
export function samplesOf(values: number[], start: number = 1): Sample[] {
	return values.map((value, i) => ({ timestamp: start + i, value }));
}

/**
 * Finite data source replaying fixed values
 */
export class ArraySource implements DataSource {
	private index = 0;

	constructor(private readonly samples: Sample[]) {}

	next(): Sample | undefined {
		return this.samples[this.index++];
	}
}
