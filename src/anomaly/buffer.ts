/**
 * SLIDING WINDOW BUFFER - CIRCULAR BUFFER WITH RUNNING SUMS
 * ==========================================================
 *
 * Fixed-capacity circular buffer holding the last N values.
 * Running sum and sum of squares are kept relative to an offset
 * taken from the window itself. Sums are updated incrementally
 * (add new, subtract evicted) and periodically recomputed from
 * the stored values, re-anchoring the offset on the oldest value.
 *
 *   mean     = offset + sum / n
 *   variance = (sumSquares - sum^2 / n) / n
 *
 * Memory: O(n) where n = maxSize
 * Time: O(1) per insert, O(n) once every resyncInterval inserts
 *       and per mean read (clamped to the window's range)
 */

export interface WindowBuffer {
	values: number[];                  // Circular storage
	size: number;                      // Current size (<= maxSize)
	maxSize: number;
	head: number;                      // Index of next insertion

	offset: number;                    // Shift applied before summing
	sum: number;                       // Sum of (value - offset)
	sumSquares: number;                // Sum of (value - offset)^2

	resyncInterval: number;            // Inserts between full recomputes
	sinceResync: number;
}

/**
 * Create a new window buffer
 */
export function createBuffer(maxSize: number, resyncInterval: number = maxSize): WindowBuffer {
	return {
		values: new Array<number>(maxSize).fill(0),
		size: 0,
		maxSize,
		head: 0,
		offset: 0,
		sum: 0,
		sumSquares: 0,
		resyncInterval,
		sinceResync: 0,
	};
}

/**
 * Add a value (circular, overwrites oldest once full)
 * Returns the evicted value, if any
 */
export function addValue(buffer: WindowBuffer, value: number): number | undefined {
	const index = buffer.head;
	const evicted = buffer.size === buffer.maxSize ? buffer.values[index] : undefined;

	buffer.values[index] = value;
	buffer.head = (buffer.head + 1) % buffer.maxSize;

	if (buffer.size === 0) {
		buffer.offset = value;
		buffer.sum = 0;
		buffer.sumSquares = 0;
	}

	const added = value - buffer.offset;
	if (evicted === undefined) {
		buffer.size++;
		buffer.sum += added;
		buffer.sumSquares += added * added;
	} else {
		const removed = evicted - buffer.offset;
		buffer.sum = buffer.sum - removed + added;
		buffer.sumSquares = buffer.sumSquares - removed * removed + added * added;
	}

	buffer.sinceResync++;
	if (buffer.sinceResync >= buffer.resyncInterval) {
		resync(buffer);
	}

	return evicted;
}

/**
 * Recompute running sums from the stored values, anchored on the oldest
 */
export function resync(buffer: WindowBuffer): void {
	const values = getRecentValues(buffer, buffer.size);
	const offset = values.length > 0 ? values[0] : 0;
	let sum = 0;
	let sumSquares = 0;
	for (const value of values) {
		const shifted = value - offset;
		sum += shifted;
		sumSquares += shifted * shifted;
	}
	buffer.offset = offset;
	buffer.sum = sum;
	buffer.sumSquares = sumSquares;
	buffer.sinceResync = 0;
}

/**
 * Mean of the buffered values (0 when empty), within [min, max] of the window
 */
export function getMean(buffer: WindowBuffer): number {
	if (buffer.size === 0) return 0;

	const mean = buffer.offset + buffer.sum / buffer.size;
	let min = Infinity;
	let max = -Infinity;
	for (const value of getRecentValues(buffer, buffer.size)) {
		if (value < min) min = value;
		if (value > max) max = value;
	}
	return Math.min(max, Math.max(min, mean));
}

/**
 * Population variance, clamped at 0
 */
export function getVariance(buffer: WindowBuffer): number {
	if (buffer.size < 2) return 0;

	const n = buffer.size;
	return Math.max(0, (buffer.sumSquares - (buffer.sum * buffer.sum) / n) / n);
}

/**
 * Get recent values (last n), oldest first
 */
export function getRecentValues(buffer: WindowBuffer, count: number): number[] {
	const result: number[] = [];
	const actualCount = Math.min(count, buffer.size);

	for (let i = actualCount; i > 0; i--) {
		const index = (buffer.head - i + buffer.maxSize) % buffer.maxSize;
		result.push(buffer.values[index]);
	}

	return result;
}

/**
 * Clear buffer
 */
export function clearBuffer(buffer: WindowBuffer): void {
	buffer.values.fill(0);
	buffer.size = 0;
	buffer.head = 0;
	buffer.offset = 0;
	buffer.sum = 0;
	buffer.sumSquares = 0;
	buffer.sinceResync = 0;
}
