/**
 * EVENT CHANNEL - BOUNDED DROP-OLDEST HANDOFF
 * ============================================
 *
 * Carries classified samples from the controller to consumers.
 * Publishing never blocks: a full queue evicts its oldest item.
 *
 * Modes:
 * - 'single': one shared queue, every item is consumed once
 *   (readers compete)
 * - 'fanout': each reader owns a queue and receives every item
 *   published after it subscribed
 */

import type { ChannelMode } from './types';
import { InvalidParameterError } from './errors';

export interface ChannelOptions {
	capacity: number;
	mode?: ChannelMode;
}

type Waiter<T> = (item: T | undefined) => void;

/**
 * Fixed-capacity ring queue that overwrites its oldest entry when full
 */
export class BoundedQueue<T> {
	private items: Array<T | undefined>;
	private head = 0;                  // Index of oldest item
	private count = 0;
	private waiters: Array<Waiter<T>> = [];
	dropped = 0;

	constructor(readonly capacity: number) {
		this.items = new Array<T | undefined>(capacity);
	}

	get size(): number {
		return this.count;
	}

	push(item: T): void {
		// Hand straight to a pending reader when one is waiting
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(item);
			return;
		}

		if (this.count === this.capacity) {
			this.items[this.head] = undefined;
			this.head = (this.head + 1) % this.capacity;
			this.count--;
			this.dropped++;
		}

		this.items[(this.head + this.count) % this.capacity] = item;
		this.count++;
	}

	shift(): T | undefined {
		if (this.count === 0) return undefined;

		const item = this.items[this.head];
		this.items[this.head] = undefined;
		this.head = (this.head + 1) % this.capacity;
		this.count--;
		return item;
	}

	wait(): Promise<T | undefined> {
		return new Promise(resolve => {
			this.waiters.push(resolve);
		});
	}

	release(): void {
		const waiters = this.waiters;
		this.waiters = [];
		for (const waiter of waiters) {
			waiter(undefined);
		}
	}

	clear(): void {
		this.items.fill(undefined);
		this.head = 0;
		this.count = 0;
	}
}

/**
 * Consumer handle on a channel queue
 */
export class ChannelReader<T> implements AsyncIterable<T> {
	private attached = true;

	constructor(
		private readonly queue: BoundedQueue<T>,
		private readonly channel: EventChannel<T>
	) {}

	get size(): number {
		return this.queue.size;
	}

	/**
	 * Items evicted from this reader's queue before being read
	 */
	get dropped(): number {
		return this.queue.dropped;
	}

	/**
	 * Take the oldest retained item without waiting
	 */
	tryRead(): T | undefined {
		return this.queue.shift();
	}

	/**
	 * Take every retained item, oldest first
	 */
	drain(): T[] {
		const items: T[] = [];
		let item = this.queue.shift();
		while (item !== undefined) {
			items.push(item);
			item = this.queue.shift();
		}
		return items;
	}

	/**
	 * Wait for the next item; resolves undefined once the channel is closed and empty
	 */
	async read(): Promise<T | undefined> {
		const item = this.queue.shift();
		if (item !== undefined || this.channel.closed || !this.attached) {
			return item;
		}
		return this.queue.wait();
	}

	unsubscribe(): void {
		this.attached = false;
		this.channel.detach(this.queue);
	}

	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		let item = await this.read();
		while (item !== undefined) {
			yield item;
			item = await this.read();
		}
	}
}

export class EventChannel<T> {
	readonly capacity: number;
	readonly mode: ChannelMode;
	private queues = new Set<BoundedQueue<T>>();
	private readonly defaultReader: ChannelReader<T>;
	private sharedQueue: BoundedQueue<T>;
	private isClosed = false;

	constructor(options: ChannelOptions) {
		if (!Number.isInteger(options.capacity) || options.capacity < 1) {
			throw new InvalidParameterError('channelCapacity', 'must be an integer >= 1');
		}
		this.capacity = options.capacity;
		this.mode = options.mode ?? 'single';

		this.sharedQueue = new BoundedQueue<T>(this.capacity);
		this.queues.add(this.sharedQueue);
		this.defaultReader = new ChannelReader(this.sharedQueue, this);
	}

	get closed(): boolean {
		return this.isClosed;
	}

	/**
	 * Items retained for the default reader
	 */
	get size(): number {
		return this.defaultReader.size;
	}

	get dropped(): number {
		return this.defaultReader.dropped;
	}

	get subscriberCount(): number {
		return this.queues.size;
	}

	/**
	 * Enqueue an item for every queue; never blocks
	 */
	publish(item: T): void {
		if (this.isClosed) return;

		for (const queue of this.queues) {
			queue.push(item);
		}
	}

	/**
	 * Attach a consumer. In single mode all readers share one queue.
	 */
	subscribe(): ChannelReader<T> {
		if (this.mode === 'single') {
			return new ChannelReader(this.sharedQueue, this);
		}

		const queue = new BoundedQueue<T>(this.capacity);
		if (!this.isClosed) {
			this.queues.add(queue);
		}
		return new ChannelReader(queue, this);
	}

	tryRead(): T | undefined {
		return this.defaultReader.tryRead();
	}

	drain(): T[] {
		return this.defaultReader.drain();
	}

	read(): Promise<T | undefined> {
		return this.defaultReader.read();
	}

	/**
	 * Stop accepting items and wake every pending read
	 */
	close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		for (const queue of this.queues) {
			queue.release();
		}
	}

	/** @internal */
	detach(queue: BoundedQueue<T>): void {
		// The shared queue backs the default reader and outlives subscribers
		if (queue === this.sharedQueue) return;
		queue.release();
		queue.clear();
		this.queues.delete(queue);
	}
}
