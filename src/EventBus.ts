import { logger } from './utils/logger';

export const DEFAULT_BUFFER_SIZE = 100;

/**
 * A bounded queue of broadcast messages, consumed as an async iterator.
 * When the queue is full new messages are dropped and counted.
 */
export class Subscription implements AsyncIterableIterator<string> {
	private readonly bus: EventBus;
	private readonly bufferSize: number;
	private readonly buffer: string[] = [];
	private readonly waiters: ((result: IteratorResult<string>) => void)[] = [];
	private cancelled = false;
	private droppedMessages = 0;

	constructor(bus: EventBus, bufferSize: number) {
		this.bus = bus;
		this.bufferSize = bufferSize;
	}

	/*
	 * ================================================
	 *                      Getter
	 * ================================================
	 */

	/**
	 * Messages that did not fit the queue.
	 */
	get dropped() {
		return this.droppedMessages;
	}

	/**
	 * Messages waiting to be read.
	 */
	get pending() {
		return this.buffer.length;
	}

	get isCancelled() {
		return this.cancelled;
	}

	/*
	 * ================================================
	 *                 Public functions
	 * ================================================
	 */

	/**
	 * Offers a message to this subscriber without waiting.
	 *
	 * @returns True if the message was accepted.
	 */
	push(message: string) {
		if (this.cancelled) {
			return false;
		}

		const waiter = this.waiters.shift();

		if (waiter !== undefined) {
			waiter({ value: message, done: false });
			return true;
		}

		if (this.buffer.length >= this.bufferSize) {
			this.droppedMessages++;
			return false;
		}

		this.buffer.push(message);
		return true;
	}

	/**
	 * Unregisters the subscription. Queued messages can still be read, then iteration ends.
	 * Calling it again has no effect.
	 */
	cancel() {
		if (this.cancelled) {
			return;
		}

		this.cancelled = true;
		this.bus.unsubscribe(this);

		for (const waiter of this.waiters.splice(0)) {
			waiter({ value: undefined, done: true });
		}
	}

	async next(): Promise<IteratorResult<string>> {
		const message = this.buffer.shift();

		if (message !== undefined) {
			return { value: message, done: false };
		}

		if (this.cancelled) {
			return { value: undefined, done: true };
		}

		return new Promise((resolve: (result: IteratorResult<string>) => void) => this.waiters.push(resolve));
	}

	async return(): Promise<IteratorResult<string>> {
		this.cancel();
		this.buffer.length = 0;
		return { value: undefined, done: true };
	}

	[Symbol.asyncIterator]() {
		return this;
	}
}

/**
 * Fans raw modem output out to every subscriber. Publishing never blocks.
 */
export class EventBus {
	private readonly subscriptions = new Set<Subscription>();
	private readonly defaultBufferSize: number;

	constructor(defaultBufferSize = DEFAULT_BUFFER_SIZE) {
		this.defaultBufferSize = defaultBufferSize;
	}

	get subscriberCount() {
		return this.subscriptions.size;
	}

	subscribe(bufferSize = this.defaultBufferSize) {
		if (!Number.isInteger(bufferSize) || bufferSize < 1) {
			throw new RangeError(`Invalid buffer size ${bufferSize}`);
		}

		const subscription = new Subscription(this, bufferSize);
		this.subscriptions.add(subscription);

		logger.debug(`[Bus] Subscriber added (${this.subscriptions.size} active)`);
		return subscription;
	}

	/**
	 * Removes a subscription. Use {@link Subscription.cancel} instead of calling this directly.
	 */
	unsubscribe(subscription: Subscription) {
		if (this.subscriptions.delete(subscription)) {
			logger.debug(`[Bus] Subscriber removed (${this.subscriptions.size} active)`);
		}
	}

	/**
	 * Delivers a message to every subscriber with room in its queue.
	 *
	 * @returns The number of subscribers that accepted the message.
	 */
	broadcast(message: string) {
		let accepted = 0;

		for (const subscription of this.subscriptions) {
			if (subscription.push(message)) {
				accepted++;
			}
		}

		return accepted;
	}
}
