import { warn } from 'node:console'
import type { DaliDevice } from './dali-device.js'
import type { DaliFrame } from './dali-frame.js'

/** A frame heard on the bus that did not answer one of our commands */
export interface DaliBusEvent {
	/** Milliseconds since the epoch when the frame was read */
	readonly timestamp: number
	readonly raw: readonly number[]
	readonly frame: DaliFrame
	/** Known devices whose light output the frame changes */
	readonly affected: readonly DaliDevice[]
}

export type DaliMessageCallback = (event: DaliBusEvent) => void | Promise<void>

/**
 * Delivers events to one callback through a bounded queue. Events are delivered in order;
 * when the queue is full new events are dropped for this listener only.
 */
export class DaliListenerChannel {
	readonly callback: DaliMessageCallback
	readonly capacity: number
	dropped = 0

	private queue: DaliBusEvent[] = []
	private draining = false
	private closed = false

	constructor(callback: DaliMessageCallback, capacity: number) {
		this.callback = callback
		this.capacity = capacity
	}

	get pending(): number {
		return this.queue.length
	}

	/** Queue an event. Returns `false` if it was dropped. */
	push(event: DaliBusEvent): boolean {
		if (this.closed) {
			return false
		}
		if (this.queue.length >= this.capacity) {
			this.dropped++
			if (this.dropped === 1 || this.dropped % 100 === 0) {
				warn(`Message callback is not keeping up: ${this.dropped} event(s) dropped`)
			}
			return false
		}

		this.queue.push(event)
		if (!this.draining) {
			this.draining = true
			setImmediate(() => {
				this.drain().catch((err) => warn('Message delivery stopped', err))
			})
		}
		return true
	}

	close(): void {
		this.closed = true
		this.queue = []
	}

	private async drain(): Promise<void> {
		try {
			let event = this.queue.shift()
			while (event && !this.closed) {
				try {
					await this.callback(event)
				} catch (err) {
					warn('Message callback threw', err)
				}
				event = this.queue.shift()
			}
		} finally {
			this.draining = false
		}
	}
}
