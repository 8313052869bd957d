import { log, warn } from 'node:console'
import type { DaliAnswer, DaliCommand } from './dali-commands.js'
import { describeCommand } from './dali-commands.js'
import { DaliConst } from './dali-const.js'
import { DaliBusBusyError, DaliConnectionError, DaliError, DaliNoResponseError, DaliRangeError } from './dali-errors.js'
import { DaliListenerChannel } from './dali-events.js'
import type { DaliBusEvent, DaliMessageCallback } from './dali-events.js'
import { decodeBackward, decodeFrame, encodeCommand, frameToHex } from './dali-frame.js'
import type { DaliBackwardValue } from './dali-frame.js'
import { DaliRegistry } from './dali-registry.js'
import type { DaliReceived, DaliTransport } from './dali-transport.js'

export interface DaliDispatcherOptions {
	/** How long to wait for a backward frame (ms) */
	responseTimeout?: number
	/** Minimum gap between forward frames (ms) */
	settleDelay?: number
	/** Gap between the two frames of a send-twice command (ms) */
	repeatDelay?: number
	/** Poll period of the transport read loop (ms) */
	readInterval?: number
	/** Events queued per listener before new events are dropped */
	listenerQueueSize?: number
	/** Log every frame sent and received */
	trace?: boolean
}

interface DaliPendingCommand {
	command: DaliCommand
	answer: DaliAnswer
	/** Backward frames read after this time are unsolicited */
	deadline: number
	resolve: (value: DaliBackwardValue) => void
	reject: (error: Error) => void
	timeout?: NodeJS.Timeout
}

export async function delay(ms: number): Promise<void> {
	return new Promise((resolve) => {
		setTimeout(resolve, ms)
	})
}

/** Wait until `Date.now()` reaches `time` */
async function waitUntil(time: number): Promise<void> {
	let remaining = time - Date.now()
	while (remaining > 0) {
		await delay(remaining)
		remaining = time - Date.now()
	}
}

/**
 * Held by an addressing sequence. While a lease is held, sends without it fail with `DaliBusBusyError`.
 */
export class DaliExclusiveLease {
	private dispatcher: DaliDispatcher

	constructor(dispatcher: DaliDispatcher) {
		this.dispatcher = dispatcher
	}

	get held(): boolean {
		return this.dispatcher.exclusiveLease === this
	}

	release(): void {
		this.dispatcher.releaseExclusive(this)
	}
}

/**
 * The only writer to a transport. Sends one command at a time, matches backward frames to
 * the command in flight and hands everything else to the registered listeners.
 */
export class DaliDispatcher {
	readonly transport: DaliTransport
	readonly responseTimeout: number
	readonly settleDelay: number
	readonly repeatDelay: number
	readonly readInterval: number
	readonly listenerQueueSize: number
	/** Where the devices affected by frames from other controllers are looked up */
	readonly registry: DaliRegistry
	trace: boolean

	private pending: DaliPendingCommand | null = null
	private active = false
	private waiting: (() => void)[] = []
	private exclusive: DaliExclusiveLease | null = null
	private listeners: DaliListenerChannel[] = []
	private lastFrameAt = 0
	private running = false
	private readLoop: Promise<void> | null = null
	private connectionError: DaliConnectionError | null = null

	constructor(transport: DaliTransport, opts: DaliDispatcherOptions = {}, registry: DaliRegistry = new DaliRegistry()) {
		this.transport = transport
		this.registry = registry
		this.responseTimeout = opts.responseTimeout ?? DaliConst.RESPONSE_TIMEOUT
		this.settleDelay = opts.settleDelay ?? DaliConst.SETTLE_DELAY
		this.repeatDelay = Math.max(opts.repeatDelay ?? DaliConst.REPEAT_DELAY, this.settleDelay)
		this.readInterval = opts.readInterval ?? DaliConst.READ_INTERVAL
		this.listenerQueueSize = opts.listenerQueueSize ?? DaliConst.LISTENER_QUEUE_SIZE
		this.trace = opts.trace ?? false

		if (this.repeatDelay >= DaliConst.REPEAT_WINDOW) {
			throw new DaliRangeError(`Repeated frames must be sent within ${DaliConst.REPEAT_WINDOW}ms, the repeat delay is ${this.repeatDelay}ms`)
		}
		if (this.listenerQueueSize < 1) {
			throw new DaliRangeError('Listener queue size must be at least 1')
		}
	}

	get isRunning(): boolean {
		return this.running
	}

	/** The lease of the addressing sequence currently running, if any */
	get exclusiveLease(): DaliExclusiveLease | null {
		return this.exclusive
	}

	/** The error that ended the session, if the adapter was lost */
	get lostError(): DaliConnectionError | null {
		return this.connectionError
	}

	/** Start servicing transport reads. The transport must already be open. */
	start(): void {
		if (this.running) {
			return
		}
		this.running = true
		this.connectionError = null
		this.readLoop = this.runReadLoop()
	}

	/**
	 * Stop the read loop. The command in flight, if any, fails with `DaliConnectionError`.
	 * Events not yet delivered are dropped; message callbacks stay registered for the next `start()`.
	 */
	async stop(): Promise<void> {
		this.running = false
		const readLoop = this.readLoop
		this.readLoop = null
		if (readLoop) {
			await readLoop
		}
		this.failPending(new DaliConnectionError('The bus was closed'))
		this.exclusive = null
		this.listeners = this.listeners.map((channel) => {
			channel.close()
			return new DaliListenerChannel(channel.callback, this.listenerQueueSize)
		})
	}

	addMessageCallback(callback: DaliMessageCallback): void {
		if (this.listeners.some(channel => channel.callback === callback)) {
			return
		}
		this.listeners.push(new DaliListenerChannel(callback, this.listenerQueueSize))
	}

	/** Returns `true` if the callback was registered */
	removeMessageCallback(callback: DaliMessageCallback): boolean {
		const index = this.listeners.findIndex(channel => channel.callback === callback)
		if (index === -1) {
			return false
		}
		const [channel] = this.listeners.splice(index, 1)
		channel.close()
		return true
	}

	/**
	 * Take the bus for an addressing sequence. Commands already queued without the lease
	 * fail with `DaliBusBusyError` when their turn comes.
	 */
	acquireExclusive(): DaliExclusiveLease {
		this.checkConnection()
		if (this.exclusive) {
			throw new DaliBusBusyError('Another addressing sequence is already running')
		}
		const lease = new DaliExclusiveLease(this)
		this.exclusive = lease
		return lease
	}

	releaseExclusive(lease: DaliExclusiveLease): void {
		if (this.exclusive === lease) {
			this.exclusive = null
		}
	}

	/**
	 * Send a command and wait for its outcome.
	 * @returns the backward frame, or `null` for commands that got no answer and don't require one
	 */
	async send(command: DaliCommand, lease?: DaliExclusiveLease): Promise<DaliBackwardValue> {
		this.checkAvailable(lease)
		await this.acquireSlot()
		try {
			/* The bus may have been taken or lost while we were waiting */
			this.checkAvailable(lease)
			return await this.transmit(command)
		} finally {
			this.releaseSlot()
		}
	}

	/**
	 * Send several commands back to back without letting other callers in between,
	 * for sequences that load DTRs before the command that uses them.
	 * Stops at the first command that fails.
	 */
	async sendSequence(commands: DaliCommand[], lease?: DaliExclusiveLease): Promise<DaliBackwardValue[]> {
		this.checkAvailable(lease)
		await this.acquireSlot()
		try {
			this.checkAvailable(lease)
			const results: DaliBackwardValue[] = []
			for (const command of commands) {
				results.push(await this.transmit(command))
			}
			return results
		} finally {
			this.releaseSlot()
		}
	}

	/** Send a command that must be answered. */
	async query(command: DaliCommand, lease?: DaliExclusiveLease): Promise<number> {
		const result = await this.send(command, lease)
		if (result === null) {
			throw new DaliNoResponseError(`No answer to ${describeCommand(command)}`)
		}
		return result
	}

	/** Send a YES/NO query. No answer means no. */
	async ask(command: DaliCommand, lease?: DaliExclusiveLease): Promise<boolean> {
		const result = await this.send(command, lease)
		return result !== null
	}

	private checkConnection(): void {
		if (this.connectionError) {
			throw new DaliConnectionError(this.connectionError.message, { cause: this.connectionError })
		}
		if (!this.running) {
			throw new DaliConnectionError('The bus is not open')
		}
	}

	private checkAvailable(lease?: DaliExclusiveLease): void {
		this.checkConnection()
		if (this.exclusive !== null && lease !== this.exclusive) {
			throw new DaliBusBusyError()
		}
		if (lease && !lease.held) {
			throw new DaliBusBusyError('The addressing lease has been released')
		}
	}

	private async acquireSlot(): Promise<void> {
		if (!this.active) {
			this.active = true
			return
		}
		/* Wait for the command in flight to hand the slot over */
		await new Promise<void>((resolve) => {
			this.waiting.push(resolve)
		})
	}

	private releaseSlot(): void {
		const next = this.waiting.shift()
		if (next) {
			next()
		} else {
			this.active = false
		}
	}

	private async transmit(command: DaliCommand): Promise<DaliBackwardValue> {
		const frame = encodeCommand(command)

		await waitUntil(this.lastFrameAt + this.settleDelay)

		if (command.twice) {
			await this.write(frame, command)
			await waitUntil(Date.now() + this.repeatDelay)
		}

		if (command.answer === 'none') {
			await this.write(frame, command)
			this.lastFrameAt = Date.now()
			return null
		}

		return new Promise<DaliBackwardValue>((resolve, reject) => {
			const pending: DaliPendingCommand = {
				command,
				answer: command.answer,
				deadline: Number.POSITIVE_INFINITY,
				resolve: (value) => {
					this.lastFrameAt = Date.now()
					resolve(value)
				},
				reject: (error) => {
					this.lastFrameAt = Date.now()
					reject(error)
				},
			}
			/* Registered before writing so an answer can't overtake us */
			this.pending = pending

			this.write(frame, command).then(() => {
				if (this.pending !== pending) {
					return
				}
				pending.deadline = Date.now() + this.responseTimeout
				pending.timeout = setTimeout(() => this.expire(pending), this.responseTimeout)
			}, (err: Error) => {
				if (this.pending === pending) {
					this.pending = null
				}
				pending.reject(err)
			})
		})
	}

	private async write(frame: Buffer, command: DaliCommand): Promise<void> {
		if (this.trace) {
			log(`DALI > ${describeCommand(command)} [${frameToHex(frame)}]`)
		}
		try {
			await this.transport.write(frame)
		} catch (err) {
			throw this.lose(err)
		}
	}

	private expire(pending: DaliPendingCommand): void {
		if (this.pending !== pending) {
			return
		}
		this.pending = null
		if (this.trace) {
			log(`DALI < no answer to ${describeCommand(pending.command)}`)
		}
		if (pending.answer === 'value') {
			pending.reject(new DaliNoResponseError(`No answer to ${describeCommand(pending.command)}`))
		} else {
			pending.resolve(null)
		}
	}

	private failPending(error: DaliError): void {
		const pending = this.pending
		if (pending) {
			this.pending = null
			if (pending.timeout) {
				clearTimeout(pending.timeout)
			}
			pending.reject(error)
		}
	}

	private lose(err: unknown): DaliConnectionError {
		const error = err instanceof DaliConnectionError ? err : new DaliConnectionError(`Lost the bus adapter: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
		if (!this.connectionError) {
			warn(`DALI bus lost: ${error.message}`)
			this.connectionError = error
		}
		this.running = false
		this.failPending(error)
		return error
	}

	private async runReadLoop(): Promise<void> {
		while (this.running) {
			let received: DaliReceived | null
			try {
				received = await this.transport.read(this.readInterval)
			} catch (err) {
				this.lose(err)
				return
			}
			if (received === null) {
				continue
			}
			switch (received.kind) {
			case 'answer':
				this.handleAnswer(received.frame)
				break
			case 'no-answer':
				this.handleNoAnswer()
				break
			case 'bus':
				this.publish(received.frame)
				break
			}
		}
	}

	/** The adapter says the command in flight was not answered, so there is no need to wait it out */
	private handleNoAnswer(): void {
		const pending = this.pending
		if (!pending) {
			return
		}
		if (pending.timeout) {
			clearTimeout(pending.timeout)
		}
		this.expire(pending)
	}

	private handleAnswer(frame: Buffer): void {
		const now = Date.now()
		const pending = this.pending

		if (pending && now <= pending.deadline) {
			this.pending = null
			if (pending.timeout) {
				clearTimeout(pending.timeout)
			}
			if (this.trace) {
				log(`DALI < [${frameToHex(frame)}] for ${describeCommand(pending.command)}`)
			}
			try {
				pending.resolve(decodeBackward(frame))
			} catch (err) {
				pending.reject(err instanceof Error ? err : new DaliError(String(err)))
			}
			return
		}
		this.publish(frame)
	}

	/** Hand a frame that answered nothing of ours to every listener */
	private publish(frame: Buffer): void {
		const decoded = decodeFrame(frame)
		const event: DaliBusEvent = {
			timestamp: Date.now(),
			raw: [...frame],
			frame: decoded,
			affected: decoded.kind === 'command' ? this.registry.affectedBy(decoded.command) : [],
		}
		if (this.trace) {
			log(`DALI < unsolicited [${frameToHex(frame)}]`)
		}
		for (const channel of this.listeners) {
			channel.push(event)
		}
	}
}
