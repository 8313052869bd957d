import { DaliScanner } from './dali-addressing.js'
import type { DaliScanOptions, DaliScanResult, DaliScannerOptions } from './dali-addressing.js'
import { DaliDispatcher } from './dali-dispatcher.js'
import type { DaliDispatcherOptions } from './dali-dispatcher.js'
import type { DaliMessageCallback } from './dali-events.js'
import { DaliGear, DaliGroup } from './dali-gear.js'
import { DaliRegistry } from './dali-registry.js'
import type { DaliTransport } from './dali-transport.js'

export interface DaliBusOptions extends DaliDispatcherOptions, DaliScannerOptions {}

/**
 * One DALI bus behind one adapter: the dispatcher that owns the transport, the registry of
 * gear found on it, and the scanner that fills the registry.
 */
export class DaliBus {
	readonly transport: DaliTransport
	readonly dispatcher: DaliDispatcher
	readonly registry: DaliRegistry
	private scanner: DaliScanner

	constructor(transport: DaliTransport, opts: DaliBusOptions = {}) {
		this.transport = transport
		this.registry = new DaliRegistry()
		this.dispatcher = new DaliDispatcher(transport, opts, this.registry)
		this.scanner = new DaliScanner(this.dispatcher, this.registry, opts)
	}

	get isOpen(): boolean {
		return this.dispatcher.isRunning
	}

	async open(): Promise<void> {
		await this.transport.open()
		this.dispatcher.start()
	}

	async close(): Promise<void> {
		try {
			await this.dispatcher.stop()
		} finally {
			await this.transport.close()
		}
	}

	/**
	 * Find the gear on the bus, address any without a short address and read their identities.
	 * Gear keep their unique id however often they are readdressed.
	 */
	async scanForGear(opts: DaliScanOptions = {}): Promise<DaliScanResult> {
		return this.scanner.scan(opts)
	}

	/** Receive frames from the bus that were not answers to our own commands. Callbacks stay registered across `close()` and `open()`. */
	addMessageCallback(callback: DaliMessageCallback): void {
		this.dispatcher.addMessageCallback(callback)
	}

	removeMessageCallback(callback: DaliMessageCallback): boolean {
		return this.dispatcher.removeMessageCallback(callback)
	}

	/** A handle on a gear by unique id. Commands fail with `DaliDeviceNotAddressedError` while the registry has no address for it. */
	gear(uniqueId: string): DaliGear {
		return new DaliGear(uniqueId, this.dispatcher, this.registry)
	}

	gears(): DaliGear[] {
		return this.registry.all().map(device => this.gear(device.uniqueId))
	}

	group(group: number): DaliGroup {
		return new DaliGroup(group, this.dispatcher)
	}

	public toString(): string {
		return `DaliBus(${this.transport})`
	}
}

/** Open a bus, run `fn` and close the bus again, however `fn` ends */
export async function withBus<T>(transport: DaliTransport, fn: (bus: DaliBus) => Promise<T>, opts: DaliBusOptions = {}): Promise<T> {
	const bus = new DaliBus(transport, opts)
	await bus.open()
	try {
		return await fn(bus)
	} finally {
		await bus.close()
	}
}
