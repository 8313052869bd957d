import { log, warn } from 'node:console'
import { DaliAddress } from './dali-address.js'
import { deviceCommand, gearCommand, specialCommand } from './dali-commands.js'
import { DaliConst } from './dali-const.js'
import type { DaliDevice, DaliIdentity } from './dali-device.js'
import { delay } from './dali-dispatcher.js'
import type { DaliDispatcher, DaliExclusiveLease } from './dali-dispatcher.js'
import { DaliAddressSpaceExhaustedError, DaliError, DaliIdentityReadFailedError, DaliMalformedFrameError, DaliNoResponseError, DaliRangeError, DaliScanCancelledError } from './dali-errors.js'
import { resolveIdentity } from './dali-identity.js'
import type { DaliRegistry } from './dali-registry.js'

export interface DaliScannerOptions {
	/** Time the gear get to pick random addresses after RANDOMISE (ms) */
	randomiseDelay?: number
	/** How many times to re-randomise after two gear picked the same random address */
	maxCollisionRetries?: number
	/** Ask other controllers on the bus to stay quiet while we scan */
	quiescent?: boolean
}

export interface DaliScanOptions {
	/** Clear every short address and address the whole bus from scratch */
	force?: boolean
	signal?: AbortSignal
}

export interface DaliScanResult {
	/** Every device confirmed by this scan, at its current short address */
	devices: DaliDevice[]
	/** Devices the registry didn't know before */
	added: DaliDevice[]
	/** Devices a forced scan did not find again */
	removed: DaliDevice[]
	/** Per-device failures that did not stop the scan */
	errors: DaliError[]
	/** COMPARE rounds spent narrowing the search interval */
	compareRounds: number
	/** COMPARE rounds that checked whether any gear was left to find */
	presenceChecks: number
}

/** The binary search over random addresses, for one scan */
interface DaliSearchState {
	low: number
	high: number
	candidate: number
	/** Gear found and withdrawn so far */
	withdrawn: number
	/** Everything below this has been found already */
	floor: number
	collisions: number
}

type DaliSearchOutcome =
	| { kind: 'found', randomAddress: number }
	| { kind: 'done' }

/**
 * Loads the gear's 24-bit search address register, one byte per command. Bytes that
 * already hold the right value are not sent again.
 */
class SearchAddressSender {
	private dispatcher: DaliDispatcher
	private lease: DaliExclusiveLease
	private current: [number | null, number | null, number | null] = [null, null, null]

	constructor(dispatcher: DaliDispatcher, lease: DaliExclusiveLease) {
		this.dispatcher = dispatcher
		this.lease = lease
	}

	/** Forget what the gear hold, after INITIALISE or RANDOMISE */
	reset(): void {
		this.current = [null, null, null]
	}

	async send(searchAddress: number): Promise<void> {
		const high = (searchAddress >> 16) & 0xff
		const mid = (searchAddress >> 8) & 0xff
		const low = searchAddress & 0xff

		if (this.current[0] !== high) {
			await this.dispatcher.send(specialCommand('SEARCHADDRH', high), this.lease)
			this.current[0] = high
		}
		if (this.current[1] !== mid) {
			await this.dispatcher.send(specialCommand('SEARCHADDRM', mid), this.lease)
			this.current[1] = mid
		}
		if (this.current[2] !== low) {
			await this.dispatcher.send(specialCommand('SEARCHADDRL', low), this.lease)
			this.current[2] = low
		}
	}
}

/**
 * Finds gear on the bus and gives each one a short address.
 *
 * Gear in initialisation mode pick a random 24-bit address. COMPARE is answered by every
 * gear whose random address is at or below the search address, so a binary search finds the
 * lowest one. That gear is programmed with a short address, its identity is read, and it is
 * withdrawn from the search. The search then resumes from the address above it.
 */
export class DaliScanner {
	readonly dispatcher: DaliDispatcher
	readonly registry: DaliRegistry
	readonly randomiseDelay: number
	readonly maxCollisionRetries: number
	readonly quiescent: boolean

	constructor(dispatcher: DaliDispatcher, registry: DaliRegistry, opts: DaliScannerOptions = {}) {
		this.dispatcher = dispatcher
		this.registry = registry
		this.randomiseDelay = opts.randomiseDelay ?? DaliConst.RANDOMISE_DELAY
		this.maxCollisionRetries = opts.maxCollisionRetries ?? DaliConst.MAX_COLLISION_RETRIES
		this.quiescent = opts.quiescent ?? true

		if (this.randomiseDelay < 0) {
			throw new DaliRangeError('Randomise delay must not be negative')
		}
		if (this.maxCollisionRetries < 0) {
			throw new DaliRangeError('Collision retries must not be negative')
		}
	}

	async scan(opts: DaliScanOptions = {}): Promise<DaliScanResult> {
		const force = opts.force ?? false
		if (opts.signal?.aborted) {
			throw new DaliScanCancelledError()
		}
		const lease = this.dispatcher.acquireExclusive()
		const run = new DaliScanRun(this, lease, opts.signal)
		let quiescent = false

		try {
			if (this.quiescent) {
				quiescent = true
				await this.dispatcher.send(deviceCommand('START_QUIESCENT_MODE'), lease)
			}
			/* Any earlier addressing sequence may still be active */
			await this.dispatcher.send(specialCommand('TERMINATE'), lease)

			if (force) {
				this.registry.clearAddresses()
			} else {
				await run.probe()
			}

			await run.search(force)
		} finally {
			await this.finish(lease, quiescent)
		}

		const result = run.result()
		if (force) {
			const found = new Set(result.devices.map(device => device.uniqueId))
			for (const device of this.registry.all()) {
				if (!found.has(device.uniqueId)) {
					this.registry.forget(device.uniqueId)
					result.removed.push(device)
				}
			}
		}

		log(`DALI scan complete: ${result.devices.length} device(s), ${result.added.length} new, ${result.removed.length} removed, ${result.errors.length} error(s)`)
		return result
	}

	/** Leave addressing mode, whatever happened, and quiescent mode if it was entered */
	private async finish(lease: DaliExclusiveLease, quiescent: boolean): Promise<void> {
		try {
			if (this.dispatcher.isRunning) {
				await this.dispatcher.send(specialCommand('TERMINATE'), lease)
				if (quiescent) {
					await this.dispatcher.send(deviceCommand('STOP_QUIESCENT_MODE'), lease)
				}
			}
		} finally {
			lease.release()
		}
	}
}

class DaliScanRun {
	private scanner: DaliScanner
	private dispatcher: DaliDispatcher
	private registry: DaliRegistry
	private lease: DaliExclusiveLease
	private signal?: AbortSignal
	private sender: SearchAddressSender

	private occupied: Set<number>
	private devices = new Map<string, DaliDevice>()
	private added: DaliDevice[] = []
	private errors: DaliError[] = []
	private compareRounds = 0
	private presenceChecks = 0

	constructor(scanner: DaliScanner, lease: DaliExclusiveLease, signal?: AbortSignal) {
		this.scanner = scanner
		this.dispatcher = scanner.dispatcher
		this.registry = scanner.registry
		this.lease = lease
		this.signal = signal
		this.sender = new SearchAddressSender(this.dispatcher, lease)
		this.occupied = new Set()
	}

	private checkCancelled(): void {
		if (this.signal?.aborted) {
			throw new DaliScanCancelledError()
		}
	}

	result(): DaliScanResult {
		return {
			devices: [...this.devices.values()],
			added: this.added,
			removed: [],
			errors: this.errors,
			compareRounds: this.compareRounds,
			presenceChecks: this.presenceChecks,
		}
	}

	/** Reconfirm the gear that already have a short address */
	async probe(): Promise<void> {
		for (const address of this.registry.usedShortAddresses()) {
			this.occupied.add(address)
		}

		for (let shortAddress = 0; shortAddress < DaliConst.MAX_SHORT_ADDRESS; shortAddress++) {
			this.checkCancelled()
			let present: boolean
			try {
				present = await this.dispatcher.ask(gearCommand(DaliAddress.short(shortAddress), 'QUERY_CONTROL_GEAR_PRESENT'), this.lease)
			} catch (err) {
				if (!(err instanceof DaliMalformedFrameError)) {
					throw err
				}
				/* More than one gear answered, which is still an answer */
				present = true
			}
			if (!present) {
				continue
			}

			this.occupied.add(shortAddress)
			try {
				this.confirm(await resolveIdentity(this.dispatcher, shortAddress, this.lease), shortAddress)
			} catch (err) {
				if (err instanceof DaliIdentityReadFailedError) {
					this.fail(err)
				} else if (err instanceof DaliMalformedFrameError) {
					this.fail(new DaliError(`Several gear answer at short address ${shortAddress}`, { cause: err }))
				} else {
					throw err
				}
			}
		}
	}

	async search(force: boolean): Promise<void> {
		/* 0x00 puts every gear into initialisation mode, 0xFF only the gear without a short address */
		await this.dispatcher.send(specialCommand('INITIALISE', force ? 0x00 : DaliConst.MASK), this.lease)
		this.sender.reset()

		if (force) {
			await this.dispatcher.send(specialCommand('DTR0', DaliConst.MASK), this.lease)
			await this.dispatcher.send(gearCommand(DaliAddress.broadcast(), 'SET_SHORT_ADDRESS'), this.lease)
		}

		await this.randomise()

		const state: DaliSearchState = {
			low: 0,
			high: DaliConst.SEARCH_ADDRESS_MAX,
			candidate: 0,
			withdrawn: 0,
			floor: 0,
			collisions: 0,
		}

		for (;;) {
			const outcome = await this.findLowest(state)
			if (outcome.kind === 'done') {
				break
			}

			const shortAddress = this.nextFreeAddress()
			if (shortAddress === null) {
				const err = new DaliAddressSpaceExhaustedError()
				warn(`DALI scan stopped: ${err.message}`)
				this.errors.push(err)
				break
			}

			const claimed = await this.claim(outcome.randomAddress, shortAddress)
			if (claimed === 'collision') {
				if (!await this.recoverFromCollision(state)) {
					break
				}
				continue
			}

			await this.dispatcher.send(specialCommand('WITHDRAW'), this.lease)
			state.withdrawn++
			state.floor = outcome.randomAddress + 1
			if (state.floor > DaliConst.SEARCH_ADDRESS_MAX) {
				break
			}
		}

		log(`DALI search finished: ${state.withdrawn} gear withdrawn, ${this.compareRounds} compare round(s), ${state.collisions} collision(s)`)
	}

	private async randomise(): Promise<void> {
		await this.dispatcher.send(specialCommand('RANDOMISE'), this.lease)
		this.sender.reset()
		if (this.scanner.randomiseDelay > 0) {
			await delay(this.scanner.randomiseDelay)
		}
	}

	/** Does any gear still searching have a random address at or below `searchAddress`? */
	private async compare(searchAddress: number): Promise<boolean> {
		this.checkCancelled()
		await this.sender.send(searchAddress)
		try {
			return await this.dispatcher.ask(specialCommand('COMPARE'), this.lease)
		} catch (err) {
			if (err instanceof DaliMalformedFrameError) {
				/* Several gear answered at once */
				return true
			}
			throw err
		}
	}

	/** Binary search for the lowest random address at or above the floor */
	private async findLowest(state: DaliSearchState): Promise<DaliSearchOutcome> {
		this.presenceChecks++
		if (!await this.compare(DaliConst.SEARCH_ADDRESS_MAX)) {
			return { kind: 'done' }
		}

		state.low = state.floor
		state.high = DaliConst.SEARCH_ADDRESS_MAX
		while (state.low < state.high) {
			state.candidate = Math.floor((state.low + state.high) / 2)
			this.compareRounds++
			if (await this.compare(state.candidate)) {
				state.high = state.candidate
			} else {
				state.low = state.candidate + 1
			}
		}
		state.candidate = state.low

		/* Withdrawn gear are below the floor, so the collapsed interval always holds a gear */
		return { kind: 'found', randomAddress: state.low }
	}

	/**
	 * Give the gear at `randomAddress` a short address and learn who it is.
	 * Returns 'collision' when more than one gear took the address.
	 */
	private async claim(randomAddress: number, shortAddress: number): Promise<'claimed' | 'failed' | 'collision'> {
		const programmed = DaliAddress.short(shortAddress).addressByte(false)
		/* PROGRAM SHORT ADDRESS goes to the gear whose random address equals the search address */
		await this.sender.send(randomAddress)
		await this.dispatcher.send(specialCommand('PROGRAM_SHORT_ADDRESS', programmed), this.lease)

		let answered: number
		try {
			answered = await this.dispatcher.query(specialCommand('QUERY_SHORT_ADDRESS'), this.lease)
		} catch (err) {
			if (err instanceof DaliMalformedFrameError) {
				return 'collision'
			}
			if (!(err instanceof DaliNoResponseError)) {
				throw err
			}
			this.occupied.add(shortAddress)
			this.fail(new DaliError(`Gear at random address 0x${randomAddress.toString(16).padStart(6, '0')} did not answer QUERY SHORT ADDRESS`, { cause: err }))
			return 'failed'
		}

		/* Count the address as used even if it did not stick; the gear may have taken it regardless */
		this.occupied.add(shortAddress)
		if (answered !== programmed) {
			this.fail(new DaliError(`Short address did not stick: gear answered 0x${answered.toString(16)} instead of 0x${programmed.toString(16)}`))
			return 'failed'
		}

		try {
			this.confirm(await resolveIdentity(this.dispatcher, shortAddress, this.lease), shortAddress)
		} catch (err) {
			if (err instanceof DaliMalformedFrameError) {
				/* Two gear with the same random address answered with different memory contents */
				this.occupied.delete(shortAddress)
				return 'collision'
			}
			if (err instanceof DaliIdentityReadFailedError) {
				this.fail(err)
				return 'failed'
			}
			throw err
		}
		return 'claimed'
	}

	/**
	 * Several gear share a random address. Unprogram them and re-randomise everything still
	 * searching; gear already withdrawn stay out of the search. The search address still
	 * selects the colliding gear, so they lose the short address even when we give up.
	 */
	private async recoverFromCollision(state: DaliSearchState): Promise<boolean> {
		state.collisions++
		await this.dispatcher.send(specialCommand('PROGRAM_SHORT_ADDRESS', DaliConst.MASK), this.lease)
		if (state.collisions > this.scanner.maxCollisionRetries) {
			this.fail(new DaliError(`Gave up after ${this.scanner.maxCollisionRetries} random address collision(s)`))
			return false
		}
		warn(`DALI scan: random address collision at 0x${state.candidate.toString(16).padStart(6, '0')}, re-randomising`)
		await this.randomise()
		state.floor = 0
		return true
	}

	private nextFreeAddress(): number | null {
		for (let shortAddress = 0; shortAddress < DaliConst.MAX_SHORT_ADDRESS; shortAddress++) {
			if (!this.occupied.has(shortAddress)) {
				return shortAddress
			}
		}
		return null
	}

	private confirm(identity: DaliIdentity, shortAddress: number): void {
		const { device, added } = this.registry.confirm(identity, shortAddress)
		this.devices.set(device.uniqueId, device)
		if (added) {
			this.added.push(device)
		}
		log(`DALI scan: ${device}`)
	}

	private fail(err: DaliError): void {
		warn(`DALI scan: ${err.message}`)
		this.errors.push(err)
	}
}
