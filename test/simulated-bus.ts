import type { DaliCommand } from '../src/dali-commands.js'
import { DaliAddressType } from '../src/dali-address.js'
import { decodeForward } from '../src/dali-frame.js'
import type { DaliReceived, DaliTransport, DaliTransportState } from '../src/dali-transport.js'
import type { DaliBusOptions } from '../src/dali-bus.js'

/** Bus timing scaled down so tests don't wait on real DALI timeouts */
export const FAST_TIMING: DaliBusOptions = {
	responseTimeout: 10,
	settleDelay: 1,
	repeatDelay: 1,
	readInterval: 5,
	randomiseDelay: 0,
}

/** Frames more than this apart don't count as a repeated send (ms) */
const REPEAT_WINDOW = 100

export interface SimulatedGearOptions {
	/** The random address picked on each RANDOMISE; the last one repeats */
	randomAddresses: number[]
	shortAddress?: number | null
	gtin?: number
	/** 8 bytes, most significant first */
	serial?: number[]
	endpointIndex?: number
	/** READ MEMORY LOCATION is never answered */
	unreadable?: boolean
	level?: number
	minLevel?: number
	maxLevel?: number
	deviceType?: number
	fadeTimeRate?: number
	groups?: number
}

/** Memory bank 0 from location 0x00 */
export function bankZero(gtin: number, serial: number[], endpointIndex: number): number[] {
	const bank = new Array<number>(0x1b).fill(0)
	bank[0x00] = 0x1a
	bank[0x02] = 0x00
	let value = gtin
	for (let i = 0x08; i >= 0x03; i--) {
		bank[i] = value % 256
		value = Math.floor(value / 256)
	}
	bank[0x09] = 2
	bank[0x0a] = 7
	serial.forEach((byte, i) => {
		bank[0x0b + i] = byte
	})
	bank[0x13] = 1
	bank[0x14] = 3
	bank[0x15] = 0x08
	bank[0x16] = 0x09
	bank[0x17] = 0x08
	bank[0x18] = 0
	bank[0x19] = 1
	bank[0x1a] = endpointIndex
	return bank
}

export class SimulatedGear {
	shortAddress: number | null
	randomAddress = 0xffffff
	searchAddress = 0xffffff
	initialised = false
	withdrawn = false
	dtr0 = 0
	dtr1 = 0
	dtr2 = 0
	level: number
	lastActiveLevel = 254
	minLevel: number
	maxLevel: number
	powerOnLevel = 254
	deviceType: number
	fadeTimeRate: number
	groups: number
	lastScene: number | null = null
	identifyCount = 0
	unreadable: boolean
	readonly bank0: number[]
	readonly gtin: number
	readonly serial: number[]
	readonly endpointIndex: number

	private randomAddresses: number[]
	private randomiseCount = 0

	constructor(opts: SimulatedGearOptions) {
		this.randomAddresses = opts.randomAddresses
		this.shortAddress = opts.shortAddress ?? null
		this.gtin = opts.gtin ?? 0x0123456789
		this.serial = opts.serial ?? [0, 0, 0, 0, 0, 0, 0, 1]
		this.endpointIndex = opts.endpointIndex ?? 0
		this.unreadable = opts.unreadable ?? false
		this.level = opts.level ?? 0
		this.minLevel = opts.minLevel ?? 1
		this.maxLevel = opts.maxLevel ?? 254
		this.deviceType = opts.deviceType ?? 6
		this.fadeTimeRate = opts.fadeTimeRate ?? 0x07
		this.groups = opts.groups ?? 0
		this.bank0 = bankZero(this.gtin, this.serial, this.endpointIndex)
	}

	/** The unique id this gear should be registered under */
	get uniqueId(): string {
		return `${this.gtin}-${this.serial.map(b => b.toString(16).padStart(2, '0')).join('')}-${this.endpointIndex}`
	}

	/** Apply a forward frame; returns the backward frame this gear sends, if any */
	receive(command: DaliCommand, repeated: boolean): number | null {
		if (command.twice && !repeated) {
			return null
		}
		switch (command.kind) {
		case 'arc-power':
			if (this.addressed(command.address.type, command.address.target) && command.level !== 0xff) {
				this.level = command.level
				if (command.level > 0) {
					this.lastActiveLevel = command.level
				}
			}
			return null
		case 'gear':
			if (!this.addressed(command.address.type, command.address.target)) {
				return null
			}
			return this.gearCommand(command.name, command.opcode)
		case 'special':
			return this.specialCommand(command.name, command.data)
		case 'device':
			return null
		}
	}

	private addressed(type: DaliAddressType, target: number): boolean {
		switch (type) {
		case DaliAddressType.SHORT:
			return this.shortAddress === target
		case DaliAddressType.GROUP:
			return (this.groups & (1 << target)) !== 0
		case DaliAddressType.BROADCAST:
			return true
		case DaliAddressType.BROADCAST_UNADDRESSED:
			return this.shortAddress === null
		}
	}

	private selected(): boolean {
		return this.initialised && this.randomAddress === this.searchAddress
	}

	private specialCommand(name: string | null, data: number): number | null {
		switch (name) {
		case 'TERMINATE':
			this.initialised = false
			this.withdrawn = false
			return null
		case 'DTR0':
			this.dtr0 = data
			return null
		case 'DTR1':
			this.dtr1 = data
			return null
		case 'DTR2':
			this.dtr2 = data
			return null
		case 'INITIALISE':
			if (data === 0x00 || (data === 0xff && this.shortAddress === null) || (this.shortAddress !== null && data === ((this.shortAddress << 1) | 1))) {
				this.initialised = true
				this.withdrawn = false
			}
			return null
		case 'RANDOMISE':
			if (this.initialised) {
				const index = Math.min(this.randomiseCount, this.randomAddresses.length - 1)
				this.randomAddress = this.randomAddresses[index]
				this.randomiseCount++
			}
			return null
		case 'SEARCHADDRH':
			this.searchAddress = (this.searchAddress & 0x00ffff) | (data << 16)
			return null
		case 'SEARCHADDRM':
			this.searchAddress = (this.searchAddress & 0xff00ff) | (data << 8)
			return null
		case 'SEARCHADDRL':
			this.searchAddress = (this.searchAddress & 0xffff00) | data
			return null
		case 'COMPARE':
			return this.initialised && !this.withdrawn && this.randomAddress <= this.searchAddress ? 0xff : null
		case 'WITHDRAW':
			if (this.selected()) {
				this.withdrawn = true
			}
			return null
		case 'PROGRAM_SHORT_ADDRESS':
			if (this.selected()) {
				this.shortAddress = data === 0xff ? null : data >> 1
			}
			return null
		case 'VERIFY_SHORT_ADDRESS':
			return this.initialised && this.shortAddress !== null && data === ((this.shortAddress << 1) | 1) ? 0xff : null
		case 'QUERY_SHORT_ADDRESS':
			if (!this.selected()) {
				return null
			}
			return this.shortAddress === null ? 0xff : (this.shortAddress << 1) | 1
		default:
			return null
		}
	}

	private gearCommand(name: string | null, opcode: number): number | null {
		const index = opcode & 0x0f
		switch (name) {
		case 'OFF':
			this.level = 0
			return null
		case 'GO_TO_LAST_ACTIVE_LEVEL':
			this.level = this.lastActiveLevel
			return null
		case 'RECALL_MAX_LEVEL':
			this.level = this.maxLevel
			return null
		case 'RECALL_MIN_LEVEL':
			this.level = this.minLevel
			return null
		case 'GO_TO_SCENE':
			this.lastScene = index
			return null
		case 'IDENTIFY_DEVICE':
			this.identifyCount++
			return null
		case 'SET_SHORT_ADDRESS':
			this.shortAddress = this.dtr0 === 0xff ? null : this.dtr0 >> 1
			return null
		case 'SET_POWER_ON_LEVEL':
			this.powerOnLevel = this.dtr0
			return null
		case 'ADD_TO_GROUP':
			this.groups |= 1 << index
			return null
		case 'REMOVE_FROM_GROUP':
			this.groups &= ~(1 << index)
			return null
		case 'QUERY_STATUS':
			return (this.level > 0 ? 0x04 : 0) | (this.shortAddress === null ? 0x40 : 0)
		case 'QUERY_CONTROL_GEAR_PRESENT':
			return 0xff
		case 'QUERY_ACTUAL_LEVEL':
			return this.level
		case 'QUERY_MIN_LEVEL':
			return this.minLevel
		case 'QUERY_MAX_LEVEL':
			return this.maxLevel
		case 'QUERY_DEVICE_TYPE':
			return this.deviceType
		case 'QUERY_FADE_TIME_FADE_RATE':
			return this.fadeTimeRate
		case 'QUERY_GROUPS_0_7':
			return this.groups & 0xff
		case 'QUERY_GROUPS_8_15':
			return (this.groups >> 8) & 0xff
		case 'READ_MEMORY_LOCATION': {
			if (this.unreadable) {
				return null
			}
			const location = this.dtr0
			this.dtr0 = Math.min(0xff, this.dtr0 + 1)
			if (this.dtr1 !== 0 || location >= this.bank0.length) {
				return null
			}
			return this.bank0[location]
		}
		default:
			return null
		}
	}
}

export interface SimulatedWrite {
	frame: number[]
	/** `Date.now()` when the frame was written */
	at: number
}

/**
 * A DALI bus in memory behind the transport interface. Every written frame is applied to
 * every simulated gear; their answers are combined the way the wire combines them.
 */
export class SimulatedBus implements DaliTransport {
	readonly gears: SimulatedGear[]
	readonly writes: SimulatedWrite[] = []
	quiescentStarts = 0
	quiescentStops = 0
	/** Called with every frame as it is written */
	onWrite?: (frame: number[]) => void
	/** Report commands that expect an answer and got none, the way some adapters do */
	reportUnanswered = false

	private _state: DaliTransportState = 'closed'
	private inbox: DaliReceived[] = []
	private reader: { resolve: (received: DaliReceived | null) => void, reject: (err: Error) => void, timer: NodeJS.Timeout } | null = null
	private lastWrite: { key: string, at: number } | null = null
	private failure: Error | null = null

	constructor(gears: SimulatedGear[] = []) {
		this.gears = gears
	}

	get state(): DaliTransportState {
		return this._state
	}

	async open(): Promise<void> {
		this._state = 'open'
	}

	async close(): Promise<void> {
		this._state = 'closed'
		this.finishRead(null)
	}

	/** Written frames decoded, for asserting on what was sent */
	commands(): DaliCommand[] {
		return this.writes.map(write => decodeForward(Buffer.from(write.frame)))
	}

	/** How many times a special command went out */
	count(name: string): number {
		return this.commands().filter(command => command.kind === 'special' && command.name === name).length
	}

	/** A frame from somewhere else on the bus */
	inject(frame: number[]): void {
		this.deliver({ kind: 'bus', frame: Buffer.from(frame) })
	}

	/** A backward frame the adapter can't attribute, as if it answered whatever we sent last */
	injectAnswer(value: number): void {
		this.deliver({ kind: 'answer', frame: Buffer.of(value) })
	}

	/** Unplug the adapter: every later read and write fails */
	unplug(): void {
		this.failure = new Error('device unplugged')
		this._state = 'lost'
		const reader = this.reader
		if (reader) {
			this.reader = null
			clearTimeout(reader.timer)
			reader.reject(this.failure)
		}
	}

	async write(frame: Buffer): Promise<void> {
		if (this.failure) {
			throw this.failure
		}
		const now = Date.now()
		this.writes.push({ frame: [...frame], at: now })
		this.onWrite?.([...frame])

		const key = frame.toString('hex')
		const repeated = this.lastWrite !== null && this.lastWrite.key === key && now - this.lastWrite.at <= REPEAT_WINDOW
		const command = decodeForward(frame)
		/* A third identical frame is a new first frame */
		this.lastWrite = command.twice && repeated ? null : { key, at: now }

		if (command.kind === 'device' && command.twice && repeated) {
			if (command.name === 'START_QUIESCENT_MODE') {
				this.quiescentStarts++
			} else if (command.name === 'STOP_QUIESCENT_MODE') {
				this.quiescentStops++
			}
		}

		const answers: number[] = []
		for (const gear of this.gears) {
			const answer = gear.receive(command, repeated)
			if (answer !== null) {
				answers.push(answer)
			}
		}
		if (answers.length === 0) {
			if (this.reportUnanswered && command.answer !== 'none') {
				setImmediate(() => this.deliver({ kind: 'no-answer' }))
			}
			return
		}
		/* Identical answers overlay cleanly; different ones corrupt the frame */
		const reply = answers.every(answer => answer === answers[0]) ? Buffer.of(answers[0]) : Buffer.alloc(0)
		setImmediate(() => this.deliver({ kind: 'answer', frame: reply }))
	}

	async read(timeout: number): Promise<DaliReceived | null> {
		if (this.failure) {
			throw this.failure
		}
		const next = this.inbox.shift()
		if (next) {
			return next
		}
		return new Promise<DaliReceived | null>((resolve, reject) => {
			const timer = setTimeout(() => this.finishRead(null), timeout)
			this.reader = { resolve, reject, timer }
		})
	}

	private deliver(received: DaliReceived): void {
		if (this.reader) {
			this.finishRead(received)
		} else {
			this.inbox.push(received)
		}
	}

	private finishRead(received: DaliReceived | null): void {
		const reader = this.reader
		if (reader) {
			this.reader = null
			clearTimeout(reader.timer)
			reader.resolve(received)
		}
	}
}
