import { warn } from 'node:console'
import { HIDAsync, devicesAsync } from 'node-hid'
import { DaliConnectionError } from './dali-errors.js'
import type { DaliReceived, DaliTransport, DaliTransportDescriptor, DaliTransportState } from './dali-transport.js'

/*
 * The Tridonic DALI USB adapter speaks HID.
 *
 * Output reports are 64 bytes, mostly zero:
 *   [0] 0x12 (from us)  [1] sequence 1-255  [3] frame type  [5..7] frame, most significant byte first
 * Input reports are 16 bytes:
 *   [0] 0x11 another controller, 0x12 us  [1] message type  [3..5] frame  [8] sequence (ours only)
 */

export const TRIDONIC_VENDOR_ID = 0x17b5
export const TRIDONIC_PRODUCT_ID = 0x0020

const OUTPUT_REPORT_LENGTH = 64
const INPUT_REPORT_LENGTH = 16

export enum TridonicDirection {
	EXTERNAL = 0x11,
	SELF = 0x12,
}

export enum TridonicFrameType {
	FORWARD_16 = 0x03,
	FORWARD_24 = 0x06,
}

export enum TridonicMessageType {
	/** The adapter received no answer to our command */
	NAK = 0x71,
	RESPONSE = 0x72,
	/** A forward frame went out on the bus */
	TX_COMPLETE = 0x73,
	/** A forward frame from another controller */
	BUS_FRAME = 0x74,
	FRAMING_ERROR = 0x77,
}

/** Wrap a forward frame in an output report */
export function encodeReport(frame: Buffer, seq: number): Buffer {
	if (frame.length !== 2 && frame.length !== 3) {
		throw new DaliConnectionError(`Can only send 16 or 24-bit forward frames, not ${frame.length} bytes`)
	}
	const report = Buffer.alloc(OUTPUT_REPORT_LENGTH)
	report[0] = TridonicDirection.SELF
	report[1] = seq
	report[3] = frame.length === 2 ? TridonicFrameType.FORWARD_16 : TridonicFrameType.FORWARD_24
	frame.copy(report, 8 - frame.length)
	return report
}

/**
 * Turn an input report into what the dispatcher needs. Answers, NAKs and framing errors
 * carrying `seq`, the sequence number of the last report we wrote, answer our command;
 * backward frames with any other sequence number answered someone else.
 * @returns `null` for reports that carry nothing for the dispatcher
 */
export function parseReport(report: Buffer, seq: number | null): DaliReceived | null {
	if (report.length < 9) {
		warn(`Tridonic: short input report (${report.length} bytes)`)
		return null
	}

	const direction = report[0]
	const type = report[1]
	const ours = seq !== null && report[8] === seq
	switch (type) {
	case TridonicMessageType.NAK:
		/* A NAK for an earlier command of ours is stale */
		return ours ? { kind: 'no-answer' } : null
	case TridonicMessageType.RESPONSE:
		return { kind: ours ? 'answer' : 'bus', frame: Buffer.of(report[5]) }
	case TridonicMessageType.FRAMING_ERROR:
		return { kind: ours ? 'answer' : 'bus', frame: Buffer.alloc(0) }
	case TridonicMessageType.TX_COMPLETE:
	case TridonicMessageType.BUS_FRAME:
		if (direction === TridonicDirection.SELF) {
			/* Our own transmission */
			return null
		}
		/* 16-bit frames leave the top byte clear */
		return { kind: 'bus', frame: report[3] !== 0 ? Buffer.of(report[3], report[4], report[5]) : Buffer.of(report[4], report[5]) }
	default:
		warn(`Tridonic: unknown message type 0x${type.toString(16)}`)
		return null
	}
}

export class TridonicTransport implements DaliTransport {
	readonly descriptor: DaliTransportDescriptor
	private device: HIDAsync | null = null
	private nextSeq = 1
	private lastSeq: number | null = null
	private _state: DaliTransportState = 'closed'

	constructor(descriptor: DaliTransportDescriptor) {
		this.descriptor = descriptor
	}

	get state(): DaliTransportState {
		return this._state
	}

	async open(): Promise<void> {
		if (this.device) {
			return
		}
		try {
			this.device = await HIDAsync.open(this.descriptor.path)
		} catch (err) {
			throw new DaliConnectionError(`Failed to open Tridonic adapter at ${this.descriptor.path}`, { cause: err })
		}
		this._state = 'open'
	}

	async write(frame: Buffer): Promise<void> {
		const device = this.openDevice()
		const report = encodeReport(frame, this.takeSeq())
		try {
			await device.write(report)
		} catch (err) {
			throw this.lost(err)
		}
	}

	async read(timeout: number): Promise<DaliReceived | null> {
		const device = this.openDevice()
		const deadline = Date.now() + timeout

		/* Reports with nothing for us don't end the wait */
		for (;;) {
			const remaining = deadline - Date.now()
			if (remaining <= 0) {
				return null
			}

			let report: Buffer | undefined
			try {
				report = await device.read(remaining)
			} catch (err) {
				throw this.lost(err)
			}
			if (report === undefined || report.length === 0) {
				return null
			}

			const received = parseReport(report.subarray(0, INPUT_REPORT_LENGTH), this.lastSeq)
			if (received !== null) {
				return received
			}
		}
	}

	async close(): Promise<void> {
		const device = this.device
		this.device = null
		this._state = 'closed'
		if (device) {
			await device.close()
		}
	}

	private openDevice(): HIDAsync {
		if (!this.device) {
			throw new DaliConnectionError(this._state === 'lost' ? 'The Tridonic adapter was lost' : 'The Tridonic adapter is not open')
		}
		return this.device
	}

	/** Sequence 0 is what other controllers' frames carry */
	private takeSeq(): number {
		const seq = this.nextSeq
		this.nextSeq = seq >= 255 ? 1 : seq + 1
		this.lastSeq = seq
		return seq
	}

	private lost(err: unknown): DaliConnectionError {
		this._state = 'lost'
		const device = this.device
		this.device = null
		if (device) {
			device.close().catch((closeErr: unknown) => warn('Tridonic: failed to close lost adapter', closeErr))
		}
		return new DaliConnectionError(`Tridonic adapter ${this.descriptor.path} failed`, { cause: err })
	}

	public toString(): string {
		return `TridonicTransport(${this.descriptor.serialNumber ?? this.descriptor.path})`
	}
}

/** Attached Tridonic DALI USB adapters. Nothing is opened. */
export async function discoverTransceivers(): Promise<DaliTransportDescriptor[]> {
	const devices = await devicesAsync(TRIDONIC_VENDOR_ID, TRIDONIC_PRODUCT_ID)
	const result: DaliTransportDescriptor[] = []
	for (const device of devices) {
		if (!device.path) {
			continue
		}
		result.push({
			path: device.path,
			vendorId: device.vendorId,
			productId: device.productId,
			serialNumber: device.serialNumber,
			product: device.product,
		})
	}
	return result
}
