import { DaliAddress } from './dali-address.js'
import type { DaliCommand } from './dali-commands.js'
import { arcPower, deviceCommandFromBytes, gearCommandFromOpcode, specialCommandFromOpcode } from './dali-commands.js'
import { DaliMalformedFrameError } from './dali-errors.js'

/*
 * Frames cross the transport as plain bytes, most significant first:
 * 1 byte is a backward frame, 2 bytes a 16-bit forward frame, 3 bytes a 24-bit forward frame.
 * A 0 byte frame is a backward frame that was corrupted on the wire, which is what happens
 * when several devices answer at once with different values.
 */

/** A decoded backward frame: the answered byte, or `null` when nothing answered */
export type DaliBackwardValue = number | null

export type DaliFrame =
	| { kind: 'command', command: DaliCommand }
	| { kind: 'backward', value: number }
	| { kind: 'malformed', length: number }

/** Encode a command as the forward frame written to the transport */
export function encodeCommand(command: DaliCommand): Buffer {
	switch (command.kind) {
	case 'arc-power':
		return Buffer.of(command.address.addressByte(true), command.level)
	case 'gear':
		return Buffer.of(command.address.addressByte(false), command.opcode)
	case 'special':
		return Buffer.of(command.opcode, command.data)
	case 'device':
		return Buffer.of(command.address, command.instance, command.opcode)
	}
}

/** Decode the answer to a command. `null` is what the transport returns when nothing was received. */
export function decodeBackward(frame: Buffer | null): DaliBackwardValue {
	if (frame === null) {
		return null
	}
	if (frame.length !== 1) {
		throw new DaliMalformedFrameError(`Expected a 1 byte backward frame, received ${frame.length} bytes`)
	}
	return frame[0]
}

/** Decode a forward frame sent by another controller */
export function decodeForward(frame: Buffer): DaliCommand {
	if (frame.length === 2) {
		const parsed = DaliAddress.fromAddressByte(frame[0])
		if (parsed === null) {
			return specialCommandFromOpcode(frame[0], frame[1])
		} else if (parsed.arcPower) {
			return arcPower(parsed.address, frame[1])
		} else {
			return gearCommandFromOpcode(parsed.address, frame[1])
		}
	} else if (frame.length === 3) {
		return deviceCommandFromBytes(frame[0], frame[1], frame[2])
	}
	throw new DaliMalformedFrameError(`Expected a 2 or 3 byte forward frame, received ${frame.length} bytes`)
}

export function decodeFrame(frame: Buffer): DaliFrame {
	if (frame.length === 1) {
		return { kind: 'backward', value: frame[0] }
	} else if (frame.length === 2 || frame.length === 3) {
		return { kind: 'command', command: decodeForward(frame) }
	} else {
		return { kind: 'malformed', length: frame.length }
	}
}

export function frameToHex(frame: Buffer): string {
	return [...frame].map(b => b.toString(16).padStart(2, '0')).join(' ')
}
