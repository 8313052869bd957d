import { DaliAddress } from './dali-address.js'
import { gearCommand, specialCommand } from './dali-commands.js'
import type { DaliCommand } from './dali-commands.js'
import { DaliConst } from './dali-const.js'
import type { DaliIdentity } from './dali-device.js'
import type { DaliDispatcher, DaliExclusiveLease } from './dali-dispatcher.js'
import { DaliIdentityReadFailedError, DaliNoResponseError, DaliRangeError } from './dali-errors.js'

function hex(bytes: number[]): string {
	return bytes.map(b => b.toString(16).padStart(2, '0')).join('')
}

/**
 * Decode memory bank 0 from location 0x02 onwards.
 *
 * | Location | Content |
 * | --- | --- |
 * | 0x02 | last accessible memory bank |
 * | 0x03-0x08 | GTIN, most significant byte first |
 * | 0x09-0x0A | firmware version major, minor |
 * | 0x0B-0x12 | identification number, most significant byte first |
 * | 0x13-0x14 | hardware version major, minor |
 * | 0x15-0x17 | IEC 62386-101, -102, -103 versions |
 * | 0x18 | number of logical control device units |
 * | 0x19 | number of logical control gear units |
 * | 0x1A | index of this logical control gear unit |
 */
export function parseMemoryBank0(bytes: number[]): DaliIdentity {
	if (bytes.length < DaliConst.BANK_0_LENGTH) {
		throw new DaliRangeError(`Memory bank 0 needs ${DaliConst.BANK_0_LENGTH} bytes from location 0x02, received ${bytes.length}`)
	}

	const gtin = bytes.slice(1, 7).reduce((acc, byte) => acc * 256 + byte, 0)
	const version102 = bytes[20]

	return {
		lastMemoryBank: bytes[0],
		gtin,
		firmwareVersion: `${bytes[7]}.${bytes[8]}`,
		serialNumber: hex(bytes.slice(9, 17)),
		hardwareVersion: `${bytes[17]}.${bytes[18]}`,
		daliVersion: `${version102 >> 2}.${version102 & 0x03}`,
		logicalControlDevices: bytes[22],
		logicalControlGears: bytes[23],
		endpointIndex: bytes[24],
	}
}

/**
 * Read consecutive memory locations. DTR1 selects the bank and DTR0 the first location; the
 * gear advances DTR0 after every READ MEMORY LOCATION, one byte per transaction.
 */
export async function readMemory(dispatcher: DaliDispatcher, shortAddress: number, bank: number, offset: number, length: number, lease?: DaliExclusiveLease): Promise<number[]> {
	const address = DaliAddress.short(shortAddress)
	const commands: DaliCommand[] = [
		specialCommand('DTR1', bank),
		specialCommand('DTR0', offset),
	]
	for (let i = 0; i < length; i++) {
		commands.push(gearCommand(address, 'READ_MEMORY_LOCATION'))
	}

	const results = await dispatcher.sendSequence(commands, lease)
	const bytes: number[] = []
	for (const result of results.slice(2)) {
		if (result === null) {
			throw new DaliNoResponseError(`No answer reading memory bank ${bank} of A${shortAddress}`)
		}
		bytes.push(result)
	}
	return bytes
}

/**
 * Read the permanent identity of the gear at a short address.
 *
 * A missing answer fails with `DaliIdentityReadFailedError`; a corrupted answer (several gear
 * answering at once) is raised as is.
 */
export async function resolveIdentity(dispatcher: DaliDispatcher, shortAddress: number, lease?: DaliExclusiveLease): Promise<DaliIdentity> {
	let bytes: number[]
	try {
		bytes = await readMemory(dispatcher, shortAddress, DaliConst.MEMORY_BANK_0, DaliConst.BANK_0_START, DaliConst.BANK_0_LENGTH, lease)
	} catch (err) {
		if (err instanceof DaliNoResponseError) {
			throw new DaliIdentityReadFailedError(shortAddress, err)
		}
		throw err
	}
	return parseMemoryBank0(bytes)
}
