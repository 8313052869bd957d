import type { DaliAddress } from './dali-address.js'
import { DaliRangeError } from './dali-errors.js'

/**
 * What a command expects back from the bus.
 * - `none`: no backward frame is expected
 * - `yes-no`: YES (0xFF) or nothing, where nothing means "no"
 * - `value`: a backward frame is required; its absence is an error
 */
export type DaliAnswer = 'none' | 'yes-no' | 'value'

export interface DaliOpcode {
	opcode: number
	answer: DaliAnswer
	/** The command only takes effect if received twice within the repeat window */
	twice: boolean
	/** The low nibble of the opcode carries a scene or group number */
	indexed: boolean
}

function op(opcode: number, answer: DaliAnswer = 'none', flags: { twice?: boolean, indexed?: boolean } = {}): DaliOpcode {
	return { opcode, answer, twice: flags.twice ?? false, indexed: flags.indexed ?? false }
}

const TWICE = { twice: true }

/** IEC 62386-102 control gear commands, sent after an address byte with the selector bit set */
export const GEAR_COMMANDS = {
	// Level
	'OFF': op(0x00),
	'UP': op(0x01),
	'DOWN': op(0x02),
	'STEP_UP': op(0x03),
	'STEP_DOWN': op(0x04),
	'RECALL_MAX_LEVEL': op(0x05),
	'RECALL_MIN_LEVEL': op(0x06),
	'STEP_DOWN_AND_OFF': op(0x07),
	'ON_AND_STEP_UP': op(0x08),
	'ENABLE_DAPC_SEQUENCE': op(0x09),
	'GO_TO_LAST_ACTIVE_LEVEL': op(0x0a),
	'CONTINUOUS_UP': op(0x0b),
	'CONTINUOUS_DOWN': op(0x0c),
	'GO_TO_SCENE': op(0x10, 'none', { indexed: true }),
	// Configuration
	'RESET': op(0x20, 'none', TWICE),
	'STORE_ACTUAL_LEVEL_IN_DTR0': op(0x21, 'none', TWICE),
	'SAVE_PERSISTENT_VARIABLES': op(0x22, 'none', TWICE),
	'SET_OPERATING_MODE': op(0x23, 'none', TWICE),
	'RESET_MEMORY_BANK': op(0x24, 'none', TWICE),
	'IDENTIFY_DEVICE': op(0x25, 'none', TWICE),
	'SET_MAX_LEVEL': op(0x2a, 'none', TWICE),
	'SET_MIN_LEVEL': op(0x2b, 'none', TWICE),
	'SET_SYSTEM_FAILURE_LEVEL': op(0x2c, 'none', TWICE),
	'SET_POWER_ON_LEVEL': op(0x2d, 'none', TWICE),
	'SET_FADE_TIME': op(0x2e, 'none', TWICE),
	'SET_FADE_RATE': op(0x2f, 'none', TWICE),
	'SET_EXTENDED_FADE_TIME': op(0x30, 'none', TWICE),
	'SET_SCENE': op(0x40, 'none', { twice: true, indexed: true }),
	'REMOVE_FROM_SCENE': op(0x50, 'none', { twice: true, indexed: true }),
	'ADD_TO_GROUP': op(0x60, 'none', { twice: true, indexed: true }),
	'REMOVE_FROM_GROUP': op(0x70, 'none', { twice: true, indexed: true }),
	'SET_SHORT_ADDRESS': op(0x80, 'none', TWICE),
	'ENABLE_WRITE_MEMORY': op(0x81, 'none', TWICE),
	// Queries
	'QUERY_STATUS': op(0x90, 'value'),
	'QUERY_CONTROL_GEAR_PRESENT': op(0x91, 'yes-no'),
	'QUERY_LAMP_FAILURE': op(0x92, 'yes-no'),
	'QUERY_LAMP_POWER_ON': op(0x93, 'yes-no'),
	'QUERY_LIMIT_ERROR': op(0x94, 'yes-no'),
	'QUERY_RESET_STATE': op(0x95, 'yes-no'),
	'QUERY_MISSING_SHORT_ADDRESS': op(0x96, 'yes-no'),
	'QUERY_VERSION_NUMBER': op(0x97, 'value'),
	'QUERY_CONTENT_DTR0': op(0x98, 'value'),
	'QUERY_DEVICE_TYPE': op(0x99, 'value'),
	'QUERY_PHYSICAL_MINIMUM': op(0x9a, 'value'),
	'QUERY_POWER_FAILURE': op(0x9b, 'yes-no'),
	'QUERY_CONTENT_DTR1': op(0x9c, 'value'),
	'QUERY_CONTENT_DTR2': op(0x9d, 'value'),
	'QUERY_OPERATING_MODE': op(0x9e, 'value'),
	'QUERY_LIGHT_SOURCE_TYPE': op(0x9f, 'value'),
	'QUERY_ACTUAL_LEVEL': op(0xa0, 'value'),
	'QUERY_MAX_LEVEL': op(0xa1, 'value'),
	'QUERY_MIN_LEVEL': op(0xa2, 'value'),
	'QUERY_POWER_ON_LEVEL': op(0xa3, 'value'),
	'QUERY_SYSTEM_FAILURE_LEVEL': op(0xa4, 'value'),
	'QUERY_FADE_TIME_FADE_RATE': op(0xa5, 'value'),
	'QUERY_MANUFACTURER_SPECIFIC_MODE': op(0xa6, 'yes-no'),
	'QUERY_NEXT_DEVICE_TYPE': op(0xa7, 'value'),
	'QUERY_EXTENDED_FADE_TIME': op(0xa8, 'value'),
	'QUERY_CONTROL_GEAR_FAILURE': op(0xaa, 'yes-no'),
	'QUERY_SCENE_LEVEL': op(0xb0, 'value', { indexed: true }),
	'QUERY_GROUPS_0_7': op(0xc0, 'value'),
	'QUERY_GROUPS_8_15': op(0xc1, 'value'),
	'QUERY_RANDOM_ADDRESS_H': op(0xc2, 'value'),
	'QUERY_RANDOM_ADDRESS_M': op(0xc3, 'value'),
	'QUERY_RANDOM_ADDRESS_L': op(0xc4, 'value'),
	'READ_MEMORY_LOCATION': op(0xc5, 'value'),
} as const

/** IEC 62386-102 special commands. The opcode takes the place of the address byte. */
export const SPECIAL_COMMANDS = {
	'TERMINATE': op(0xa1),
	'DTR0': op(0xa3),
	'INITIALISE': op(0xa5, 'none', TWICE),
	'RANDOMISE': op(0xa7, 'none', TWICE),
	'COMPARE': op(0xa9, 'yes-no'),
	'WITHDRAW': op(0xab),
	'PING': op(0xad),
	'SEARCHADDRH': op(0xb1),
	'SEARCHADDRM': op(0xb3),
	'SEARCHADDRL': op(0xb5),
	'PROGRAM_SHORT_ADDRESS': op(0xb7),
	'VERIFY_SHORT_ADDRESS': op(0xb9, 'yes-no'),
	'QUERY_SHORT_ADDRESS': op(0xbb, 'value'),
	'ENABLE_DEVICE_TYPE': op(0xc1),
	'DTR1': op(0xc3),
	'DTR2': op(0xc5),
	'WRITE_MEMORY_LOCATION': op(0xc7, 'value'),
	'WRITE_MEMORY_LOCATION_NO_REPLY': op(0xc9),
} as const

/** IEC 62386-103 device commands (24-bit), broadcast to the device instance */
export const DEVICE_COMMANDS = {
	'START_QUIESCENT_MODE': op(0x1d, 'none', TWICE),
	'STOP_QUIESCENT_MODE': op(0x1e, 'none', TWICE),
} as const

export type DaliGearCommandName = keyof typeof GEAR_COMMANDS
export type DaliSpecialCommandName = keyof typeof SPECIAL_COMMANDS
export type DaliDeviceCommandName = keyof typeof DEVICE_COMMANDS

/** Address and instance bytes of a 24-bit command broadcast to every control device */
export const DEVICE_BROADCAST = 0xff
export const DEVICE_INSTANCE = 0xfe

interface DaliCommandBase {
	readonly answer: DaliAnswer
	readonly twice: boolean
}

/** DAPC: set the arc level of the addressed gear directly */
export interface DaliArcPowerCommand extends DaliCommandBase {
	readonly kind: 'arc-power'
	readonly address: DaliAddress
	readonly level: number
}

export interface DaliGearCommand extends DaliCommandBase {
	readonly kind: 'gear'
	readonly address: DaliAddress
	/** `null` for an opcode seen on the bus that is not in the table */
	readonly name: DaliGearCommandName | null
	readonly opcode: number
}

export interface DaliSpecialCommand extends DaliCommandBase {
	readonly kind: 'special'
	readonly name: DaliSpecialCommandName | null
	readonly opcode: number
	readonly data: number
}

export interface DaliDeviceCommand extends DaliCommandBase {
	readonly kind: 'device'
	readonly name: DaliDeviceCommandName | null
	readonly address: number
	readonly instance: number
	readonly opcode: number
}

export type DaliCommand = DaliArcPowerCommand | DaliGearCommand | DaliSpecialCommand | DaliDeviceCommand

function checkByte(value: number, what: string): void {
	if (!Number.isInteger(value) || value < 0 || value > 0xff) {
		throw new DaliRangeError(`${what} must be between 0 and 255, received ${value}`)
	}
}

/** Direct arc power to an address. 255 (MASK) stops a running fade. */
export function arcPower(address: DaliAddress, level: number): DaliArcPowerCommand {
	checkByte(level, 'Arc level')
	return { kind: 'arc-power', address, level, answer: 'none', twice: false }
}

/**
 * A control gear command to an address.
 * @param index the scene or group number for indexed commands such as `GO_TO_SCENE` and `ADD_TO_GROUP`
 */
export function gearCommand(address: DaliAddress, name: DaliGearCommandName, index = 0): DaliGearCommand {
	const info: DaliOpcode = GEAR_COMMANDS[name]
	if (info.indexed) {
		if (!Number.isInteger(index) || index < 0 || index > 15) {
			throw new DaliRangeError(`${name} index must be between 0 and 15, received ${index}`)
		}
	} else if (index !== 0) {
		throw new DaliRangeError(`${name} does not take an index`)
	}
	return { kind: 'gear', address, name, opcode: info.opcode | index, answer: info.answer, twice: info.twice }
}

export function specialCommand(name: DaliSpecialCommandName, data = 0): DaliSpecialCommand {
	checkByte(data, `${name} data`)
	const info: DaliOpcode = SPECIAL_COMMANDS[name]
	return { kind: 'special', name, opcode: info.opcode, data, answer: info.answer, twice: info.twice }
}

export function deviceCommand(name: DaliDeviceCommandName): DaliDeviceCommand {
	const info: DaliOpcode = DEVICE_COMMANDS[name]
	return { kind: 'device', name, address: DEVICE_BROADCAST, instance: DEVICE_INSTANCE, opcode: info.opcode, answer: info.answer, twice: info.twice }
}

function isCommandName<K extends string>(table: Record<K, DaliOpcode>, name: string): name is K {
	return name in table
}

function findOpcode<K extends string>(table: Record<K, DaliOpcode>, opcode: number): K | null {
	for (const name of Object.keys(table)) {
		if (!isCommandName(table, name)) {
			continue
		}
		const info = table[name]
		if (info.indexed ? (opcode & 0xf0) === info.opcode : opcode === info.opcode) {
			return name
		}
	}
	return null
}

/** Rebuild a gear command from an opcode seen on the bus */
export function gearCommandFromOpcode(address: DaliAddress, opcode: number): DaliGearCommand {
	const name = findOpcode<DaliGearCommandName>(GEAR_COMMANDS, opcode)
	if (name === null) {
		return { kind: 'gear', address, name, opcode, answer: 'none', twice: false }
	}
	const info: DaliOpcode = GEAR_COMMANDS[name]
	return { kind: 'gear', address, name, opcode, answer: info.answer, twice: info.twice }
}

export function specialCommandFromOpcode(opcode: number, data: number): DaliSpecialCommand {
	const name = findOpcode<DaliSpecialCommandName>(SPECIAL_COMMANDS, opcode)
	if (name === null) {
		return { kind: 'special', name, opcode, data, answer: 'none', twice: false }
	}
	const info: DaliOpcode = SPECIAL_COMMANDS[name]
	return { kind: 'special', name, opcode, data, answer: info.answer, twice: info.twice }
}

export function deviceCommandFromBytes(address: number, instance: number, opcode: number): DaliDeviceCommand {
	const name = address === DEVICE_BROADCAST && instance === DEVICE_INSTANCE ? findOpcode<DaliDeviceCommandName>(DEVICE_COMMANDS, opcode) : null
	if (name === null) {
		return { kind: 'device', name, address, instance, opcode, answer: 'none', twice: false }
	}
	const info: DaliOpcode = DEVICE_COMMANDS[name]
	return { kind: 'device', name, address, instance, opcode, answer: info.answer, twice: info.twice }
}

export function describeCommand(command: DaliCommand): string {
	switch (command.kind) {
	case 'arc-power':
		return `DAPC(${command.address}, ${command.level})`
	case 'gear': {
		if (command.name === null) {
			return `0x${command.opcode.toString(16).padStart(2, '0')}(${command.address})`
		}
		const info: DaliOpcode = GEAR_COMMANDS[command.name]
		return info.indexed ? `${command.name} ${command.opcode & 0x0f}(${command.address})` : `${command.name}(${command.address})`
	}
	case 'special':
		return `${command.name ?? `0x${command.opcode.toString(16)}`}(0x${command.data.toString(16).padStart(2, '0')})`
	case 'device':
		return command.name ?? `DEVICE(0x${command.address.toString(16)}, 0x${command.instance.toString(16)}, 0x${command.opcode.toString(16)})`
	}
}
