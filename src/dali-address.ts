import { DaliConst } from './dali-const.js'
import { DaliRangeError } from './dali-errors.js'

export enum DaliAddressType {
	SHORT = 0,
	GROUP = 1,
	BROADCAST = 2,
	BROADCAST_UNADDRESSED = 3,
}

const BROADCAST_BYTE = 0xfe
const BROADCAST_UNADDRESSED_BYTE = 0xfc

// DaliAddress
export class DaliAddress {
	readonly type: DaliAddressType
	readonly target: number

	constructor(type: DaliAddressType, target = 0) {
		this.type = type
		this.target = target
		this._validate()
	}

	public static short(address: number): DaliAddress {
		return new DaliAddress(DaliAddressType.SHORT, address)
	}

	public static group(group: number): DaliAddress {
		return new DaliAddress(DaliAddressType.GROUP, group)
	}

	public static broadcast(): DaliAddress {
		return new DaliAddress(DaliAddressType.BROADCAST)
	}

	public static broadcastUnaddressed(): DaliAddress {
		return new DaliAddress(DaliAddressType.BROADCAST_UNADDRESSED)
	}

	/**
	 * Parse the first byte of a 16-bit forward frame.
	 * @returns the address and whether the frame is direct arc power, or `null` for a special command
	 */
	public static fromAddressByte(byte: number): { address: DaliAddress, arcPower: boolean } | null {
		const arcPower = (byte & 0x01) === 0
		if ((byte & 0x80) === 0) {
			return { address: DaliAddress.short(byte >> 1), arcPower }
		}
		if ((byte & 0xe0) === 0x80) {
			return { address: DaliAddress.group((byte >> 1) & 0x0f), arcPower }
		}
		if ((byte & 0xfe) === BROADCAST_BYTE) {
			return { address: DaliAddress.broadcast(), arcPower }
		}
		if ((byte & 0xfe) === BROADCAST_UNADDRESSED_BYTE) {
			return { address: DaliAddress.broadcastUnaddressed(), arcPower }
		}
		return null
	}

	/** The address byte of a forward frame. Bit 0 is the selector: clear for direct arc power, set for a command. */
	public addressByte(arcPower: boolean): number {
		const selector = arcPower ? 0x00 : 0x01
		switch (this.type) {
		case DaliAddressType.SHORT:
			return (this.target << 1) | selector
		case DaliAddressType.GROUP:
			return 0x80 | (this.target << 1) | selector
		case DaliAddressType.BROADCAST:
			return BROADCAST_BYTE | selector
		case DaliAddressType.BROADCAST_UNADDRESSED:
			return BROADCAST_UNADDRESSED_BYTE | selector
		}
	}

	public shortAddress(): number {
		if (this.type === DaliAddressType.SHORT) {
			return this.target
		} else {
			throw new DaliRangeError('Address is not a short address')
		}
	}

	public group(): number {
		if (this.type === DaliAddressType.GROUP) {
			return this.target
		} else {
			throw new DaliRangeError('Address is not a group')
		}
	}

	public equals(other: DaliAddress): boolean {
		return this.type === other.type && this.target === other.target
	}

	private _validate(): void {
		switch (this.type) {
		case DaliAddressType.SHORT:
			if (!Number.isInteger(this.target) || this.target < 0 || this.target >= DaliConst.MAX_SHORT_ADDRESS) {
				throw new DaliRangeError(`Short address must be between 0 and ${DaliConst.MAX_SHORT_ADDRESS - 1}, received ${this.target}`)
			}
			break
		case DaliAddressType.GROUP:
			if (!Number.isInteger(this.target) || this.target < 0 || this.target >= DaliConst.MAX_GROUP) {
				throw new DaliRangeError(`Group number must be between 0 and ${DaliConst.MAX_GROUP - 1}, received ${this.target}`)
			}
			break
		case DaliAddressType.BROADCAST:
		case DaliAddressType.BROADCAST_UNADDRESSED:
			if (this.target !== 0) {
				throw new DaliRangeError('Broadcast addresses have no target')
			}
			break
		}
	}

	public toString(): string {
		switch (this.type) {
		case DaliAddressType.SHORT:
			return `A${this.target}`
		case DaliAddressType.GROUP:
			return `G${this.target}`
		case DaliAddressType.BROADCAST:
			return 'Broadcast'
		case DaliAddressType.BROADCAST_UNADDRESSED:
			return 'Unaddressed Broadcast'
		}
	}
}
