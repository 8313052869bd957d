export const DaliGearType = {
	/** A fluorescent lamp */
	FLUORESCENT_LAMP: 0,
	/** Self-contained emergency lighting */
	EMERGENCY_LIGHTING: 1,
	/** A discharge (HID) lamp */
	HID_LAMP: 2,
	/** A low voltage halogen lamp */
	LOW_VOLTAGE_HALOGEN_LAMP: 3,
	/** An incandescent lamp dimmer */
	INCANDESCENT_LAMP_DIMMER: 4,
	/** Conversion to a DC control voltage */
	DC_CONTROLLED_DIMMER: 5,
	/** A LED module */
	LED_LAMP: 6,
	/** A switching relay */
	RELAY: 7,
	/** Device has colour control/Type 8 capability */
	COLOUR_CONTROL: 8,
	/** Returned by QUERY DEVICE TYPE when the gear implements more than one type */
	MULTIPLE: 0xff,
} as const

export type DaliGearType = (typeof DaliGearType)[keyof typeof DaliGearType]

/** What memory bank 0 tells us about a logical control gear */
export interface DaliIdentity {
	/** Global Trade Item Number, 48 bits */
	gtin: number
	/** Identification number as 16 hex digits */
	serialNumber: string
	/** Index of this logical control gear within the physical device */
	endpointIndex: number
	firmwareVersion: string
	hardwareVersion: string
	/** IEC 62386-102 version implemented */
	daliVersion: string
	logicalControlGears: number
	logicalControlDevices: number
	lastMemoryBank: number
}

/**
 * The combination of GTIN and identification number is globally unique and immutable, but one
 * physical device can contain several logical control gear, so the endpoint index is included too.
 */
export function uniqueIdFor(gtin: number, serialNumber: string, endpointIndex: number): string {
	return `${gtin}-${serialNumber}-${endpointIndex}`
}

export class DaliDevice {
	readonly uniqueId: string
	identity: DaliIdentity
	/** Where the device was last confirmed. Best effort: another controller may have readdressed it since. */
	shortAddress: number | null
	/** Group numbers the device was last seen to belong to */
	groups: number[] = []
	lastConfirmed: Date

	constructor(identity: DaliIdentity, shortAddress: number | null) {
		this.uniqueId = uniqueIdFor(identity.gtin, identity.serialNumber, identity.endpointIndex)
		this.identity = identity
		this.shortAddress = shortAddress
		this.lastConfirmed = new Date()
	}

	get gtin(): number {
		return this.identity.gtin
	}

	get serialNumber(): string {
		return this.identity.serialNumber
	}

	get endpointIndex(): number {
		return this.identity.endpointIndex
	}

	public toString(): string {
		return `DaliDevice(${this.uniqueId}, ${this.shortAddress === null ? 'unaddressed' : `A${this.shortAddress}`})`
	}
}
