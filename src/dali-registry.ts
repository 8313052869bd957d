import { DaliAddressType } from './dali-address.js'
import type { DaliAddress } from './dali-address.js'
import { GEAR_COMMANDS } from './dali-commands.js'
import type { DaliCommand } from './dali-commands.js'
import { DaliConst } from './dali-const.js'
import { DaliDevice, uniqueIdFor } from './dali-device.js'
import type { DaliIdentity } from './dali-device.js'
import { DaliDeviceNotAddressedError } from './dali-errors.js'

/**
 * The devices known on one bus, keyed by unique id. Addresses are only ever looked up here,
 * never cached by the handles that use them.
 */
export class DaliRegistry {
	private devices = new Map<string, DaliDevice>()

	get size(): number {
		return this.devices.size
	}

	get(uniqueId: string): DaliDevice | undefined {
		return this.devices.get(uniqueId)
	}

	all(): DaliDevice[] {
		return [...this.devices.values()]
	}

	byShortAddress(shortAddress: number): DaliDevice | undefined {
		return this.all().find(device => device.shortAddress === shortAddress)
	}

	/** The current short address of a device, or `DaliDeviceNotAddressedError` */
	resolve(uniqueId: string): number {
		const shortAddress = this.devices.get(uniqueId)?.shortAddress
		if (shortAddress === undefined || shortAddress === null) {
			throw new DaliDeviceNotAddressedError(uniqueId)
		}
		return shortAddress
	}

	/**
	 * Record that the device with this identity answers at `shortAddress`. Any other device
	 * previously recorded at that address loses it.
	 */
	confirm(identity: DaliIdentity, shortAddress: number): { device: DaliDevice, added: boolean } {
		const uniqueId = uniqueIdFor(identity.gtin, identity.serialNumber, identity.endpointIndex)

		for (const other of this.devices.values()) {
			if (other.uniqueId !== uniqueId && other.shortAddress === shortAddress) {
				other.shortAddress = null
			}
		}

		const existing = this.devices.get(uniqueId)
		if (existing) {
			existing.identity = identity
			existing.shortAddress = shortAddress
			existing.lastConfirmed = new Date()
			return { device: existing, added: false }
		}

		const device = new DaliDevice(identity, shortAddress)
		this.devices.set(uniqueId, device)
		return { device, added: true }
	}

	/** Forget where every device is, before the whole bus is readdressed */
	clearAddresses(): void {
		for (const device of this.devices.values()) {
			device.shortAddress = null
		}
	}

	forget(uniqueId: string): DaliDevice | undefined {
		const device = this.devices.get(uniqueId)
		this.devices.delete(uniqueId)
		return device
	}

	/** Known devices that answer to `address` */
	addressedBy(address: DaliAddress): DaliDevice[] {
		switch (address.type) {
		case DaliAddressType.SHORT:
			return this.all().filter(device => device.shortAddress === address.target)
		case DaliAddressType.GROUP:
			return this.all().filter(device => device.groups.includes(address.target))
		case DaliAddressType.BROADCAST:
			return this.all()
		case DaliAddressType.BROADCAST_UNADDRESSED:
			return this.all().filter(device => device.shortAddress === null)
		}
	}

	/**
	 * Known devices whose light output a command changes. Direct arc power does, unless it is
	 * MASK, and so do the gear commands up to RESET; queries and configuration don't.
	 */
	affectedBy(command: DaliCommand): DaliDevice[] {
		switch (command.kind) {
		case 'arc-power':
			return command.level === DaliConst.MASK ? [] : this.addressedBy(command.address)
		case 'gear':
			return command.opcode <= GEAR_COMMANDS.RESET.opcode ? this.addressedBy(command.address) : []
		case 'special':
		case 'device':
			return []
		}
	}

	usedShortAddresses(): Set<number> {
		const result = new Set<number>()
		for (const device of this.devices.values()) {
			if (device.shortAddress !== null) {
				result.add(device.shortAddress)
			}
		}
		return result
	}
}
