import { DaliAddress } from './dali-address.js'
import { percentageToArcLevel } from './dali-arc-levels.js'
import { arcPower, gearCommand, specialCommand } from './dali-commands.js'
import type { DaliGearCommandName } from './dali-commands.js'
import { DaliConst } from './dali-const.js'
import type { DaliDevice } from './dali-device.js'
import type { DaliDispatcher } from './dali-dispatcher.js'
import { DaliRangeError } from './dali-errors.js'
import type { DaliRegistry } from './dali-registry.js'

/** The answer to QUERY STATUS */
export interface DaliGearStatus {
	controlGearFailure: boolean
	lampFailure: boolean
	lampOn: boolean
	/** An arc level above max or below min was requested */
	limitError: boolean
	fadeRunning: boolean
	resetState: boolean
	missingShortAddress: boolean
	powerFailure: boolean
}

export interface DaliFade {
	/** 0 means no fade, otherwise the fade time is 0.5 * sqrt(2 ^ fadeTime) seconds */
	fadeTime: number
	/** Steps per second, 506 / sqrt(2 ^ fadeRate) */
	fadeRate: number
}

export function decodeStatus(status: number): DaliGearStatus {
	return {
		controlGearFailure: !!(status & 0x01),
		lampFailure: !!(status & 0x02),
		lampOn: !!(status & 0x04),
		limitError: !!(status & 0x08),
		fadeRunning: !!(status & 0x10),
		resetState: !!(status & 0x20),
		missingShortAddress: !!(status & 0x40),
		powerFailure: !!(status & 0x80),
	}
}

function checkLevel(level: number): void {
	if (!Number.isInteger(level) || level < 0 || level > DaliConst.MAX_LEVEL) {
		throw new DaliRangeError(`Level must be between 0 and ${DaliConst.MAX_LEVEL}, received ${level}`)
	}
}

function checkScene(scene: number): void {
	if (!Number.isInteger(scene) || scene < 0 || scene >= DaliConst.MAX_SCENE) {
		throw new DaliRangeError(`Scene number must be between 0 and ${DaliConst.MAX_SCENE - 1}, received ${scene}`)
	}
}

/**
 * Level control shared by everything that can be addressed. Subclasses decide the address
 * immediately before each command is built.
 */
export abstract class DaliControlTarget {
	protected readonly dispatcher: DaliDispatcher

	constructor(dispatcher: DaliDispatcher) {
		this.dispatcher = dispatcher
	}

	protected abstract address(): DaliAddress

	/** Return to the last level the gear was on at */
	async on(): Promise<void> {
		await this.command('GO_TO_LAST_ACTIVE_LEVEL')
	}

	/** Off, no fade */
	async off(): Promise<void> {
		await this.command('OFF')
	}

	/** Direct arc power 0-254; fades to the new level */
	async setLevel(level: number): Promise<void> {
		checkLevel(level)
		await this.dispatcher.send(arcPower(this.address(), level))
	}

	/** Brightness as a percentage on the logarithmic dimming curve */
	async setPercentage(percentage: number): Promise<void> {
		await this.setLevel(percentageToArcLevel(percentage))
	}

	async recallMax(): Promise<void> {
		await this.command('RECALL_MAX_LEVEL')
	}

	async recallMin(): Promise<void> {
		await this.command('RECALL_MIN_LEVEL')
	}

	/** Fade up for 200ms at the fade rate */
	async up(): Promise<void> {
		await this.command('UP')
	}

	/** Fade down for 200ms at the fade rate */
	async down(): Promise<void> {
		await this.command('DOWN')
	}

	async goToScene(scene: number): Promise<void> {
		checkScene(scene)
		await this.dispatcher.send(gearCommand(this.address(), 'GO_TO_SCENE', scene))
	}

	protected async command(name: DaliGearCommandName, index = 0): Promise<void> {
		await this.dispatcher.send(gearCommand(this.address(), name, index))
	}
}

/**
 * A handle on one logical control gear. It holds the unique id only; the short address is
 * looked up in the registry for every command, so the handle survives readdressing.
 */
export class DaliGear extends DaliControlTarget {
	readonly uniqueId: string
	private readonly registry: DaliRegistry

	constructor(uniqueId: string, dispatcher: DaliDispatcher, registry: DaliRegistry) {
		super(dispatcher)
		this.uniqueId = uniqueId
		this.registry = registry
	}

	/** The registry record, if the device is still known */
	get device(): DaliDevice | undefined {
		return this.registry.get(this.uniqueId)
	}

	/** The current short address, or `DaliDeviceNotAddressedError` */
	get shortAddress(): number {
		return this.registry.resolve(this.uniqueId)
	}

	protected address(): DaliAddress {
		return DaliAddress.short(this.registry.resolve(this.uniqueId))
	}

	/** Flash the gear so it can be found physically */
	async identify(): Promise<void> {
		await this.command('IDENTIFY_DEVICE')
	}

	/** Off if the lamp is lit, otherwise back to the last active level */
	async toggle(): Promise<void> {
		const level = await this.queryActualLevel()
		if (level !== null && level > 0) {
			await this.off()
		} else {
			await this.on()
		}
	}

	async queryStatus(): Promise<DaliGearStatus> {
		return decodeStatus(await this.query('QUERY_STATUS'))
	}

	/** The current arc level, or `null` while the gear can't tell (MASK) */
	async queryActualLevel(): Promise<number | null> {
		const level = await this.query('QUERY_ACTUAL_LEVEL')
		return level === DaliConst.MASK ? null : level
	}

	async queryMinLevel(): Promise<number> {
		return this.query('QUERY_MIN_LEVEL')
	}

	async queryMaxLevel(): Promise<number> {
		return this.query('QUERY_MAX_LEVEL')
	}

	/** The IEC 62386-2xx device type, or `DaliGearType.MULTIPLE` */
	async queryDeviceType(): Promise<number> {
		return this.query('QUERY_DEVICE_TYPE')
	}

	async queryFade(): Promise<DaliFade> {
		const result = await this.query('QUERY_FADE_TIME_FADE_RATE')
		return { fadeTime: result >> 4, fadeRate: result & 0x0f }
	}

	/** Group numbers this gear is a member of, ascending */
	async queryGroups(): Promise<number[]> {
		const low = await this.query('QUERY_GROUPS_0_7')
		const high = await this.query('QUERY_GROUPS_8_15')
		const membership = low | (high << 8)
		const groups: number[] = []
		for (let group = 0; group < DaliConst.MAX_GROUP; group++) {
			if (membership & (1 << group)) {
				groups.push(group)
			}
		}
		this.rememberGroups(() => groups)
		return groups
	}

	async setPowerOnLevel(level: number): Promise<void> {
		checkLevel(level)
		const address = this.address()
		await this.dispatcher.sendSequence([
			specialCommand('DTR0', level),
			gearCommand(address, 'SET_POWER_ON_LEVEL'),
		])
	}

	async addToGroup(group: number): Promise<void> {
		await this.command('ADD_TO_GROUP', group)
		this.rememberGroups(groups => groups.includes(group) ? groups : [...groups, group].sort((a, b) => a - b))
	}

	async removeFromGroup(group: number): Promise<void> {
		await this.command('REMOVE_FROM_GROUP', group)
		this.rememberGroups(groups => groups.filter(g => g !== group))
	}

	/** Keep the registry's idea of group membership current, for resolving group traffic */
	private rememberGroups(update: (groups: number[]) => number[]): void {
		const device = this.device
		if (device) {
			device.groups = update(device.groups)
		}
	}

	private async query(name: DaliGearCommandName): Promise<number> {
		return this.dispatcher.query(gearCommand(this.address(), name))
	}

	public toString(): string {
		return `DaliGear(${this.uniqueId})`
	}
}

/** Every gear that is a member of one group, addressed in a single frame */
export class DaliGroup extends DaliControlTarget {
	readonly group: number
	private readonly groupAddress: DaliAddress

	constructor(group: number, dispatcher: DaliDispatcher) {
		super(dispatcher)
		this.groupAddress = DaliAddress.group(group)
		this.group = group
	}

	protected address(): DaliAddress {
		return this.groupAddress
	}

	public toString(): string {
		return `DaliGroup(${this.group})`
	}
}
