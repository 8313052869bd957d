import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DaliBus } from '../src/dali-bus.js'
import { DaliDeviceNotAddressedError, DaliRangeError } from '../src/dali-errors.js'
import type { DaliGear } from '../src/dali-gear.js'
import { decodeStatus } from '../src/dali-gear.js'
import { parseMemoryBank0 } from '../src/dali-identity.js'
import { FAST_TIMING, SimulatedBus, SimulatedGear } from './simulated-bus.js'

describe('DaliGear', () => {
	let sim: SimulatedBus
	let bus: DaliBus
	let lamp: SimulatedGear
	let gear: DaliGear

	beforeEach(async () => {
		lamp = new SimulatedGear({ randomAddresses: [0x100000], shortAddress: 3, fadeTimeRate: 0x27, minLevel: 85, maxLevel: 240 })
		sim = new SimulatedBus([lamp])
		bus = new DaliBus(sim, FAST_TIMING)
		await bus.open()
		bus.registry.confirm(parseMemoryBank0(lamp.bank0.slice(2)), 3)
		gear = bus.gear(lamp.uniqueId)
	})

	afterEach(async () => {
		await bus.close()
	})

	it('fails without writing anything when the device has no known address', async () => {
		await expect(bus.gear('0-0000000000000000-0').on()).rejects.toBeInstanceOf(DaliDeviceNotAddressedError)
		expect(sim.writes).toHaveLength(0)
	})

	it('fails once the registry loses the address', async () => {
		bus.registry.clearAddresses()

		await expect(gear.off()).rejects.toBeInstanceOf(DaliDeviceNotAddressedError)
		expect(sim.writes).toHaveLength(0)
	})

	it('switches on and off', async () => {
		await gear.setLevel(100)
		expect(lamp.level).toBe(100)
		await gear.off()
		expect(lamp.level).toBe(0)
		await gear.on()
		expect(lamp.level).toBe(100)
	})

	it('sets a percentage on the dimming curve', async () => {
		await gear.setPercentage(100)
		expect(lamp.level).toBe(254)
		expect(sim.writes.at(-1)?.frame).toEqual([0x06, 254])
	})

	it('recalls max and min', async () => {
		await gear.recallMax()
		expect(lamp.level).toBe(240)
		await gear.recallMin()
		expect(lamp.level).toBe(85)
	})

	it('toggles', async () => {
		await gear.toggle()
		expect(lamp.level).toBe(254)
		await gear.toggle()
		expect(lamp.level).toBe(0)
	})

	it('recalls scenes', async () => {
		await gear.goToScene(4)
		expect(lamp.lastScene).toBe(4)
		await expect(gear.goToScene(16)).rejects.toBeInstanceOf(DaliRangeError)
	})

	it('validates levels before sending', async () => {
		await expect(gear.setLevel(255)).rejects.toBeInstanceOf(DaliRangeError)
		expect(sim.writes).toHaveLength(0)
	})

	it('identifies itself', async () => {
		await gear.identify()
		expect(lamp.identifyCount).toBe(1)
		expect(sim.writes).toHaveLength(2)
	})

	it('queries status and levels', async () => {
		await gear.setLevel(120)

		const status = await gear.queryStatus()
		expect(status.lampOn).toBe(true)
		expect(status.missingShortAddress).toBe(false)
		await expect(gear.queryActualLevel()).resolves.toBe(120)
		await expect(gear.queryMinLevel()).resolves.toBe(85)
		await expect(gear.queryMaxLevel()).resolves.toBe(240)
		await expect(gear.queryDeviceType()).resolves.toBe(6)
		await expect(gear.queryFade()).resolves.toEqual({ fadeTime: 2, fadeRate: 7 })
	})

	it('manages group membership', async () => {
		await gear.addToGroup(3)
		await gear.addToGroup(9)
		await expect(gear.queryGroups()).resolves.toEqual([3, 9])

		expect(gear.device?.groups).toEqual([3, 9])

		await gear.removeFromGroup(3)
		expect(gear.device?.groups).toEqual([9])
		await expect(gear.queryGroups()).resolves.toEqual([9])
		await expect(gear.addToGroup(16)).rejects.toBeInstanceOf(DaliRangeError)
	})

	it('sets the power on level through DTR0', async () => {
		await gear.setPowerOnLevel(200)
		expect(lamp.powerOnLevel).toBe(200)
		expect(sim.writes.map(write => write.frame)).toEqual([[0xa3, 200], [0x07, 0x2d], [0x07, 0x2d]])
	})

	it('controls groups with a single frame', async () => {
		await gear.addToGroup(9)
		sim.writes.length = 0

		await bus.group(9).setLevel(50)

		expect(lamp.level).toBe(50)
		expect(sim.writes.map(write => write.frame)).toEqual([[0x92, 50]])
	})
})

describe('decodeStatus', () => {
	it('decodes every flag', () => {
		expect(decodeStatus(0x44)).toEqual({
			controlGearFailure: false,
			lampFailure: false,
			lampOn: true,
			limitError: false,
			fadeRunning: false,
			resetState: false,
			missingShortAddress: true,
			powerFailure: false,
		})
		expect(Object.values(decodeStatus(0xff)).every(Boolean)).toBe(true)
	})
})
