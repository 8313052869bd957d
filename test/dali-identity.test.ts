import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { uniqueIdFor } from '../src/dali-device.js'
import { DaliDispatcher } from '../src/dali-dispatcher.js'
import { DaliIdentityReadFailedError, DaliNoResponseError, DaliRangeError } from '../src/dali-errors.js'
import { parseMemoryBank0, readMemory, resolveIdentity } from '../src/dali-identity.js'
import { FAST_TIMING, SimulatedBus, SimulatedGear, bankZero } from './simulated-bus.js'

describe('parseMemoryBank0', () => {
	it('decodes the identity fields', () => {
		const bank = bankZero(0x0123456789, [0xde, 0xad, 0xbe, 0xef, 0x00, 0x00, 0x00, 0x2a], 1)

		expect(parseMemoryBank0(bank.slice(2))).toEqual({
			lastMemoryBank: 0,
			gtin: 0x0123456789,
			firmwareVersion: '2.7',
			serialNumber: 'deadbeef0000002a',
			hardwareVersion: '1.3',
			daliVersion: '2.1',
			logicalControlDevices: 0,
			logicalControlGears: 1,
			endpointIndex: 1,
		})
	})

	it('needs every location up to 0x1A', () => {
		expect(() => parseMemoryBank0([0, 1, 2])).toThrow(DaliRangeError)
	})
})

describe('uniqueIdFor', () => {
	it('combines GTIN, identification number and endpoint', () => {
		expect(uniqueIdFor(0x0123456789, 'deadbeef0000002a', 1)).toBe('4886718345-deadbeef0000002a-1')
	})
})

describe('reading gear memory', () => {
	let sim: SimulatedBus
	let dispatcher: DaliDispatcher

	beforeEach(async () => {
		sim = new SimulatedBus([
			new SimulatedGear({ randomAddresses: [0x100000], shortAddress: 2, serial: [0, 0, 0, 0, 0, 0, 0x01, 0x02] }),
			new SimulatedGear({ randomAddresses: [0x200000], shortAddress: 5, unreadable: true }),
		])
		await sim.open()
		dispatcher = new DaliDispatcher(sim, FAST_TIMING)
		dispatcher.start()
	})

	afterEach(async () => {
		await dispatcher.stop()
	})

	it('selects the bank and location through DTR1 and DTR0', async () => {
		await expect(readMemory(dispatcher, 2, 0, 0x03, 6)).resolves.toEqual([0x00, 0x01, 0x23, 0x45, 0x67, 0x89])

		expect(sim.writes.slice(0, 3).map(write => write.frame)).toEqual([[0xc3, 0x00], [0xa3, 0x03], [0x05, 0xc5]])
		expect(sim.writes).toHaveLength(8)
	})

	it('resolves the identity of addressed gear', async () => {
		const identity = await resolveIdentity(dispatcher, 2)

		expect(uniqueIdFor(identity.gtin, identity.serialNumber, identity.endpointIndex)).toBe('4886718345-0000000000000102-0')
	})

	it('fails when the gear does not answer', async () => {
		const failure = resolveIdentity(dispatcher, 5)

		await expect(failure).rejects.toBeInstanceOf(DaliIdentityReadFailedError)
		await expect(failure).rejects.toMatchObject({ shortAddress: 5 })
		const error = await failure.catch((err: unknown) => err)
		expect(error instanceof DaliIdentityReadFailedError && error.cause).toBeInstanceOf(DaliNoResponseError)
	})
})
