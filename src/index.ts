export { DaliAddress, DaliAddressType } from './dali-address.js'
export { DaliScanner } from './dali-addressing.js'
export type { DaliScanOptions, DaliScanResult, DaliScannerOptions } from './dali-addressing.js'
export { arcLevelToPercentage, percentageToArcLevel } from './dali-arc-levels.js'
export { DaliBus, withBus } from './dali-bus.js'
export type { DaliBusOptions } from './dali-bus.js'
export {
	DEVICE_COMMANDS, GEAR_COMMANDS, SPECIAL_COMMANDS,
	arcPower, describeCommand, deviceCommand, gearCommand, specialCommand,
} from './dali-commands.js'
export type {
	DaliAnswer, DaliArcPowerCommand, DaliCommand, DaliDeviceCommand, DaliDeviceCommandName,
	DaliGearCommand, DaliGearCommandName, DaliSpecialCommand, DaliSpecialCommandName,
} from './dali-commands.js'
export { DaliConst } from './dali-const.js'
export { DaliDevice, DaliGearType, uniqueIdFor } from './dali-device.js'
export type { DaliIdentity } from './dali-device.js'
export { DaliDispatcher, DaliExclusiveLease } from './dali-dispatcher.js'
export type { DaliDispatcherOptions } from './dali-dispatcher.js'
export {
	DaliAddressSpaceExhaustedError, DaliBusBusyError, DaliConnectionError, DaliDeviceNotAddressedError,
	DaliError, DaliIdentityReadFailedError, DaliMalformedFrameError, DaliNoResponseError,
	DaliRangeError, DaliScanCancelledError,
} from './dali-errors.js'
export type { DaliBusEvent, DaliMessageCallback } from './dali-events.js'
export { decodeBackward, decodeForward, decodeFrame, encodeCommand, frameToHex } from './dali-frame.js'
export type { DaliBackwardValue, DaliFrame } from './dali-frame.js'
export { DaliGear, DaliGroup, decodeStatus } from './dali-gear.js'
export type { DaliFade, DaliGearStatus } from './dali-gear.js'
export { parseMemoryBank0, readMemory, resolveIdentity } from './dali-identity.js'
export { DaliRegistry } from './dali-registry.js'
export type { DaliReceived, DaliTransport, DaliTransportDescriptor, DaliTransportState } from './dali-transport.js'
export { TRIDONIC_PRODUCT_ID, TRIDONIC_VENDOR_ID, TridonicTransport, discoverTransceivers } from './tridonic-transport.js'
