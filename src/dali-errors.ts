/**
 * Base exception for DALI bus errors
 */
export class DaliError extends Error {
	constructor(message?: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'DaliError'
	}
}

/**
 * Raised when the adapter is lost or unreachable. Fatal to the bus session.
 */
export class DaliConnectionError extends DaliError {
	constructor(message?: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'DaliConnectionError'
	}
}

/**
 * Raised when a frame of the wrong length is received, usually two devices answering at once
 */
export class DaliMalformedFrameError extends DaliError {
	constructor(message?: string) {
		super(message)
		this.name = 'DaliMalformedFrameError'
	}
}

/**
 * Raised when a query that requires an answer gets none
 */
export class DaliNoResponseError extends DaliError {
	constructor(message?: string) {
		super(message)
		this.name = 'DaliNoResponseError'
	}
}

/**
 * Raised when ordinary traffic is attempted while the bus is being addressed
 */
export class DaliBusBusyError extends DaliError {
	constructor(message = 'The bus is busy addressing gear') {
		super(message)
		this.name = 'DaliBusBusyError'
	}
}

export class DaliAddressSpaceExhaustedError extends DaliError {
	constructor(message = 'All 64 short addresses are in use') {
		super(message)
		this.name = 'DaliAddressSpaceExhaustedError'
	}
}

export class DaliIdentityReadFailedError extends DaliError {
	shortAddress: number

	constructor(shortAddress: number, cause?: Error) {
		super(`Failed to read the identity of gear at short address ${shortAddress}${cause ? `: ${cause.message}` : ''}`, { cause })
		this.name = 'DaliIdentityReadFailedError'
		this.shortAddress = shortAddress
	}
}

export class DaliDeviceNotAddressedError extends DaliError {
	uniqueId: string

	constructor(uniqueId: string) {
		super(`Device ${uniqueId} does not have a known short address`)
		this.name = 'DaliDeviceNotAddressedError'
		this.uniqueId = uniqueId
	}
}

export class DaliScanCancelledError extends DaliError {
	constructor(message = 'Scan cancelled') {
		super(message)
		this.name = 'DaliScanCancelledError'
	}
}

/**
 * Raised when a command is constructed with an out-of-range argument
 */
export class DaliRangeError extends DaliError {
	constructor(message?: string) {
		super(message)
		this.name = 'DaliRangeError'
	}
}
