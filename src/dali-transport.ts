export type DaliTransportState = 'closed' | 'open' | 'lost'

/** Describes an attached adapter without opening it */
export interface DaliTransportDescriptor {
	path: string
	vendorId: number
	productId: number
	serialNumber?: string
	product?: string
}

/**
 * Something read from the adapter.
 * - `answer`: a 1 byte backward frame answering the last frame we wrote, or 0 bytes when the
 *   answer was corrupted on the wire. Adapters that can't tell whose command a backward frame
 *   answers report every backward frame this way.
 * - `no-answer`: the adapter knows the last frame we wrote went unanswered
 * - `bus`: traffic that is not an answer to us, such as another controller's 2 or 3 byte forward
 *   frame or the backward frame answering it
 */
export type DaliReceived =
	| { kind: 'answer', frame: Buffer }
	| { kind: 'no-answer' }
	| { kind: 'bus', frame: Buffer }

/**
 * A duplex byte channel to one bus adapter. It knows nothing about DALI beyond passing
 * frames through; failures are raised as `DaliConnectionError` and never retried here.
 *
 * Written buffers are forward frames (2 or 3 bytes), most significant byte first.
 */
export interface DaliTransport {
	readonly state: DaliTransportState
	readonly descriptor?: DaliTransportDescriptor

	open(): Promise<void>
	write(frame: Buffer): Promise<void>
	/** Resolves the next thing received, or `null` if nothing arrived within `timeout` ms */
	read(timeout: number): Promise<DaliReceived | null>
	close(): Promise<void>
}
