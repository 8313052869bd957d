export const DaliConst = {
	// Bus timing (ms)
	RESPONSE_TIMEOUT: 100, // Backward frames arrive within ~10ms on the wire; the rest is USB latency
	SETTLE_DELAY: 15,
	REPEAT_DELAY: 15,
	REPEAT_WINDOW: 100, // Both frames of a send-twice command must arrive within this window
	READ_INTERVAL: 50,
	RANDOMISE_DELAY: 100,

	// Listener delivery
	LISTENER_QUEUE_SIZE: 64,

	// Addressing
	MAX_COLLISION_RETRIES: 5,
	SEARCH_ADDRESS_MAX: 0xffffff,

	// DALI limits
	MAX_SHORT_ADDRESS: 64, // 0-63
	MAX_GROUP: 16, // 0-15
	MAX_SCENE: 16, // 0-15
	MAX_LEVEL: 254, // 255 is MASK
	MASK: 0xff,
	YES: 0xff,

	// Memory bank 0
	MEMORY_BANK_0: 0,
	BANK_0_START: 0x02,
	BANK_0_LENGTH: 25, // 0x02-0x1A
} as const
