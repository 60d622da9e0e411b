// src/rako/errors.ts

/**
 * Thrown synchronously by the RakoHub constructor when host, port or
 * client name fail validation. Never raised during I/O.
 */
export class ConfigValidationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigValidationError';
	}
}

/**
 * The hub answered a SEND request with AERROR.
 */
export class SendCommandError extends Error {
	public readonly command: string;
	public readonly roomId: number;
	public readonly channelId: number;

	constructor(command: string, roomId: number, channelId: number) {
		super(`Failed to send ${command} command to room ${roomId} and channel ${channelId}`);
		this.name = 'SendCommandError';
		this.command = command;
		this.roomId = roomId;
		this.channelId = channelId;
	}
}

// A response row that does not fit its entity schema.
export class HubProtocolError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'HubProtocolError';
	}
}

/**
 * The socket closed, errored or ended while a request was in flight.
 */
export class HubConnectionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'HubConnectionError';
	}
}

export class HubTimeoutError extends HubConnectionError {
	public readonly timeoutMs: number;

	constructor(timeoutMs: number) {
		super(`No response from hub within ${timeoutMs}ms`);
		this.name = 'HubTimeoutError';
		this.timeoutMs = timeoutMs;
	}
}
