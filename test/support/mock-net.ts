// In-process stand-in for node:net, wired in with vi.mock('node:net').
import { EventEmitter } from 'node:events';

/** Reply lines (without CRLF) for one request line, or undefined for silence. */
export type Responder = (line: string, socket: MockSocket) => string[] | undefined;

export class MockSocket extends EventEmitter {
	public readonly writes: string[] = [];
	public destroyed = false;
	public writable = true;

	public constructor(private readonly responder: () => Responder) {
		super();
	}

	public setEncoding(): this {
		return this;
	}

	public write(data: string, cb?: (err?: Error | null) => void): boolean {
		if (this.destroyed) {
			setImmediate(() => cb?.(new Error('This socket has been ended by the other party')));
			return false;
		}

		this.writes.push(data);
		const replies = this.responder()(data.replace(/\r\n$/, ''), this);

		setImmediate(() => {
			cb?.(null);
			if (replies && replies.length > 0) {
				this.reply(...replies);
			}
		});
		return true;
	}

	public reply(...lines: string[]): void {
		this.emit('data', lines.map((line) => `${line}\r\n`).join(''));
	}

	public destroy(): this {
		if (!this.destroyed) {
			this.destroyed = true;
			this.writable = false;
			setImmediate(() => this.emit('close', false));
		}
		return this;
	}
}

const silent: Responder = () => undefined;

interface MockNetState {
	sockets: MockSocket[];
	connectOptions: Array<{ host: string; port: number }>;
	responder: Responder;
	/** When set, the next connection attempt fails with this error. */
	connectError: Error | null;
	reset(): void;
}

export const mockNet: MockNetState = {
	sockets: [],
	connectOptions: [],
	responder: silent,
	connectError: null,

	reset(): void {
		this.sockets.length = 0;
		this.connectOptions.length = 0;
		this.responder = silent;
		this.connectError = null;
	},
};

export function createConnection(options: { host: string; port: number }): MockSocket {
	const socket = new MockSocket(() => mockNet.responder);
	mockNet.sockets.push(socket);
	mockNet.connectOptions.push({ host: options.host, port: options.port });

	const failure = mockNet.connectError;
	setImmediate(() => {
		if (failure) {
			socket.emit('error', failure);
		} else {
			socket.emit('connect');
		}
	});
	return socket;
}

/**
 * Responder that acknowledges SUB and answers requests from a fixed table.
 */
export function hubResponder(table: Record<string, string[]>): Responder {
	return (line) => {
		if (line.startsWith('SUB,')) {
			return ['SUB_OK'];
		}
		return table[line];
	};
}
