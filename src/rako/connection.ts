// src/rako/connection.ts

import { createConnection, type Socket } from 'node:net';

import {
	HubConnectionError,
	HubTimeoutError,
	SendCommandError,
} from './errors.js';
import { consoleLogger, type HubLogger } from './logger.js';

const defaultLogger: HubLogger = consoleLogger('[rako-connection]');

export const DEFAULT_READ_TIMEOUT_MS = 10_000;

/**
 * Line-level access to the hub for the duration of one request.
 * Only handed out while the caller holds the connection.
 */
export interface HubLineIO {
	/** Write one request line; the CRLF terminator is appended here. */
	writeLine(line: string): Promise<void>;
	/** Next response line, terminator included. */
	readLine(): Promise<string>;
}

export interface HubConnectionOptions {
	host: string;
	port: number;
	clientName: string;
	readTimeoutMs?: number;
	logger?: HubLogger;
}

type ConnectedState = {
	status: 'connected';
	socket: Socket;
	reader: LineReader;
};

type ConnectionState = { status: 'disconnected' } | ConnectedState;

type Waiter = {
	resolve: (line: string) => void;
	reject: (err: Error) => void;
};

/**
 * Splits the socket's text stream into LF-terminated lines and hands them
 * out one at a time. Once the stream fails, queued lines are still
 * delivered before the failure is reported.
 */
class LineReader {
	private buffer = '';
	private readonly lines: string[] = [];
	private waiter: Waiter | null = null;
	private failure: Error | null = null;

	public push(chunk: string): void {
		this.buffer += chunk;

		let end = this.buffer.indexOf('\n');
		while (end !== -1) {
			this.lines.push(this.buffer.slice(0, end + 1));
			this.buffer = this.buffer.slice(end + 1);
			end = this.buffer.indexOf('\n');
		}

		this.settle();
	}

	public fail(err: Error): void {
		this.failure = this.failure ?? err;
		this.settle();
	}

	public next(timeoutMs: number): Promise<string> {
		const queued = this.lines.shift();
		if (queued !== undefined) {
			return Promise.resolve(queued);
		}
		if (this.failure) {
			return Promise.reject(this.failure);
		}

		return new Promise<string>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.waiter = null;
				reject(new HubTimeoutError(timeoutMs));
			}, timeoutMs);

			this.waiter = {
				resolve: (line) => {
					clearTimeout(timer);
					resolve(line);
				},
				reject: (err) => {
					clearTimeout(timer);
					reject(err);
				},
			};
		});
	}

	private settle(): void {
		const waiter = this.waiter;
		if (!waiter) {
			return;
		}

		const line = this.lines.shift();
		if (line !== undefined) {
			this.waiter = null;
			waiter.resolve(line);
		} else if (this.failure) {
			this.waiter = null;
			waiter.reject(this.failure);
		}
	}
}

function isAlive(socket: Socket): boolean {
	return !socket.destroyed && socket.writable;
}

/**
 * Owns the TCP socket to the hub.
 *
 * Nothing is opened at construction. Each request first makes sure a live,
 * subscribed socket exists, then runs with exclusive use of it: requests
 * are queued so that one response is read completely before the next
 * request line is written.
 */
export class HubConnection {
	private readonly host: string;
	private readonly port: number;
	private readonly clientName: string;
	private readonly readTimeoutMs: number;
	private readonly log: HubLogger;

	private state: ConnectionState = { status: 'disconnected' };
	private queue: Promise<void> = Promise.resolve();
	// Bumped by close(); exchanges started before it are never replayed.
	private closeGeneration = 0;

	constructor(options: HubConnectionOptions) {
		this.host = options.host;
		this.port = options.port;
		this.clientName = options.clientName;
		this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
		this.log = options.logger ?? defaultLogger;
	}

	public get isConnected(): boolean {
		return this.state.status === 'connected' && isAlive(this.state.socket);
	}

	/**
	 * Run one request/response exchange with exclusive use of the socket.
	 *
	 * If a reused socket turns out to be dead (closed or failing writes
	 * before any response line arrived), the socket is reopened and the
	 * exchange replayed once.
	 */
	public request<T>(exchange: (io: HubLineIO) => Promise<T>): Promise<T> {
		return this.serialize(() => this.runExchange(exchange));
	}

	public close(): void {
		this.closeGeneration++;
		if (this.state.status === 'connected') {
			this.log.info('[Rako TCP] Closing connection to %s:%d', this.host, this.port);
		}
		this.dropConnection();
	}

	private serialize<T>(task: () => Promise<T>): Promise<T> {
		const run = this.queue.then(task);
		this.queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async runExchange<T>(exchange: (io: HubLineIO) => Promise<T>): Promise<T> {
		const generation = this.closeGeneration;
		const reused = this.isConnected;
		const connected = await this.ensureConnected();

		let linesRead = 0;
		const io = this.createLineIO(connected, () => {
			linesRead++;
		});

		try {
			return await exchange(io);
		} catch (err) {
			// A rejected command leaves the stream in sync; anything else may not.
			if (err instanceof SendCommandError) {
				throw err;
			}
			this.dropConnection();

			if (
				!(err instanceof HubConnectionError) ||
				err instanceof HubTimeoutError ||
				!reused ||
				linesRead > 0 ||
				generation !== this.closeGeneration
			) {
				throw err;
			}

			this.log.warn(
				'[Rako TCP] Connection to %s:%d went stale (%s); reconnecting and retrying once.',
				this.host,
				this.port,
				err.message,
			);
			return this.replayExchange(exchange);
		}
	}

	private async replayExchange<T>(exchange: (io: HubLineIO) => Promise<T>): Promise<T> {
		const fresh = await this.ensureConnected();
		try {
			return await exchange(this.createLineIO(fresh, () => undefined));
		} catch (err) {
			if (!(err instanceof SendCommandError)) {
				this.dropConnection();
			}
			throw err;
		}
	}

	private createLineIO(connected: ConnectedState, onLine: () => void): HubLineIO {
		return {
			writeLine: (line) => this.writeLine(connected.socket, line),
			readLine: async () => {
				const line = await connected.reader.next(this.readTimeoutMs);
				onLine();
				this.log.debug('[Rako TCP] <- %s', line.trimEnd());
				return line;
			},
		};
	}

	/**
	 * Open and subscribe a socket unless a live one already exists.
	 */
	private async ensureConnected(): Promise<ConnectedState> {
		const generation = this.closeGeneration;
		if (this.state.status === 'connected') {
			if (isAlive(this.state.socket)) {
				return this.state;
			}
			this.dropConnection();
		}

		this.log.info('[Rako TCP] Connecting to %s:%d…', this.host, this.port);

		let socket: Socket;
		try {
			socket = await this.openSocket();
		} catch (err) {
			this.log.error(
				'[Rako TCP] Failed to connect to %s:%d: %s',
				this.host,
				this.port,
				String(err),
			);
			throw err;
		}

		const reader = new LineReader();
		this.attachSocketListeners(socket, reader);
		const connected: ConnectedState = { status: 'connected', socket, reader };

		try {
			await this.writeLine(socket, `SUB,BASIC,V4,${this.clientName}`);
			await reader.next(this.readTimeoutMs);
		} catch (err) {
			socket.destroy();
			throw err;
		}

		if (generation !== this.closeGeneration) {
			socket.destroy();
			throw new HubConnectionError('Connection closed while subscribing');
		}

		this.log.info('[Rako TCP] Subscribed to %s:%d as %s', this.host, this.port, this.clientName);
		this.state = connected;
		return connected;
	}

	private openSocket(): Promise<Socket> {
		return new Promise((resolve, reject) => {
			const socket = createConnection({ host: this.host, port: this.port });
			const onError = (err: Error) => {
				socket.destroy();
				reject(err);
			};
			socket.once('error', onError);
			socket.once('connect', () => {
				socket.off('error', onError);
				resolve(socket);
			});
		});
	}

	private attachSocketListeners(socket: Socket, reader: LineReader): void {
		socket.setEncoding('utf8');

		socket.on('data', (chunk: string | Buffer) => {
			reader.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
		});

		socket.on('end', () => {
			reader.fail(new HubConnectionError('Hub ended the connection'));
		});

		socket.on('error', (err) => {
			this.log.error('[Rako TCP] Socket error: %s', String(err));
			reader.fail(new HubConnectionError(`Socket error: ${err.message}`, { cause: err }));
		});

		socket.on('close', () => {
			reader.fail(new HubConnectionError('Connection to hub closed'));
			if (this.state.status === 'connected' && this.state.socket === socket) {
				this.log.warn('[Rako TCP] Socket closed.');
				this.state = { status: 'disconnected' };
			}
		});
	}

	private writeLine(socket: Socket, line: string): Promise<void> {
		this.log.debug('[Rako TCP] -> %s', line);
		return new Promise((resolve, reject) => {
			socket.write(`${line}\r\n`, (err) => {
				if (err) {
					reject(new HubConnectionError(`Write to hub failed: ${err.message}`, { cause: err }));
					return;
				}
				resolve();
			});
		});
	}

	private dropConnection(): void {
		if (this.state.status === 'connected') {
			const { socket } = this.state;
			this.state = { status: 'disconnected' };
			socket.destroy();
		}
	}
}
