// src/rako/rako-hub.ts
// Client for the Rako lighting hub's line-based TCP protocol.

import { sendCommand, FADE_VALUE, type CommandName } from './command.js';
import { HubConnection } from './connection.js';
import { ConfigValidationError } from './errors.js';
import { consoleLogger, type HubLogger } from './logger.js';
import type {
	Channel,
	Colour,
	ColourLevel,
	HubInfo,
	Level,
	Room,
	Scene,
} from './model.js';
import { runQuery, runStatusQuery, type QueryName } from './query.js';
import {
	CHANNEL_SCHEMA,
	COLOUR_LEVEL_SCHEMA,
	COLOUR_SCHEMA,
	LEVEL_SCHEMA,
	ROOM_SCHEMA,
	SCENE_SCHEMA,
	type RowSchema,
} from './row-parser.js';

const defaultLogger: HubLogger = consoleLogger('[rako-hub]');

export interface RakoHubOptions {
	host: string;
	/** No default here: the hub's port comes from deployment configuration. */
	port: number;
	/** Sent in the subscribe line, so it must not contain a comma. */
	clientName: string;
	/** Upper bound for waiting on any single response line. */
	readTimeoutMs?: number;
	logger?: HubLogger;
}

export class RakoHub {
	public readonly host: string;
	public readonly port: number;
	public readonly clientName: string;

	private readonly log: HubLogger;
	private readonly connection: HubConnection;

	constructor(options: RakoHubOptions) {
		const host = options.host.trim();
		if (!host) {
			throw new ConfigValidationError('RakoHub: host parameter cannot be empty');
		}

		if (!Number.isInteger(options.port) || options.port < 0 || options.port > 65535) {
			throw new ConfigValidationError('RakoHub: port should be an integer between 0 and 65535');
		}

		const clientName = options.clientName.trim();
		if (!clientName) {
			throw new ConfigValidationError('RakoHub: clientName parameter cannot be empty');
		}

		if (clientName.includes(',')) {
			throw new ConfigValidationError('RakoHub: invalid character \',\' in clientName');
		}

		const { readTimeoutMs } = options;
		if (readTimeoutMs !== undefined && (!Number.isFinite(readTimeoutMs) || readTimeoutMs <= 0)) {
			throw new ConfigValidationError('RakoHub: readTimeoutMs should be a positive number');
		}

		this.host = host;
		this.port = options.port;
		this.clientName = clientName;
		this.log = options.logger ?? defaultLogger;
		this.connection = new HubConnection({
			host,
			port: options.port,
			clientName,
			readTimeoutMs,
			logger: this.log,
		});
	}

	/**
	 * Get room by its id. If roomId is not specified, returns all the rooms.
	 */
	public getRooms(roomId?: number): Promise<Room[]> {
		return this.query('ROOM', ROOM_SCHEMA, roomId);
	}

	/**
	 * Get list of channels in a room. If room is not specified, returns all channels.
	 */
	public getChannels(roomId?: number): Promise<Channel[]> {
		return this.query('CHANNEL', CHANNEL_SCHEMA, roomId);
	}

	/**
	 * Brightness levels per channel, for one room or all of them.
	 */
	public getLevels(roomId?: number): Promise<Level[]> {
		return this.query('LEVEL', LEVEL_SCHEMA, roomId);
	}

	public getScenes(roomId?: number): Promise<Scene[]> {
		return this.query('SCENE', SCENE_SCHEMA, roomId);
	}

	/**
	 * Colour-capable channels (RGB or colour temperature).
	 */
	public getColours(roomId?: number): Promise<Colour[]> {
		return this.query('COLOR', COLOUR_SCHEMA, roomId);
	}

	public getColoursLevels(roomId?: number): Promise<ColourLevel[]> {
		return this.query('COLOR_LEVEL', COLOUR_LEVEL_SCHEMA, roomId);
	}

	public getHubInfo(): Promise<HubInfo> {
		return this.connection.request((io) => runStatusQuery(io));
	}

	public setLevel(roomId: number, channelId: number, level: number): Promise<void> {
		return this.send('LEVEL', roomId, channelId, [level]);
	}

	public setRgb(
		roomId: number,
		channelId: number,
		red: number,
		green: number,
		blue: number,
	): Promise<void> {
		return this.send('RGB', roomId, channelId, [red, green, blue]);
	}

	/**
	 * Select a stored scene for a given room and channel.
	 */
	public setScene(roomId: number, channelId: number, scene: number): Promise<void> {
		return this.send('SCENE', roomId, channelId, [scene]);
	}

	public setKelvin(roomId: number, channelId: number, temperature: number): Promise<void> {
		return this.send('KELVIN', roomId, channelId, [temperature]);
	}

	public startFadingDown(roomId: number, channelId: number): Promise<void> {
		return this.send('FADE_DOWN', roomId, channelId, [FADE_VALUE]);
	}

	public startFadingUp(roomId: number, channelId: number): Promise<void> {
		return this.send('FADE_UP', roomId, channelId, [FADE_VALUE]);
	}

	public stopFading(roomId: number, channelId: number): Promise<void> {
		return this.send('FADE_STOP', roomId, channelId, [FADE_VALUE]);
	}

	/**
	 * Store the current levels as a scene for a given room and channel.
	 */
	public storeScene(roomId: number, channelId: number, scene: number): Promise<void> {
		return this.send('STORE', roomId, channelId, [scene]);
	}

	/**
	 * Release the socket. A later call reconnects on demand.
	 */
	public close(): void {
		this.connection.close();
	}

	private query<T>(name: QueryName, schema: RowSchema<T>, roomId?: number): Promise<T[]> {
		return this.connection.request(async (io) => {
			const rows = await runQuery(io, name, schema, roomId);
			this.log.debug(
				'RakoHub: QUERY %s%s returned %d row(s)',
				name,
				roomId === undefined ? '' : ` room=${roomId}`,
				rows.length,
			);
			return rows;
		});
	}

	private send(
		command: CommandName,
		roomId: number,
		channelId: number,
		values: readonly number[],
	): Promise<void> {
		return this.connection.request((io) => sendCommand(io, command, roomId, channelId, values));
	}
}
