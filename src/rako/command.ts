// src/rako/command.ts

import type { HubLineIO } from './connection.js';
import { SendCommandError } from './errors.js';
import { rowTag } from './row-parser.js';

export type CommandName =
	| 'LEVEL'
	| 'RGB'
	| 'SCENE'
	| 'KELVIN'
	| 'FADE_DOWN'
	| 'FADE_UP'
	| 'FADE_STOP'
	| 'STORE';

export const COMMAND_ERROR = 'AERROR';

/** Value sent with the fade commands, which take no real argument. */
export const FADE_VALUE = 1;

/**
 * Values are written back to back with no separator: RGB 10/20/30 goes out as `102030`.
 */
export function buildSendRequest(
	command: CommandName,
	roomId: number,
	channelId: number,
	values: readonly number[],
): string {
	return `SEND,${roomId},${channelId},${command},${values.map(String).join('')}`;
}

/**
 * Send one control command and check the single reply line.
 * Only an AERROR reply counts as failure; the rest of the reply is not interpreted.
 */
export async function sendCommand(
	io: HubLineIO,
	command: CommandName,
	roomId: number,
	channelId: number,
	values: readonly number[],
): Promise<void> {
	await io.writeLine(buildSendRequest(command, roomId, channelId, values));

	const reply = await io.readLine();
	if (rowTag(reply) === COMMAND_ERROR) {
		throw new SendCommandError(command, roomId, channelId);
	}
}
