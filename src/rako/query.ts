// src/rako/query.ts

import type { HubLineIO } from './connection.js';
import type { HubInfo } from './model.js';
import { HUB_INFO_SCHEMA, parseRow, rowTag, type RowSchema } from './row-parser.js';

export type QueryName = 'CHANNEL' | 'COLOR' | 'COLOR_LEVEL' | 'LEVEL' | 'ROOM' | 'SCENE';

export const QUERY_HEADER = 'QUERY_HEADER';
export const QUERY_COMPLETE = 'QUERY_COMPLETE';

export function buildQueryRequest(name: QueryName, roomId?: number): string {
	return roomId === undefined ? `QUERY,${name}` : `QUERY,${name},${roomId}`;
}

/**
 * Send a QUERY request and collect its rows until QUERY_COMPLETE.
 *
 * Header lines are skipped. Rows come back in the order the hub sent them.
 */
export async function runQuery<T>(
	io: HubLineIO,
	name: QueryName,
	schema: RowSchema<T>,
	roomId?: number,
): Promise<T[]> {
	await io.writeLine(buildQueryRequest(name, roomId));

	const rows: T[] = [];
	for (;;) {
		const line = await io.readLine();
		const tag = rowTag(line);

		if (tag === QUERY_HEADER) {
			continue;
		}
		if (tag === QUERY_COMPLETE) {
			return rows;
		}
		rows.push(parseRow(schema, line));
	}
}

// STATUS has no header/complete framing: exactly one reply line.
export async function runStatusQuery(io: HubLineIO): Promise<HubInfo> {
	await io.writeLine('STATUS,0');
	return parseRow(HUB_INFO_SCHEMA, await io.readLine());
}
