// src/rako/row-parser.ts
// Maps one comma-separated response line onto a typed record.
//
// Values stay textual. Ids, levels and colour components are numeric on the
// hub, but this layer does not coerce them: callers decide how to read them.

import { HubProtocolError } from './errors.js';
import type {
	Channel,
	Colour,
	ColourLevel,
	HubInfo,
	Level,
	Room,
	Scene,
} from './model.js';

/** Reads a field by position; the last field of the row comes back right-trimmed. */
export type FieldReader = (index: number) => string;

export interface RowSchema<T> {
	readonly entity: string;
	/** Minimum number of comma-separated fields, row tag included. */
	readonly width: number;
	readonly create: (field: FieldReader) => T;
}

export const SCENE_COUNT = 16;
const FIRST_SCENE_FIELD = 8;

export const HUB_INFO_SCHEMA: RowSchema<HubInfo> = {
	entity: 'HubInfo',
	width: 6,
	create: (field) => ({
		protocolVersion: field(2),
		hubId: field(3),
		macAddress: field(4),
		hubVersion: field(5),
	}),
};

export const ROOM_SCHEMA: RowSchema<Room> = {
	entity: 'Room',
	width: 5,
	create: (field) => ({
		roomId: field(1),
		roomTitle: field(2),
		roomType: field(3),
		roomMode: field(4),
	}),
};

export const CHANNEL_SCHEMA: RowSchema<Channel> = {
	entity: 'Channel',
	width: FIRST_SCENE_FIELD + SCENE_COUNT,
	create: (field) => {
		const scenesLevel = new Map<number, string>();
		for (let scene = 1; scene <= SCENE_COUNT; scene++) {
			scenesLevel.set(scene, field(FIRST_SCENE_FIELD + scene - 1));
		}

		return {
			roomId: field(1),
			roomTitle: field(2),
			roomType: field(3),
			roomMode: field(4),
			channelId: field(5),
			channelTitle: field(6),
			channelType: field(7),
			scenesLevel,
		};
	},
};

export const LEVEL_SCHEMA: RowSchema<Level> = {
	entity: 'Level',
	width: 6,
	create: (field) => ({
		roomId: field(1),
		channelId: field(2),
		currentScene: field(3),
		currentLevel: field(4),
		targetLevel: field(5),
	}),
};

export const SCENE_SCHEMA: RowSchema<Scene> = {
	entity: 'Scene',
	width: 4,
	create: (field) => ({
		roomId: field(1),
		sceneId: field(2),
		sceneTitle: field(3),
	}),
};

export const COLOUR_SCHEMA: RowSchema<Colour> = {
	entity: 'Colour',
	width: 6,
	create: (field) => ({
		roomId: field(1),
		roomTitle: field(2),
		channelId: field(3),
		channelTitle: field(4),
		type: field(5),
	}),
};

// The hub sends seven columns; field 4 doubles as the level and the red or kelvin value.
export const COLOUR_LEVEL_SCHEMA: RowSchema<ColourLevel> = {
	entity: 'ColourLevel',
	width: 7,
	create: (field) => ({
		roomId: field(1),
		channelId: field(2),
		type: field(3),
		level: field(4),
		redOrKelvin: field(4),
		green: field(5),
		blue: field(6),
	}),
};

export function splitFields(line: string): string[] {
	return line.split(',');
}

/**
 * The row tag (field 0) with surrounding whitespace and the line terminator removed.
 */
export function rowTag(line: string): string {
	return splitFields(line)[0].trim();
}

export function parseRow<T>(schema: RowSchema<T>, line: string): T {
	const fields = splitFields(line);
	if (fields.length < schema.width) {
		throw new HubProtocolError(
			`Malformed ${schema.entity} row: expected ${schema.width} fields, got ${fields.length} (${JSON.stringify(line.trimEnd())})`,
		);
	}

	const last = schema.width - 1;
	return schema.create((index) => (index === last ? fields[index].trimEnd() : fields[index]));
}
