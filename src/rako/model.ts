// src/rako/model.ts
// Records produced by the row parser. Every value is kept as the text the hub
// sent; callers convert ids and levels to numbers where they need them.

export interface HubInfo {
	readonly protocolVersion: string;
	readonly hubId: string;
	readonly macAddress: string;
	readonly hubVersion: string;
}

export interface Room {
	readonly roomId: string;
	readonly roomTitle: string;
	readonly roomType: string;
	readonly roomMode: string;
}

export interface Channel {
	readonly roomId: string;
	readonly roomTitle: string;
	readonly roomType: string;
	readonly roomMode: string;
	readonly channelId: string;
	readonly channelTitle: string;
	readonly channelType: string;
	/** Stored level per scene, keyed 1..16 in scene order. */
	readonly scenesLevel: ReadonlyMap<number, string>;
}

export interface Level {
	readonly roomId: string;
	readonly channelId: string;
	readonly currentScene: string;
	readonly currentLevel: string;
	readonly targetLevel: string;
}

export interface Scene {
	readonly roomId: string;
	readonly sceneId: string;
	readonly sceneTitle: string;
}

export interface Colour {
	readonly roomId: string;
	readonly roomTitle: string;
	readonly channelId: string;
	readonly channelTitle: string;
	/** RGB or colour-temperature channel, as reported by the hub. */
	readonly type: string;
}

export interface ColourLevel {
	readonly roomId: string;
	readonly channelId: string;
	readonly type: string;
	readonly level: string;
	/** Red component on RGB channels, kelvin on colour-temperature channels. */
	readonly redOrKelvin: string;
	readonly green: string;
	readonly blue: string;
}
