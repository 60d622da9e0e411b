// src/rako/rako-accessory-helpers.ts
import type {
	API,
	Logger,
	PlatformAccessory,
} from 'homebridge';

import type { Channel, HubInfo } from './model.js';
import type { RakoHub } from './rako-hub.js';

/** Hub levels run 0–255; HomeKit brightness is a percentage. */
export const MAX_HUB_LEVEL = 255;

export type ColourMode = 'rgb' | 'kelvin';

// Context stored on the accessory
export interface RakoAccessoryContext {
  rako?: {
    roomId: number;
    channelId: number;
    roomTitle: string;
    channelTitle: string;

    colourMode?: ColourMode;

    on?: boolean;
    level?: number;      // last non-zero hub level, restored on power-on
    brightness?: number; // 0–100

    hue?: number;          // 0–360
    saturation?: number;   // 0–100
    colorTemperature?: number; // mireds
  };
  [key: string]: unknown;
}

export type RakoAccessory = PlatformAccessory<RakoAccessoryContext>;

// Minimal runtime “env” that accessory modules need from the platform
export interface RakoAccessoryEnv {
  log: Logger;
  api: API;
  hub: RakoHub;
  hubInfo?: HubInfo;
}

function clampNumber(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Numeric value of a text field from the hub, or undefined when it is not a number.
 */
export function parseHubNumber(value: string): number | undefined {
	const trimmed = value.trim();
	if (trimmed === '') {
		return undefined;
	}
	const parsed = Number(trimmed);
	return Number.isFinite(parsed) ? parsed : undefined;
}

export function channelKey(roomId: number | string, channelId: number | string): string {
	return `${roomId}:${channelId}`;
}

/**
 * The hub labels colour channels by type; anything that is not RGB is treated
 * as tunable white.
 */
export function resolveColourMode(type: string): ColourMode {
	return type.trim().toUpperCase() === 'RGB' ? 'rgb' : 'kelvin';
}

export function levelToBrightness(level: number): number {
	return Math.round((clampNumber(level, 0, MAX_HUB_LEVEL) * 100) / MAX_HUB_LEVEL);
}

export function brightnessToLevel(brightness: number): number {
	return Math.round((clampNumber(brightness, 0, 100) * MAX_HUB_LEVEL) / 100);
}

/**
 * HSV (HomeKit style) → RGB helper used by RGB channels.
 */
export function hsvToRgb(hue: number, saturation: number, value: number): { r: number; g: number; b: number } {
	const h = ((hue % 360) + 360) % 360;
	const s = clampNumber(saturation, 0, 100) / 100;
	const v = clampNumber(value, 0, 100) / 100;

	if (s === 0) {
		const grey = Math.round(v * 255);
		return { r: grey, g: grey, b: grey };
	}

	const sector = h / 60;
	const i = Math.floor(sector);
	const f = sector - i;

	const p = v * (1 - s);
	const q = v * (1 - s * f);
	const t = v * (1 - s * (1 - f));

	let r = 0;
	let g = 0;
	let b = 0;

	switch (i) {
	case 0:
		r = v;
		g = t;
		b = p;
		break;
	case 1:
		r = q;
		g = v;
		b = p;
		break;
	case 2:
		r = p;
		g = v;
		b = t;
		break;
	case 3:
		r = p;
		g = q;
		b = v;
		break;
	case 4:
		r = t;
		g = p;
		b = v;
		break;
	default:
		r = v;
		g = p;
		b = q;
		break;
	}

	return {
		r: Math.round(r * 255),
		g: Math.round(g * 255),
		b: Math.round(b * 255),
	};
}

/**
 * RGB→HSV, for pushing polled colour levels back into Hue/Saturation.
 */
export function rgbToHsv(r: number, g: number, b: number): { h: number; s: number; v: number } {
	const rn = clampNumber(r, 0, 255) / 255;
	const gn = clampNumber(g, 0, 255) / 255;
	const bn = clampNumber(b, 0, 255) / 255;

	const max = Math.max(rn, gn, bn);
	const min = Math.min(rn, gn, bn);
	const delta = max - min;

	let h = 0;
	if (delta !== 0) {
		if (max === rn) {
			h = ((gn - bn) / delta) % 6;
		} else if (max === gn) {
			h = (bn - rn) / delta + 2;
		} else {
			h = (rn - gn) / delta + 4;
		}
		h *= 60;
		if (h < 0) {
			h += 360;
		}
	}

	const s = max === 0 ? 0 : (delta / max) * 100;
	const v = max * 100;

	return {
		h: clampNumber(h, 0, 360),
		s: clampNumber(s, 0, 100),
		v: clampNumber(v, 0, 100),
	};
}

export function miredToKelvin(mired: number): number {
	return Math.round(1_000_000 / clampNumber(mired, 1, 1_000_000));
}

export function kelvinToMired(kelvin: number): number {
	return Math.round(1_000_000 / clampNumber(kelvin, 1, 1_000_000));
}

/**
 * Populate the standard Accessory Information service from the channel row.
 */
export function applyAccessoryInformationFromChannel(
	api: API,
	accessory: RakoAccessory,
	channel: Channel,
	displayName: string,
	hubInfo?: HubInfo,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;

	infoService.updateCharacteristic(Characteristic.Name, displayName);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'Rako Controls');

	const channelType = channel.channelType.trim();
	infoService.updateCharacteristic(
		Characteristic.Model,
		channelType.length > 0 ? `Rako ${channelType} channel` : 'Rako channel',
	);

	const serialBase = hubInfo?.hubId.trim() || 'rako';
	infoService.updateCharacteristic(
		Characteristic.SerialNumber,
		`${serialBase}-${channel.roomId}-${channel.channelId}`,
	);

	const revision = hubInfo?.hubVersion.trim();
	if (revision) {
		infoService.updateCharacteristic(Characteristic.FirmwareRevision, revision);
	}
}
