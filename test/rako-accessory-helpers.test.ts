import { describe, expect, it } from 'vitest';

import { DEFAULT_CLIENT_NAME, resolvePlatformSettings } from '../src/platform.js';
import {
	brightnessToLevel,
	channelKey,
	hsvToRgb,
	kelvinToMired,
	levelToBrightness,
	miredToKelvin,
	parseHubNumber,
	resolveColourMode,
	rgbToHsv,
} from '../src/rako/rako-accessory-helpers.js';

describe('level conversions', () => {
	it('maps hub levels 0–255 onto percent and back', () => {
		expect(levelToBrightness(0)).toBe(0);
		expect(levelToBrightness(128)).toBe(50);
		expect(levelToBrightness(255)).toBe(100);
		expect(brightnessToLevel(50)).toBe(128);
		expect(brightnessToLevel(100)).toBe(255);
	});

	it('clamps out-of-range values', () => {
		expect(levelToBrightness(300)).toBe(100);
		expect(brightnessToLevel(-10)).toBe(0);
	});
});

describe('colour conversions', () => {
	it('converts primary hues to RGB', () => {
		expect(hsvToRgb(0, 100, 100)).toEqual({ r: 255, g: 0, b: 0 });
		expect(hsvToRgb(120, 100, 100)).toEqual({ r: 0, g: 255, b: 0 });
		expect(hsvToRgb(200, 0, 100)).toEqual({ r: 255, g: 255, b: 255 });
	});

	it('converts RGB back to hue and saturation', () => {
		expect(rgbToHsv(0, 0, 255)).toEqual({ h: 240, s: 100, v: 100 });
	});

	it('converts between mired and kelvin', () => {
		expect(miredToKelvin(370)).toBe(2703);
		expect(kelvinToMired(2700)).toBe(370);
	});
});

describe('hub field helpers', () => {
	it('parses numeric text fields', () => {
		expect(parseHubNumber(' 128\r\n')).toBe(128);
		expect(parseHubNumber('')).toBeUndefined();
		expect(parseHubNumber('dim')).toBeUndefined();
	});

	it('classifies colour channel types', () => {
		expect(resolveColourMode('rgb ')).toBe('rgb');
		expect(resolveColourMode('KELVIN')).toBe('kelvin');
	});

	it('keys channels by room and channel id', () => {
		expect(channelKey('1', 3)).toBe('1:3');
	});
});

describe('resolvePlatformSettings', () => {
	it('reads host, port and defaults from the platform block', () => {
		expect(resolvePlatformSettings({ host: 'hub.local', port: '9761' })).toEqual({
			host: 'hub.local',
			port: 9761,
			clientName: DEFAULT_CLIENT_NAME,
			readTimeoutMs: undefined,
			pollIntervalSeconds: 30,
		});
	});

	it('keeps an explicit zero poll interval and ignores a negative one', () => {
		expect(resolvePlatformSettings({ pollIntervalSeconds: 0 }).pollIntervalSeconds).toBe(0);
		expect(resolvePlatformSettings({ pollIntervalSeconds: -5 }).pollIntervalSeconds).toBe(30);
	});

	it('leaves a missing port invalid for RakoHub to reject', () => {
		const settings = resolvePlatformSettings({ host: 'hub.local', clientName: 'lounge-bridge' });
		expect(Number.isNaN(settings.port)).toBe(true);
		expect(settings.clientName).toBe('lounge-bridge');
	});
});
