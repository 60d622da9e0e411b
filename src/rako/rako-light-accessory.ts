// src/rako/rako-light-accessory.ts
import type { CharacteristicValue } from 'homebridge';

import type { Channel, ColourLevel, Level } from './model.js';
import type { ColourMode, RakoAccessory, RakoAccessoryEnv } from './rako-accessory-helpers.js';
import {
	applyAccessoryInformationFromChannel,
	brightnessToLevel,
	describeError,
	hsvToRgb,
	kelvinToMired,
	levelToBrightness,
	MAX_HUB_LEVEL,
	miredToKelvin,
	parseHubNumber,
	rgbToHsv,
} from './rako-accessory-helpers.js';

// HomeKit uses mireds. Typical tunable-white range is ~153–500 mired (~6500K–2000K).
const CT_MIN_MIRED = 153;
const CT_MAX_MIRED = 500;

function clampNumber(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

export function configureRakoLightAccessory(
	env: RakoAccessoryEnv,
	channel: Channel,
	accessory: RakoAccessory,
	displayName: string,
	colourMode?: ColourMode,
): void {
	const roomId = Number(channel.roomId);
	const channelId = Number(channel.channelId);

	const Service = env.api.hap.Service;
	const Characteristic = env.api.hap.Characteristic;

	// Colour support can change between restarts; start from a clean service.
	const existing = accessory.getService(Service.Lightbulb);
	const previousMode = accessory.context.rako?.colourMode;
	if (existing && previousMode !== colourMode) {
		env.log.info(
			'Rako: colour mode of %s changed (%s -> %s); rebuilding Lightbulb service',
			displayName,
			previousMode ?? 'none',
			colourMode ?? 'none',
		);
		accessory.removeService(existing);
	}

	const service =
		accessory.getService(Service.Lightbulb) ||
		accessory.addService(Service.Lightbulb, displayName);

	if (accessory.category !== env.api.hap.Categories.LIGHTBULB) {
		accessory.category = env.api.hap.Categories.LIGHTBULB;
	}

	applyAccessoryInformationFromChannel(env.api, accessory, channel, displayName, env.hubInfo);

	const cached = accessory.context.rako;
	const ctx = {
		on: false,
		...cached,
		roomId,
		channelId,
		roomTitle: channel.roomTitle,
		channelTitle: channel.channelTitle,
		colourMode,
	};
	accessory.context.rako = ctx;

	const fail = (what: string, err: unknown): never => {
		env.log.warn(
			'Rako: %s failed for %s (room=%d channel=%d): %s',
			what,
			displayName,
			roomId,
			channelId,
			describeError(err),
		);
		throw new env.api.hap.HapStatusError(
			env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
		);
	};

	const sendLevel = async (what: string, level: number): Promise<void> => {
		try {
			await env.hub.setLevel(roomId, channelId, level);
		} catch (err) {
			fail(what, err);
		}
	};

	// ----- On/Off -----
	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => ctx.on ?? false)
		.onSet(async (value: CharacteristicValue) => {
			const on = value === true || value === 1;
			const level = on
				? (ctx.level !== undefined && ctx.level > 0 ? ctx.level : MAX_HUB_LEVEL)
				: 0;

			env.log.info(
				'Rako: Light On.set -> %s for %s (room=%d channel=%d level=%d)',
				String(on),
				displayName,
				roomId,
				channelId,
				level,
			);

			await sendLevel('On.set', level);

			ctx.on = on;
			if (on) {
				ctx.level = level;
				ctx.brightness = levelToBrightness(level);
			}
		});

	// ----- Brightness -----
	service
		.getCharacteristic(Characteristic.Brightness)
		.onGet(() => ctx.brightness ?? 0)
		.onSet(async (value: CharacteristicValue) => {
			const brightness = Number(value);
			if (!Number.isFinite(brightness)) {
				env.log.warn(
					'Rako: Light Brightness.set received invalid value=%o for %s',
					value,
					displayName,
				);
				return;
			}

			const level = brightnessToLevel(brightness);

			env.log.info(
				'Rako: Light Brightness.set -> %d%% for %s (level=%d)',
				brightness,
				displayName,
				level,
			);

			await sendLevel('Brightness.set', level);

			ctx.brightness = levelToBrightness(level);
			ctx.on = level > 0;
			if (level > 0) {
				ctx.level = level;
			}
		});

	if (colourMode === 'rgb') {
		const sendColour = async (what: string, hue: number, saturation: number): Promise<void> => {
			// Brightness stays with the LEVEL command; RGB carries colour only.
			const rgb = hsvToRgb(hue, saturation, 100);

			env.log.info(
				'Rako: Light %s -> hue=%d sat=%d for %s -> rgb=(%d,%d,%d)',
				what,
				hue,
				saturation,
				displayName,
				rgb.r,
				rgb.g,
				rgb.b,
			);

			try {
				await env.hub.setRgb(roomId, channelId, rgb.r, rgb.g, rgb.b);
			} catch (err) {
				fail(what, err);
			}

			ctx.hue = hue;
			ctx.saturation = saturation;
		};

		service
			.getCharacteristic(Characteristic.Hue)
			.onGet(() => ctx.hue ?? 0)
			.onSet(async (value: CharacteristicValue) => {
				const hue = clampNumber(Number(value), 0, 360);
				if (!Number.isFinite(hue)) {
					return;
				}
				await sendColour('Hue.set', hue, ctx.saturation ?? 100);
			});

		service
			.getCharacteristic(Characteristic.Saturation)
			.onGet(() => ctx.saturation ?? 100)
			.onSet(async (value: CharacteristicValue) => {
				const saturation = clampNumber(Number(value), 0, 100);
				if (!Number.isFinite(saturation)) {
					return;
				}
				await sendColour('Saturation.set', ctx.hue ?? 0, saturation);
			});
	}

	if (colourMode === 'kelvin') {
		service
			.getCharacteristic(Characteristic.ColorTemperature)
			.setProps({
				minValue: CT_MIN_MIRED,
				maxValue: CT_MAX_MIRED,
				minStep: 1,
			})
			// Default: warm-ish white (≈2700K)
			.onGet(() => ctx.colorTemperature ?? 370)
			.onSet(async (value: CharacteristicValue) => {
				const mired = clampNumber(Number(value), CT_MIN_MIRED, CT_MAX_MIRED);
				if (!Number.isFinite(mired)) {
					return;
				}

				const kelvin = miredToKelvin(mired);
				env.log.info(
					'Rako: Light ColorTemperature.set -> %d mired (~%dK) for %s',
					mired,
					kelvin,
					displayName,
				);

				try {
					await env.hub.setKelvin(roomId, channelId, kelvin);
				} catch (err) {
					fail('ColorTemperature.set', err);
				}

				ctx.colorTemperature = mired;
			});
	}
}

/**
 * Push a polled LEVEL row into the accessory's On/Brightness characteristics.
 */
export function updateRakoLightFromLevel(
	env: RakoAccessoryEnv,
	accessory: RakoAccessory,
	level: Level,
): void {
	const ctx = accessory.context.rako;
	const service = accessory.getService(env.api.hap.Service.Lightbulb);
	const current = parseHubNumber(level.currentLevel);
	if (!ctx || !service || current === undefined) {
		return;
	}

	const Characteristic = env.api.hap.Characteristic;
	const on = current > 0;
	const brightness = levelToBrightness(current);

	if (ctx.on !== on || ctx.brightness !== brightness) {
		env.log.debug(
			'Rako: level update -> %s level=%d (brightness=%d%%)',
			accessory.displayName,
			current,
			brightness,
		);
	}

	ctx.on = on;
	ctx.brightness = brightness;
	if (on) {
		ctx.level = current;
	}

	service.updateCharacteristic(Characteristic.On, on);
	service.updateCharacteristic(Characteristic.Brightness, brightness);
}

/**
 * Push a polled COLOR_LEVEL row into Hue/Saturation or ColorTemperature.
 */
export function updateRakoLightFromColourLevel(
	env: RakoAccessoryEnv,
	accessory: RakoAccessory,
	colourLevel: ColourLevel,
): void {
	const ctx = accessory.context.rako;
	const service = accessory.getService(env.api.hap.Service.Lightbulb);
	if (!ctx || !service) {
		return;
	}

	const Characteristic = env.api.hap.Characteristic;
	const redOrKelvin = parseHubNumber(colourLevel.redOrKelvin);

	if (ctx.colourMode === 'rgb') {
		const green = parseHubNumber(colourLevel.green);
		const blue = parseHubNumber(colourLevel.blue);
		if (redOrKelvin === undefined || green === undefined || blue === undefined) {
			return;
		}

		const hsv = rgbToHsv(redOrKelvin, green, blue);
		ctx.hue = Math.round(hsv.h);
		ctx.saturation = Math.round(hsv.s);
		service.updateCharacteristic(Characteristic.Hue, ctx.hue);
		service.updateCharacteristic(Characteristic.Saturation, ctx.saturation);
		return;
	}

	if (ctx.colourMode === 'kelvin' && redOrKelvin !== undefined && redOrKelvin > 0) {
		ctx.colorTemperature = clampNumber(kelvinToMired(redOrKelvin), CT_MIN_MIRED, CT_MAX_MIRED);
		service.updateCharacteristic(Characteristic.ColorTemperature, ctx.colorTemperature);
	}
}
