// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { ConfigValidationError } from './rako/errors.js';
import { HubPoller } from './rako/hub-poller.js';
import type { HubLogger } from './rako/logger.js';
import type { Channel } from './rako/model.js';
import { RakoHub } from './rako/rako-hub.js';
import {
	channelKey,
	describeError,
	resolveColourMode,
	type ColourMode,
	type RakoAccessory,
	type RakoAccessoryContext,
	type RakoAccessoryEnv,
} from './rako/rako-accessory-helpers.js';
import {
	configureRakoLightAccessory,
	updateRakoLightFromColourLevel,
	updateRakoLightFromLevel,
} from './rako/rako-light-accessory.js';

export const DEFAULT_CLIENT_NAME = 'homebridge';
export const DEFAULT_POLL_INTERVAL_SECONDS = 30;

export interface RakoPlatformSettings {
	host: string;
	port: number;
	clientName: string;
	readTimeoutMs?: number;
	pollIntervalSeconds: number;
}

const toHubLogger = (log: Logger): HubLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

function readNumber(value: unknown): number | undefined {
	if (typeof value === 'number') {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		return Number(value.trim());
	}
	return undefined;
}

/**
 * Pull hub settings out of the platform block in config.json.
 * Validation of host/port/clientName is left to RakoHub.
 */
export function resolvePlatformSettings(raw: Record<string, unknown>): RakoPlatformSettings {
	const host = typeof raw.host === 'string' ? raw.host : '';

	const clientName =
		typeof raw.clientName === 'string' && raw.clientName.trim() !== ''
			? raw.clientName
			: DEFAULT_CLIENT_NAME;

	const pollInterval = readNumber(raw.pollIntervalSeconds);

	return {
		host,
		port: readNumber(raw.port) ?? Number.NaN,
		clientName,
		readTimeoutMs: readNumber(raw.readTimeoutMs),
		pollIntervalSeconds:
			pollInterval !== undefined && Number.isFinite(pollInterval) && pollInterval >= 0
				? pollInterval
				: DEFAULT_POLL_INTERVAL_SECONDS,
	};
}

export class RakoHubPlatform implements DynamicPlatformPlugin {
	public readonly accessories: RakoAccessory[] = [];
	public configureAccessory(accessory: RakoAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly config: PlatformConfig;
	private readonly settings: RakoPlatformSettings;
	private readonly hub: RakoHub | null;

	private readonly channelToAccessory = new Map<string, RakoAccessory>();
	private poller: HubPoller | null = null;
	private hasColourChannels = false;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.config = config;
		this.api = api;

		const raw: Record<string, unknown> = this.config;
		this.settings = resolvePlatformSettings(raw);
		this.hub = this.createHub();

		this.log.info(this.config.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.startPoller();
		});

		this.api.on('shutdown', () => {
			this.poller?.stop();
			this.hub?.close();
		});
	}

	private createHub(): RakoHub | null {
		try {
			return new RakoHub({
				host: this.settings.host,
				port: this.settings.port,
				clientName: this.settings.clientName,
				readTimeoutMs: this.settings.readTimeoutMs,
				logger: toHubLogger(this.log),
			});
		} catch (err) {
			if (err instanceof ConfigValidationError) {
				this.log.error('Rako: invalid platform configuration: %s', err.message);
				return null;
			}
			throw err;
		}
	}

	private async startPoller(): Promise<void> {
		const hub = this.hub;
		if (!hub) {
			this.log.warn('Rako: hub not configured; skipping discovery.');
			return;
		}

		this.poller = new HubPoller({
			pollIntervalSeconds: this.settings.pollIntervalSeconds,
			discover: () => this.loadRako(hub),
			poll: () => this.pollLevels(),
			log: toHubLogger(this.log),
		});
		await this.poller.start();
	}

	private async loadRako(hub: RakoHub): Promise<boolean> {
		try {
			const hubInfo = await hub.getHubInfo();
			this.log.info(
				'Rako: connected to hub %s (mac=%s version=%s protocol=%s)',
				hubInfo.hubId,
				hubInfo.macAddress,
				hubInfo.hubVersion,
				hubInfo.protocolVersion,
			);

			const channels = await hub.getChannels();
			const colours = await hub.getColours();

			const colourModes = new Map<string, ColourMode>();
			for (const colour of colours) {
				colourModes.set(channelKey(colour.roomId, colour.channelId), resolveColourMode(colour.type));
			}
			this.hasColourChannels = colourModes.size > 0;

			this.log.info(
				'Rako: hub reported %d channel(s), %d with colour control',
				channels.length,
				colourModes.size,
			);

			this.discoverChannels({ log: this.log, api: this.api, hub, hubInfo }, channels, colourModes);
		} catch (err) {
			this.log.error('Rako: discovery failed: %s', describeError(err));
			return false;
		}

		return true;
	}

	private discoverChannels(
		env: RakoAccessoryEnv,
		channels: Channel[],
		colourModes: Map<string, ColourMode>,
	): void {
		const seen = new Set<string>();

		for (const channel of channels) {
			const key = channelKey(channel.roomId, channel.channelId);
			const uuidSeed = `rako-${channel.roomId}-${channel.channelId}`;
			const uuid = this.api.hap.uuid.generate(uuidSeed);
			seen.add(uuid);

			const channelTitle = channel.channelTitle.trim();
			const displayName = channelTitle
				? `${channel.roomTitle.trim()} ${channelTitle}`.trim()
				: `Rako ${uuidSeed}`;

			let accessory = this.accessories.find(acc => acc.UUID === uuid);

			if (accessory) {
				this.log.info('Rako: using cached accessory for %s (%s)', displayName, uuidSeed);
			} else {
				this.log.info('Rako: registering new accessory for %s (%s)', displayName, uuidSeed);

				accessory = new this.api.platformAccessory<RakoAccessoryContext>(displayName, uuid);
				this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
				this.accessories.push(accessory);
			}

			configureRakoLightAccessory(env, channel, accessory, displayName, colourModes.get(key));
			this.channelToAccessory.set(key, accessory);
		}

		const stale = this.accessories.filter(acc => !seen.has(acc.UUID));
		if (stale.length > 0) {
			this.log.info('Rako: removing %d accessory(ies) no longer reported by the hub', stale.length);
			this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
			for (const acc of stale) {
				this.accessories.splice(this.accessories.indexOf(acc), 1);
			}
		}
	}

	private async pollLevels(): Promise<void> {
		const hub = this.hub;
		if (!hub) {
			return;
		}

		const env: RakoAccessoryEnv = { log: this.log, api: this.api, hub };

		try {
			for (const level of await hub.getLevels()) {
				const accessory = this.channelToAccessory.get(channelKey(level.roomId, level.channelId));
				if (accessory) {
					updateRakoLightFromLevel(env, accessory, level);
				}
			}

			if (this.hasColourChannels) {
				for (const colourLevel of await hub.getColoursLevels()) {
					const accessory = this.channelToAccessory.get(
						channelKey(colourLevel.roomId, colourLevel.channelId),
					);
					if (accessory) {
						updateRakoLightFromColourLevel(env, accessory, colourLevel);
					}
				}
			}
		} catch (err) {
			this.log.warn('Rako: level poll failed: %s', describeError(err));
		}
	}
}
