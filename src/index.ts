import type { API } from 'homebridge';

import { RakoHubPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

/**
 * Homebridge entry point.
 * Registers the RakoHubPlatform with Homebridge under PLATFORM_NAME.
 */
export default (api: API) => {
	api.registerPlatform(PLATFORM_NAME, RakoHubPlatform);
};

export { RakoHub } from './rako/rako-hub.js';
export type { RakoHubOptions } from './rako/rako-hub.js';
export type { HubLogger } from './rako/logger.js';
export * from './rako/errors.js';
export type * from './rako/model.js';
