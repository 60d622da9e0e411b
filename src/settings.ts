// src/settings.ts

/**
 * Name under which the platform is registered; matches "platform" in config.json.
 */
export const PLATFORM_NAME = 'RakoHub';

/**
 * Must match the "name" field in package.json.
 */
export const PLUGIN_NAME = 'homebridge-rako-hub';
