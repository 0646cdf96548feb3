/**
 * Name under which the platform is registered in config.json.
 */
export const PLATFORM_NAME = 'RevealCellCam';

/**
 * Must match the name in package.json.
 */
export const PLUGIN_NAME = 'homebridge-reveal-cellcam';
