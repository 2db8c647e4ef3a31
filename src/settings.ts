/**
 * This is the name of the platform that users will use to register the plugin in the Homebridge config.json
 */
export const PLATFORM_NAME = 'BSBLan';

/**
 * This must match the name of your plugin as defined the package.json `name` property
 */
export const PLUGIN_NAME = 'homebridge-bsblan';

/**
 * Sent in the User-Agent header. Set by hand: bump together with package.json `version`
 */
export const PLUGIN_VERSION = '1.0.0';

/**
 * Default polling interval in seconds
 */
export const DEFAULT_POLLING_INTERVAL = 60;

/**
 * Minimum allowed polling interval in seconds
 */
export const MIN_POLLING_INTERVAL = 10;

/**
 * Heating circuit 1 parameter IDs
 */
export const THERMOSTAT_PARAMS = {
  hvacMode: '700',
  targetTemperature: '710',
  currentTemperature: '8740',
} as const;

/**
 * Parameters probed by scan(). Only those returning a value are kept for state reads.
 */
export const SCAN_PARAMS = [
  THERMOSTAT_PARAMS.currentTemperature,
  THERMOSTAT_PARAMS.targetTemperature,
  THERMOSTAT_PARAMS.hvacMode,
] as const;

/**
 * Device identification parameter IDs
 */
export const INFO_PARAMS = {
  deviceIdentification: '6224',
  controllerFamily: '6225',
  controllerVariant: '6226',
} as const;

/**
 * Write type marker. "1" makes the device apply the value; "0" only validates it.
 */
export const SET_TYPE_APPLY = '1';

/**
 * Operating modes of parameter 700
 */
export const HVAC_MODES = {
  protection: 0,
  automatic: 1,
  reduced: 2,
  comfort: 3,
} as const;

export type HvacMode = (typeof HVAC_MODES)[keyof typeof HVAC_MODES];

/**
 * Comfort setpoint range (°C) exposed to HomeKit
 */
export const TARGET_TEMPERATURE_RANGE = {
  min: 8,
  max: 30,
  step: 0.5,
} as const;
