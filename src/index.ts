import type { API } from 'homebridge';

import { BSBLanPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

export { BSBLanClient, withBSBLanClient } from './api/client.js';
export { BSBLanTransport } from './api/transport.js';
export { parseInfo, parseState, readableParameters, toParameterMap } from './api/models.js';
export * from './api/types.js';
export { HVAC_MODES } from './settings.js';
export type { HvacMode } from './settings.js';

/**
 * Homebridge entry point
 */
export default (api: API): void => {
  api.registerPlatform(PLATFORM_NAME, BSBLanPlatform);
};
