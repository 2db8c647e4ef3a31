import type { Logging } from 'homebridge';

import { INFO_PARAMS, SCAN_PARAMS, SET_TYPE_APPLY, THERMOSTAT_PARAMS } from '../settings.js';
import { parseInfo, parseState, readableParameters, toParameterMap } from './models.js';
import { BSBLanTransport } from './transport.js';
import type { BSBLanClientConfig, Info, SetParameterRequest, State, ThermostatChange } from './types.js';

/**
 * Client for a BSB-LAN heating controller
 *
 * Keeps the parameter set discovered by {@link scan} for every later {@link state}
 * read. The set never expires: call scan() again to refresh it.
 */
export class BSBLanClient {
  private readonly transport: BSBLanTransport;
  private readonly log: Logging;

  // Comma-joined parameter IDs that returned a value on the last scan
  private discoveredParameters?: string;

  constructor(config: BSBLanClientConfig, log: Logging) {
    this.transport = new BSBLanTransport(config, log);
    this.log = log;
  }

  get parameters(): string | undefined {
    return this.discoveredParameters;
  }

  /**
   * Probe the bootstrap parameters and cache those that return a value.
   *
   * IDs are joined in the key order of the decoded object, which lists numeric
   * keys ascending: a device answering 8740,710,700 is cached as "700,710,8740".
   */
  async scan(): Promise<string> {
    const data = await this.transport.request({ params: { Parameter: SCAN_PARAMS.join(',') } });
    const parameters = readableParameters(toParameterMap(data)).join(',');

    this.log.debug(`Discovered parameters: ${parameters || '(none)'}`);
    this.discoveredParameters = parameters;
    return parameters;
  }

  /**
   * Get the current heating circuit state, scanning first if nothing is cached
   */
  async state(): Promise<State> {
    const parameters = this.discoveredParameters ?? (await this.scan());
    const data = await this.transport.request({ params: { Parameter: parameters } });
    return parseState(toParameterMap(data));
  }

  /**
   * Get the controller identification
   */
  async info(): Promise<Info> {
    const data = await this.transport.request({ params: { Parameter: Object.values(INFO_PARAMS).join(',') } });
    return parseInfo(toParameterMap(data));
  }

  /**
   * Change the comfort setpoint and/or operating mode.
   * The payload holds a single parameter: when both are given only the mode is applied.
   */
  async thermostat(change: ThermostatChange): Promise<void> {
    const payload: SetParameterRequest = {};

    if (change.targetTemperature !== undefined) {
      payload.Parameter = THERMOSTAT_PARAMS.targetTemperature;
      payload.Value = change.targetTemperature;
      payload.Type = SET_TYPE_APPLY;
    }
    if (change.hvacMode !== undefined) {
      if (payload.Parameter !== undefined) {
        this.log.warn(`Ignoring target temperature ${change.targetTemperature}: only the HVAC mode is applied`);
      }
      payload.Parameter = THERMOSTAT_PARAMS.hvacMode;
      payload.EnumValue = change.hvacMode;
      payload.Type = SET_TYPE_APPLY;
    }

    this.log.info(`Setting parameter ${payload.Parameter ?? '(none)'} to ${payload.EnumValue ?? payload.Value ?? '(none)'}`);
    await this.transport.request({ data: payload });
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}

/**
 * Run `fn` with a fresh client and close it afterwards, whether `fn` resolves or rejects
 */
export async function withBSBLanClient<T>(
  config: BSBLanClientConfig,
  log: Logging,
  fn: (client: BSBLanClient) => Promise<T>,
): Promise<T> {
  const client = new BSBLanClient(config, log);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
