import type {
  API,
  Characteristic,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  PlatformConfig,
  Service,
} from 'homebridge';

import { BSBLanClient } from './api/client.js';
import type { BSBLanClientConfig } from './api/types.js';
import { BSBLanConnectionError, BSBLanError, BSBLanProtocolError } from './api/types.js';
import { ThermostatAccessory } from './thermostatAccessory.js';
import { DEFAULT_POLLING_INTERVAL, MIN_POLLING_INTERVAL, PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import type { HvacMode } from './settings.js';

/**
 * Plugin configuration, validated from the raw Homebridge config
 */
interface BSBLanPlatformConfig extends BSBLanClientConfig {
  name: string;
  pollingInterval: number;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * BSB-LAN Platform
 * Exposes the heating circuit of one BSB-LAN controller as a thermostat
 */
export class BSBLanPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // Cached accessories from disk
  private readonly accessories: Map<string, PlatformAccessory> = new Map();

  private thermostat?: ThermostatAccessory;
  private apiClient?: BSBLanClient;
  private pollingTimer?: NodeJS.Timeout;

  constructor(
    public readonly log: Logging,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    this.log.debug('Initializing BSB-LAN platform');

    this.api.on('didFinishLaunching', () => {
      this.log.debug('didFinishLaunching callback');
      this.setupPlatform().catch((error: unknown) => {
        this.log.error('Failed to set up BSB-LAN platform:', error);
      });
    });

    this.api.on('shutdown', () => {
      this.shutdown().catch((error: unknown) => {
        this.log.error('Failed to close BSB-LAN client:', error);
      });
    });
  }

  /**
   * Called by Homebridge to restore cached accessories
   */
  configureAccessory(accessory: PlatformAccessory): void {
    this.log.info('Restoring cached accessory:', accessory.displayName);
    this.accessories.set(accessory.UUID, accessory);
  }

  private parseConfig(): BSBLanPlatformConfig | undefined {
    const host = optionalString(this.config.host);
    if (!host) {
      this.log.error('Missing required config: host. Please configure the address of your BSB-LAN device.');
      return undefined;
    }

    return {
      host,
      name: optionalString(this.config.name) ?? 'Heating',
      port: optionalNumber(this.config.port),
      requestTimeout: optionalNumber(this.config.requestTimeout),
      passkey: optionalString(this.config.passkey),
      username: optionalString(this.config.username),
      password: optionalString(this.config.password),
      pollingInterval: Math.max(optionalNumber(this.config.pollingInterval) ?? DEFAULT_POLLING_INTERVAL, MIN_POLLING_INTERVAL),
    };
  }

  /**
   * Main setup after Homebridge is ready
   */
  private async setupPlatform(): Promise<void> {
    const config = this.parseConfig();
    if (!config) {
      return;
    }

    this.apiClient = new BSBLanClient(config, this.log);

    this.discoverThermostat(config);
    this.cleanupObsoleteAccessories();

    this.startPolling(config.pollingInterval);

    await this.loadInfo();
    await this.pollState();
  }

  private discoverThermostat(config: BSBLanPlatformConfig): void {
    const uuid = this.api.hap.uuid.generate(`${config.host}:${config.port ?? 80}-thermostat`);

    let accessory = this.accessories.get(uuid);

    if (accessory) {
      this.log.info('Restoring thermostat from cache:', accessory.displayName);
    } else {
      this.log.info('Adding new thermostat:', config.name);
      accessory = new this.api.platformAccessory(config.name, uuid);
      this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      this.accessories.set(uuid, accessory);
    }

    this.thermostat = new ThermostatAccessory(this, accessory);
  }

  /**
   * Remove any cached accessories that are no longer defined
   */
  private cleanupObsoleteAccessories(): void {
    for (const [uuid, accessory] of this.accessories) {
      if (accessory !== this.thermostat?.accessory) {
        this.log.info('Removing obsolete accessory:', accessory.displayName);
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
        this.accessories.delete(uuid);
      }
    }
  }

  private startPolling(intervalSeconds: number): void {
    this.log.info(`Starting state polling every ${intervalSeconds} seconds`);

    this.pollingTimer = setInterval(() => {
      void this.pollState();
    }, intervalSeconds * 1000);
  }

  private async loadInfo(): Promise<void> {
    if (!this.apiClient) {
      return;
    }

    try {
      const info = await this.apiClient.info();
      this.log.info(`Connected to ${info.deviceIdentification ?? 'unknown device'}`);
      this.thermostat?.updateInfo(info);
    } catch (error) {
      this.logError('read device information', error);
    }
  }

  /**
   * Read the heating circuit state and update the thermostat
   */
  private async pollState(): Promise<void> {
    if (!this.apiClient) {
      return;
    }

    try {
      const state = await this.apiClient.state();
      this.thermostat?.clearFault();
      this.thermostat?.updateState(state);
    } catch (error) {
      this.logError('poll state', error);
      this.thermostat?.setUnavailable();
    }
  }

  async setTargetTemperature(temperature: number): Promise<void> {
    if (!this.apiClient) {
      this.log.error('Cannot set target temperature - API client not initialized');
      return;
    }

    try {
      // The device expects "21.0", not "21"
      await this.apiClient.thermostat({ targetTemperature: temperature.toFixed(1) });
    } catch (error) {
      this.logError('set target temperature', error);
    }
  }

  async setHvacMode(mode: HvacMode): Promise<void> {
    if (!this.apiClient) {
      this.log.error('Cannot set HVAC mode - API client not initialized');
      return;
    }

    try {
      await this.apiClient.thermostat({ hvacMode: String(mode) });
    } catch (error) {
      this.logError('set HVAC mode', error);
    }
  }

  private logError(action: string, error: unknown): void {
    if (error instanceof BSBLanConnectionError) {
      this.log.error(`Failed to ${action}: cannot reach BSB-LAN device (${error.message})`);
    } else if (error instanceof BSBLanProtocolError) {
      this.log.error(`Failed to ${action}: unexpected ${error.contentType || 'untyped'} response from BSB-LAN device`);
      this.log.debug(`Response body: ${error.responseText}`);
    } else if (error instanceof BSBLanError) {
      this.log.error(`Failed to ${action}: ${error.message}`);
    } else {
      this.log.error(`Unexpected error during ${action}:`, error);
    }
  }

  private async shutdown(): Promise<void> {
    if (this.pollingTimer) {
      clearInterval(this.pollingTimer);
      this.pollingTimer = undefined;
    }
    await this.apiClient?.close();
  }
}
