import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';

import type { Info, State } from './api/types.js';
import type { BSBLanPlatform } from './platform.js';
import { HVAC_MODES, TARGET_TEMPERATURE_RANGE } from './settings.js';
import type { HvacMode } from './settings.js';

/**
 * Heating Circuit Thermostat Accessory
 * Exposes a HomeKit Thermostat service for the BSB-LAN comfort setpoint and operating mode
 */
export class ThermostatAccessory {
  private readonly service: Service;
  public readonly accessory: PlatformAccessory;

  // Current state
  private currentTemperature = 0;
  private targetTemperature = 20;
  private hvacMode: HvacMode = HVAC_MODES.automatic;

  constructor(
    private readonly platform: BSBLanPlatform,
    accessory: PlatformAccessory,
  ) {
    this.accessory = accessory;

    const infoService =
      this.accessory.getService(this.platform.Service.AccessoryInformation) ||
      this.accessory.addService(this.platform.Service.AccessoryInformation);
    infoService
      .setCharacteristic(this.platform.Characteristic.Manufacturer, 'BSB-LAN')
      .setCharacteristic(this.platform.Characteristic.Model, 'Heating Circuit')
      .setCharacteristic(this.platform.Characteristic.SerialNumber, accessory.displayName);

    this.service =
      this.accessory.getService(this.platform.Service.Thermostat) ||
      this.accessory.addService(this.platform.Service.Thermostat);

    this.service.setCharacteristic(this.platform.Characteristic.Name, accessory.displayName);

    this.service.getCharacteristic(this.platform.Characteristic.CurrentTemperature).setProps({
      minValue: -50,
      maxValue: 100,
    });

    this.service
      .getCharacteristic(this.platform.Characteristic.TargetTemperature)
      .setProps({
        minValue: TARGET_TEMPERATURE_RANGE.min,
        maxValue: TARGET_TEMPERATURE_RANGE.max,
        minStep: TARGET_TEMPERATURE_RANGE.step,
      })
      .onGet(this.getTargetTemperature.bind(this))
      .onSet(this.setTargetTemperature.bind(this));

    // The boiler only heats
    this.service.getCharacteristic(this.platform.Characteristic.CurrentHeatingCoolingState).setProps({
      validValues: [
        this.platform.Characteristic.CurrentHeatingCoolingState.OFF,
        this.platform.Characteristic.CurrentHeatingCoolingState.HEAT,
      ],
    });

    this.service
      .getCharacteristic(this.platform.Characteristic.TargetHeatingCoolingState)
      .onGet(this.getTargetHeatingCoolingState.bind(this))
      .onSet(this.setTargetHeatingCoolingState.bind(this));

    this.service.updateCharacteristic(
      this.platform.Characteristic.TemperatureDisplayUnits,
      this.platform.Characteristic.TemperatureDisplayUnits.CELSIUS,
    );

    this.platform.log.debug(`Initialized thermostat: ${accessory.displayName}`);
  }

  /**
   * Apply a state read from the device
   */
  updateState(state: State): void {
    if (state.currentTemperature !== undefined) {
      this.currentTemperature = state.currentTemperature;
      this.service.updateCharacteristic(this.platform.Characteristic.CurrentTemperature, state.currentTemperature);
    }

    if (state.targetTemperature !== undefined) {
      this.targetTemperature = state.targetTemperature;
      this.service.updateCharacteristic(this.platform.Characteristic.TargetTemperature, state.targetTemperature);
    }

    if (state.hvacMode !== undefined) {
      this.hvacMode = state.hvacMode;
      this.service.updateCharacteristic(
        this.platform.Characteristic.TargetHeatingCoolingState,
        this.toTargetHeatingCoolingState(state.hvacMode),
      );
      this.service.updateCharacteristic(
        this.platform.Characteristic.CurrentHeatingCoolingState,
        state.hvacMode === HVAC_MODES.protection
          ? this.platform.Characteristic.CurrentHeatingCoolingState.OFF
          : this.platform.Characteristic.CurrentHeatingCoolingState.HEAT,
      );
    }

    this.platform.log.debug(
      `Thermostat state: current ${this.currentTemperature}°C, target ${this.targetTemperature}°C, mode ${this.hvacMode}`,
    );
  }

  /**
   * Fill accessory information from the controller identification
   */
  updateInfo(info: Info): void {
    const infoService = this.accessory.getService(this.platform.Service.AccessoryInformation);
    if (!infoService) {
      return;
    }
    if (info.deviceIdentification) {
      infoService.updateCharacteristic(this.platform.Characteristic.Model, info.deviceIdentification);
    }
    if (info.controllerFamily && info.controllerVariant) {
      infoService.updateCharacteristic(
        this.platform.Characteristic.SerialNumber,
        `${info.controllerFamily}-${info.controllerVariant}`,
      );
    }
  }

  private async getTargetTemperature(): Promise<CharacteristicValue> {
    return this.targetTemperature;
  }

  private async setTargetTemperature(value: CharacteristicValue): Promise<void> {
    if (typeof value !== 'number') {
      this.platform.log.warn(`Ignoring non-numeric target temperature: ${String(value)}`);
      return;
    }
    this.targetTemperature = value;
    await this.platform.setTargetTemperature(value);
  }

  private async getTargetHeatingCoolingState(): Promise<CharacteristicValue> {
    return this.toTargetHeatingCoolingState(this.hvacMode);
  }

  private async setTargetHeatingCoolingState(value: CharacteristicValue): Promise<void> {
    const mode = this.toHvacMode(value);
    if (mode === undefined) {
      this.platform.log.warn(`Ignoring unsupported heating/cooling state: ${String(value)}`);
      return;
    }
    this.hvacMode = mode;
    await this.platform.setHvacMode(mode);
  }

  /**
   * OFF = protection, AUTO = automatic, COOL = reduced, HEAT = comfort
   */
  private toTargetHeatingCoolingState(mode: HvacMode): number {
    const states = this.platform.Characteristic.TargetHeatingCoolingState;
    const mapping: Record<HvacMode, number> = {
      [HVAC_MODES.protection]: states.OFF,
      [HVAC_MODES.automatic]: states.AUTO,
      [HVAC_MODES.reduced]: states.COOL,
      [HVAC_MODES.comfort]: states.HEAT,
    };
    return mapping[mode];
  }

  private toHvacMode(value: CharacteristicValue): HvacMode | undefined {
    const states = this.platform.Characteristic.TargetHeatingCoolingState;
    switch (value) {
      case states.OFF:
        return HVAC_MODES.protection;
      case states.AUTO:
        return HVAC_MODES.automatic;
      case states.COOL:
        return HVAC_MODES.reduced;
      case states.HEAT:
        return HVAC_MODES.comfort;
      default:
        return undefined;
    }
  }

  setUnavailable(): void {
    this.service.updateCharacteristic(
      this.platform.Characteristic.StatusFault,
      this.platform.Characteristic.StatusFault.GENERAL_FAULT,
    );
  }

  clearFault(): void {
    this.service.updateCharacteristic(
      this.platform.Characteristic.StatusFault,
      this.platform.Characteristic.StatusFault.NO_FAULT,
    );
  }
}
