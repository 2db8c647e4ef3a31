import { HVAC_MODES, INFO_PARAMS, THERMOSTAT_PARAMS } from '../settings.js';
import type { HvacMode } from '../settings.js';
import type { Info, ParameterReading, State } from './types.js';
import { BSBLanError } from './types.js';

const HVAC_MODE_VALUES: readonly number[] = Object.values(HVAC_MODES);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function isHvacMode(value: number): value is HvacMode {
  return HVAC_MODE_VALUES.includes(value);
}

/**
 * Typed view over a decoded /JQ response, in the object's iteration order
 */
export function toParameterMap(data: unknown): Map<string, ParameterReading> {
  if (!isRecord(data)) {
    throw new BSBLanError('Unexpected response shape from the BSB-LAN device', {
      response: JSON.stringify(data) ?? String(data),
    });
  }

  const readings = new Map<string, ParameterReading>();
  for (const [paramId, entry] of Object.entries(data)) {
    if (!isRecord(entry)) {
      readings.set(paramId, {});
      continue;
    }
    readings.set(paramId, {
      name: optionalString(entry.name),
      value: optionalString(entry.value),
      unit: optionalString(entry.unit),
      desc: optionalString(entry.desc),
      dataType: typeof entry.dataType === 'number' ? entry.dataType : undefined,
    });
  }
  return readings;
}

/**
 * Parameter IDs that returned a non-empty value
 */
export function readableParameters(readings: Map<string, ParameterReading>): string[] {
  return [...readings]
    .filter(([, reading]) => Boolean(reading.value))
    .map(([paramId]) => paramId);
}

function numericValue(reading?: ParameterReading): number | undefined {
  if (!reading?.value) {
    return undefined;
  }
  const value = parseFloat(reading.value);
  return isNaN(value) ? undefined : value;
}

export function parseState(readings: Map<string, ParameterReading>): State {
  const target = readings.get(THERMOSTAT_PARAMS.targetTemperature);
  const mode = readings.get(THERMOSTAT_PARAMS.hvacMode);
  const modeValue = numericValue(mode);

  return {
    targetTemperature: numericValue(target),
    temperatureUnit: target?.unit || undefined,
    hvacMode: modeValue !== undefined && isHvacMode(modeValue) ? modeValue : undefined,
    hvacModeDescription: mode?.desc || undefined,
    currentTemperature: numericValue(readings.get(THERMOSTAT_PARAMS.currentTemperature)),
  };
}

export function parseInfo(readings: Map<string, ParameterReading>): Info {
  return {
    deviceIdentification: readings.get(INFO_PARAMS.deviceIdentification)?.value || undefined,
    controllerFamily: readings.get(INFO_PARAMS.controllerFamily)?.value || undefined,
    controllerVariant: readings.get(INFO_PARAMS.controllerVariant)?.value || undefined,
  };
}
