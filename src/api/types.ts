import type { Dispatcher } from 'undici';

import type { HvacMode } from '../settings.js';

/**
 * BSB-LAN JSON API types
 * Based on POST http://{host}/JQ?Parameter=700,710
 */

export interface ParameterReading {
  name?: string;      // e.g., "Betriebsart"
  value?: string;     // e.g., "1" or "19.0"
  unit?: string;      // e.g., "°C"
  desc?: string;      // e.g., "Automatik" for enum values
  dataType?: number;  // 0 = plain value, 1 = enum
}

/**
 * Write payload for /JS
 */
export interface SetParameterRequest {
  Parameter?: string;
  Value?: string;
  EnumValue?: string;
  Type?: string;
}

export type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
  path?: string;
  method?: HttpMethod;
  data?: SetParameterRequest;
  params?: Record<string, string>;
}

/**
 * Current heating circuit state
 */
export interface State {
  targetTemperature?: number;
  temperatureUnit?: string;
  hvacMode?: HvacMode;
  hvacModeDescription?: string;
  currentTemperature?: number;
}

/**
 * Static controller information
 */
export interface Info {
  deviceIdentification?: string;
  controllerFamily?: string;
  controllerVariant?: string;
}

export interface ThermostatChange {
  targetTemperature?: string;
  hvacMode?: string;
}

/**
 * API client configuration
 */
export interface BSBLanClientConfig {
  host: string;
  port?: number;            // Default: 80
  requestTimeout?: number;  // Seconds, default: 10
  session?: Dispatcher;     // Borrowed, never closed by the client
  username?: string;
  password?: string;
  passkey?: string;
}

/**
 * Base error for everything the device client raises
 */
export class BSBLanError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, string>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BSBLanError';
  }
}

/**
 * Timeout, network failure or non-2xx status
 */
export class BSBLanConnectionError extends BSBLanError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, statusCode === undefined ? undefined : { status: String(statusCode) }, options);
    this.name = 'BSBLanConnectionError';
  }
}

/**
 * The device answered, but not with JSON
 */
export class BSBLanProtocolError extends BSBLanError {
  constructor(
    message: string,
    public readonly contentType: string,
    public readonly responseText: string,
  ) {
    super(message, { 'Content-Type': contentType, response: responseText });
    this.name = 'BSBLanProtocolError';
  }
}
