import type { Logging } from 'homebridge';
import { Agent, fetch } from 'undici';
import type { Dispatcher } from 'undici';

import { PLUGIN_NAME, PLUGIN_VERSION } from '../settings.js';
import type { BSBLanClientConfig, HttpMethod, RequestOptions } from './types.js';
import { BSBLanConnectionError, BSBLanProtocolError } from './types.js';

const DEFAULT_PORT = 80;
const DEFAULT_REQUEST_TIMEOUT = 10; // seconds

/**
 * Performs single HTTP transactions against a BSB-LAN device.
 *
 * The connection pool is either borrowed from the caller (`config.session`) or
 * created on first use and owned; only an owned pool is closed by {@link close}.
 */
export class BSBLanTransport {
  private readonly host: string;
  private readonly port: number;
  private readonly requestTimeoutMs: number;
  private readonly passkey?: string;
  private readonly authorization?: string;
  private readonly log: Logging;

  private session?: Dispatcher;
  private ownsSession = false;

  constructor(config: BSBLanClientConfig, log: Logging) {
    this.host = config.host;
    this.port = config.port ?? DEFAULT_PORT;
    this.requestTimeoutMs = (config.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT) * 1000;
    this.passkey = config.passkey;
    this.session = config.session;
    this.log = log;

    if (config.username && config.password) {
      const credentials = Buffer.from(`${config.username}:${config.password}`).toString('base64');
      this.authorization = `Basic ${credentials}`;
    } else if (config.username || config.password) {
      this.log.warn('Both username and password are required for authentication - sending requests without credentials');
    }
  }

  /**
   * Build the request URL: http://host:port[/passkey]/JQ|JS[/path][?query]
   */
  buildUrl(options: RequestOptions): string {
    let path = options.data === undefined ? '/JQ' : '/JS';
    if (this.passkey !== undefined) {
      path = `/${this.passkey}${path}`;
    }

    const suffix = options.path?.replace(/^\/+/, '');
    if (suffix) {
      path = `${path}/${suffix}`;
    }

    const query = Object.entries(options.params ?? {})
      .map(([key, value]) => `${encodeURIComponent(key)}=${this.encodeQueryValue(value)}`)
      .join('&');

    return `http://${this.host}:${this.port}${path}${query ? `?${query}` : ''}`;
  }

  /**
   * Send one request and return the decoded JSON body
   */
  async request(options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(options);
    const method = options.method ?? 'POST';
    this.log.debug(`${method} ${url}`);

    const headers: Record<string, string> = {
      'User-Agent': `${PLUGIN_NAME}/${PLUGIN_VERSION}`,
      Accept: 'application/json',
    };
    if (this.authorization) {
      headers.Authorization = this.authorization;
    }

    let body: string | undefined;
    if (options.data !== undefined) {
      body = JSON.stringify(options.data);
      headers['Content-Type'] = 'application/json';
    }

    const { contentType, text } = await this.send(url, { method, headers, body });

    if (!contentType.includes('application/json')) {
      throw new BSBLanProtocolError('Unexpected response from the BSB-LAN device', contentType, text);
    }

    return JSON.parse(text);
  }

  /**
   * Release the connection pool if this transport created it
   */
  async close(): Promise<void> {
    if (!this.session || !this.ownsSession) {
      return;
    }

    const session = this.session;
    this.session = undefined;
    this.ownsSession = false;
    this.log.debug('Closing BSB-LAN connection pool');
    await session.close();
  }

  /**
   * One round trip bounded by the request timeout, body included
   */
  private async send(
    url: string,
    init: { method: HttpMethod; headers: Record<string, string>; body?: string },
  ): Promise<{ contentType: string; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const response = await fetch(url, {
        ...init,
        dispatcher: this.getSession(),
        signal: controller.signal,
      });

      if (!response.ok) {
        // Release the socket before giving up on the response
        await response.body?.cancel();
        throw new BSBLanConnectionError(
          `Error occurred while communicating with BSB-LAN device: status ${response.status}`,
          response.status,
        );
      }

      return {
        contentType: response.headers.get('content-type') ?? '',
        text: await response.text(),
      };
    } catch (error) {
      if (error instanceof BSBLanConnectionError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new BSBLanConnectionError('Timeout occurred while connecting to BSB-LAN device', undefined, {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new BSBLanConnectionError(`Error occurred while communicating with BSB-LAN device: ${reason}`, undefined, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private getSession(): Dispatcher {
    if (!this.session) {
      this.session = new Agent();
      this.ownsSession = true;
    }
    return this.session;
  }

  // Parameter lists are sent as "700,710,8740"; the device does not decode %2C
  private encodeQueryValue(value: string): string {
    return encodeURIComponent(value).replace(/%2C/gi, ',');
  }
}
