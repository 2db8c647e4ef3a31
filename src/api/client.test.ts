import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  createMockInfoResponse,
  createMockJsonResponse,
  createMockLogger,
  createMockScanResponse,
} from '../test/mocks.js';
import { BSBLanClient, withBSBLanClient } from './client.js';
import { BSBLanConnectionError, BSBLanError } from './types.js';

const { mockFetch, agentInstances } = vi.hoisted(() => {
  const instances: Array<{ close: ReturnType<typeof vi.fn> }> = [];
  return { mockFetch: vi.fn(), agentInstances: instances };
});

vi.mock('undici', () => ({
  Agent: class MockAgent {
    close = vi.fn(async () => undefined);

    constructor() {
      agentInstances.push(this);
    }
  },
  fetch: mockFetch,
}));

function requestedUrls(): string[] {
  return mockFetch.mock.calls.map(([url]) => url);
}

function sentBody(): string | undefined {
  return mockFetch.mock.calls[mockFetch.mock.calls.length - 1][1].body;
}

describe('BSBLanClient', () => {
  let client: BSBLanClient;
  let mockLogger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    mockFetch.mockReset();
    agentInstances.length = 0;
    mockLogger = createMockLogger();
    client = new BSBLanClient({ host: '192.168.1.50' }, mockLogger);
  });

  describe('scan', () => {
    it('should query the bootstrap parameters and cache those with a value', async () => {
      mockFetch.mockResolvedValueOnce(createMockJsonResponse(createMockScanResponse()));

      const parameters = await client.scan();

      expect(requestedUrls()).toEqual(['http://192.168.1.50:80/JQ?Parameter=8740,710,700']);
      expect(parameters).toBe('700,710,8740');
      expect(client.parameters).toBe('700,710,8740');
    });

    it('should drop parameters with an empty or missing value', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockJsonResponse({
          '8740': { name: 'Raumtemperatur 1 Istwert', value: '', unit: '°C' },
          '710': { name: 'Komfortsollwert', value: '20.0', unit: '°C' },
          '700': { name: 'Betriebsart' },
        }),
      );

      await expect(client.scan()).resolves.toBe('710');
    });

    it('should drop entries that are not objects', async () => {
      mockFetch.mockResolvedValueOnce(createMockJsonResponse({ '8740': null, '710': 'x', '700': { value: '3' } }));

      await expect(client.scan()).resolves.toBe('700');
    });

    it('should keep the order in which the response lists parameters', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockJsonResponse({ b: { value: '1' }, skipped: { value: '' }, a: { value: '2' } }),
      );

      await expect(client.scan()).resolves.toBe('b,a');
    });

    it('should cache an empty set when nothing is readable', async () => {
      mockFetch.mockResolvedValueOnce(createMockJsonResponse({ '8740': { value: '' }, '710': { value: '' } }));

      await expect(client.scan()).resolves.toBe('');
      expect(client.parameters).toBe('');
    });

    it('should overwrite the cached set on every scan', async () => {
      mockFetch
        .mockResolvedValueOnce(createMockJsonResponse(createMockScanResponse()))
        .mockResolvedValueOnce(createMockJsonResponse({ '710': { value: '20.0' } }));

      await client.scan();
      await client.scan();

      expect(client.parameters).toBe('710');
    });

    it('should reject responses that are not parameter maps', async () => {
      mockFetch.mockResolvedValueOnce(createMockJsonResponse([]));

      const error = await client.scan().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BSBLanError);
      expect(error).toMatchObject({
        message: 'Unexpected response shape from the BSB-LAN device',
        details: { response: '[]' },
      });
      expect(client.parameters).toBeUndefined();
    });
  });

  describe('state', () => {
    it('should scan once and then reuse the cached parameters', async () => {
      mockFetch.mockImplementation(async () => createMockJsonResponse(createMockScanResponse()));

      await client.state();
      await client.state();

      expect(requestedUrls()).toEqual([
        'http://192.168.1.50:80/JQ?Parameter=8740,710,700',
        'http://192.168.1.50:80/JQ?Parameter=700,710,8740',
        'http://192.168.1.50:80/JQ?Parameter=700,710,8740',
      ]);
    });

    it('should decode the state', async () => {
      mockFetch.mockImplementation(async () => createMockJsonResponse(createMockScanResponse()));

      const state = await client.state();

      expect(state).toEqual({
        targetTemperature: 20,
        temperatureUnit: '°C',
        hvacMode: 1,
        hvacModeDescription: 'Automatik',
        currentTemperature: 21.4,
      });
    });

    it('should query with an empty filter when the scan found nothing', async () => {
      mockFetch
        .mockResolvedValueOnce(createMockJsonResponse({ '8740': { value: '' } }))
        .mockResolvedValueOnce(createMockJsonResponse({}));

      const state = await client.state();

      expect(requestedUrls()[1]).toBe('http://192.168.1.50:80/JQ?Parameter=');
      expect(state).toEqual({
        targetTemperature: undefined,
        temperatureUnit: undefined,
        hvacMode: undefined,
        hvacModeDescription: undefined,
        currentTemperature: undefined,
      });
    });

    it('should not rescan when a parameter later disappears', async () => {
      mockFetch
        .mockResolvedValueOnce(createMockJsonResponse(createMockScanResponse()))
        .mockResolvedValueOnce(createMockJsonResponse(createMockScanResponse()))
        .mockResolvedValueOnce(createMockJsonResponse({ '710': { value: '20.0', unit: '°C' } }));

      await client.state();
      const state = await client.state();

      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(state.targetTemperature).toBe(20);
      expect(state.currentTemperature).toBeUndefined();
      expect(client.parameters).toBe('700,710,8740');
    });

    it('should leave the cache empty when the scan fails', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.state()).rejects.toBeInstanceOf(BSBLanConnectionError);
      expect(client.parameters).toBeUndefined();
    });
  });

  describe('info', () => {
    it('should query the fixed information parameters', async () => {
      mockFetch.mockResolvedValueOnce(createMockJsonResponse(createMockInfoResponse()));

      const info = await client.info();

      expect(requestedUrls()).toEqual(['http://192.168.1.50:80/JQ?Parameter=6224,6225,6226']);
      expect(info).toEqual({
        deviceIdentification: 'RVS43.222/100',
        controllerFamily: '211',
        controllerVariant: '127',
      });
    });

    it('should not touch the parameter cache', async () => {
      mockFetch.mockResolvedValueOnce(createMockJsonResponse(createMockInfoResponse()));

      await client.info();

      expect(client.parameters).toBeUndefined();
    });
  });

  describe('thermostat', () => {
    beforeEach(() => {
      mockFetch.mockImplementation(async () => createMockJsonResponse({ '710': { status: 1 } }));
    });

    it('should write the target temperature', async () => {
      await client.thermostat({ targetTemperature: '19.0' });

      expect(requestedUrls()).toEqual(['http://192.168.1.50:80/JS']);
      expect(sentBody()).toBe('{"Parameter":"710","Value":"19.0","Type":"1"}');
      expect(mockLogger.info).toHaveBeenCalledWith('Setting parameter 710 to 19.0');
    });

    it('should write the HVAC mode', async () => {
      await client.thermostat({ hvacMode: '3' });

      expect(sentBody()).toBe('{"Parameter":"700","EnumValue":"3","Type":"1"}');
      expect(mockLogger.info).toHaveBeenCalledWith('Setting parameter 700 to 3');
    });

    it('should only apply the HVAC mode when both are given', async () => {
      await client.thermostat({ targetTemperature: '19.0', hvacMode: '3' });

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(sentBody()).toBe('{"Parameter":"700","Value":"19.0","Type":"1","EnumValue":"3"}');
      expect(mockLogger.warn).toHaveBeenCalledWith('Ignoring target temperature 19.0: only the HVAC mode is applied');
    });

    it('should not inspect the acknowledgement', async () => {
      mockFetch.mockImplementation(async () => createMockJsonResponse({ '710': { status: 0 } }));

      await expect(client.thermostat({ targetTemperature: '99.0' })).resolves.toBeUndefined();
    });

    it('should propagate transport errors', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.thermostat({ hvacMode: '1' })).rejects.toBeInstanceOf(BSBLanConnectionError);
    });

    it('should leave the parameter cache alone', async () => {
      await client.thermostat({ targetTemperature: '21.0' });

      expect(client.parameters).toBeUndefined();
    });
  });

  describe('close', () => {
    it('should close the session it created', async () => {
      mockFetch.mockResolvedValueOnce(createMockJsonResponse(createMockInfoResponse()));

      await client.info();
      await client.close();

      expect(agentInstances).toHaveLength(1);
      expect(agentInstances[0].close).toHaveBeenCalledTimes(1);
    });
  });
});

describe('withBSBLanClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    agentInstances.length = 0;
  });

  it('should return the callback result and close the client', async () => {
    mockFetch.mockResolvedValueOnce(createMockJsonResponse(createMockInfoResponse()));

    const info = await withBSBLanClient({ host: '192.168.1.50' }, createMockLogger(), (client) => client.info());

    expect(info.deviceIdentification).toBe('RVS43.222/100');
    expect(agentInstances[0].close).toHaveBeenCalledTimes(1);
  });

  it('should close the client when the callback fails', async () => {
    mockFetch.mockResolvedValueOnce(createMockJsonResponse(createMockInfoResponse()));

    await expect(
      withBSBLanClient({ host: '192.168.1.50' }, createMockLogger(), async (client) => {
        await client.info();
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(agentInstances[0].close).toHaveBeenCalledTimes(1);
  });
});
