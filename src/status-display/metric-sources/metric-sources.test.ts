/**
 * Unit Tests for LinuxMetricSource
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { readFileSync, existsSync } from 'node:fs';
import { networkInterfaces, totalmem, freemem, type NetworkInterfaceInfo } from 'node:os';
import { LinuxMetricSource } from './metric-sources.js';
import { MetricUnavailableError, NetworkUnavailableError } from '../errors.js';

interface FakeSocketBehaviour {
  mode: 'connect' | 'error' | 'hang' | 'throw';
  address: string;
  closed: number;
}

const dgramState = vi.hoisted<FakeSocketBehaviour>(() => ({ mode: 'connect', address: '192.168.1.50', closed: 0 }));

vi.mock('node:fs', () => ({ readFileSync: vi.fn(), existsSync: vi.fn() }));
vi.mock('node:os', () => ({ networkInterfaces: vi.fn(), totalmem: vi.fn(), freemem: vi.fn() }));
vi.mock('node:dgram', async () => {
  const { EventEmitter } = await import('node:events');
  return {
    createSocket: vi.fn(() => {
      const socket = new EventEmitter();
      return Object.assign(socket, {
        connect: (_port: number, _host: string, callback: () => void) => {
          if (dgramState.mode === 'throw') {
            throw new Error('Socket is already connected');
          }
          if (dgramState.mode === 'connect') {
            setImmediate(callback);
          } else if (dgramState.mode === 'error') {
            setImmediate(() => socket.emit('error', new Error('connect ENETUNREACH')));
          }
        },
        address: () => ({ address: dgramState.address, family: 'IPv4', port: 40000 }),
        close: () => {
          dgramState.closed++;
        },
      });
    }),
  };
});

const mockReadFileSync = vi.mocked(readFileSync);
const mockExistsSync = vi.mocked(existsSync);
const mockNetworkInterfaces = vi.mocked(networkInterfaces);

const iface = (mac: string, internal: boolean): NetworkInterfaceInfo => ({
  address: internal ? '127.0.0.1' : '10.0.0.2',
  netmask: '255.0.0.0',
  family: 'IPv4',
  mac,
  internal,
  cidr: null,
});

describe('LinuxMetricSource', () => {
  let source: LinuxMetricSource;

  beforeEach(() => {
    vi.clearAllMocks();
    dgramState.mode = 'connect';
    dgramState.address = '192.168.1.50';
    dgramState.closed = 0;
    source = new LinuxMetricSource({ cpuSampleMs: 1, ipLookupTimeoutMs: 20 });
  });

  describe('readThermalZone', () => {
    const zone = '/sys/class/thermal/thermal_zone0/temp';

    it('should convert millidegrees to degrees Celsius', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue('45123\n');

      await expect(source.readThermalZone(zone)).resolves.toBe(45.123);
      expect(mockReadFileSync).toHaveBeenCalledWith(zone, 'utf8');
    });

    it('should report a missing zone file as unavailable', async () => {
      mockExistsSync.mockReturnValue(false);

      await expect(source.readThermalZone(zone)).resolves.toBeUndefined();
      expect(mockReadFileSync).not.toHaveBeenCalled();
    });

    it('should report unparsable content as unavailable', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue('garbage');

      await expect(source.readThermalZone(zone)).resolves.toBeUndefined();
    });

    it('should reject a reading with trailing characters', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue('45123abc\n');

      await expect(source.readThermalZone(zone)).resolves.toBeUndefined();
    });

    it('should accept a negative reading', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue('-5000\n');

      await expect(source.readThermalZone(zone)).resolves.toBe(-5);
    });
  });

  describe('cpuLoadPercent', () => {
    it('should compute busy time between two /proc/stat samples', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync
        .mockReturnValueOnce('cpu  100 0 50 1000 0 0 0 0 0 0\ncpu0 1 2 3 4\n')
        .mockReturnValueOnce('cpu  150 0 100 1100 0 0 0 0 0 0\ncpu0 1 2 3 4\n');

      await expect(source.cpuLoadPercent()).resolves.toBe(50);
    });

    it('should return 0 when no ticks elapsed', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue('cpu  100 0 50 1000 0 0 0 0 0 0\n');

      await expect(source.cpuLoadPercent()).resolves.toBe(0);
    });

    it('should throw MetricUnavailableError without /proc/stat', async () => {
      mockExistsSync.mockReturnValue(false);

      await expect(source.cpuLoadPercent()).rejects.toBeInstanceOf(MetricUnavailableError);
    });
  });

  describe('memoryUsage', () => {
    it('should compute used memory from MemTotal and MemAvailable', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue('MemTotal: 4194304 kB\nMemFree: 100 kB\nMemAvailable: 3145728 kB\n');

      await expect(source.memoryUsage()).resolves.toEqual({
        usedBytes: 1048576 * 1024,
        totalBytes: 4194304 * 1024,
      });
    });

    it('should fall back to the os module without /proc/meminfo', async () => {
      mockExistsSync.mockReturnValue(false);
      vi.mocked(totalmem).mockReturnValue(1000);
      vi.mocked(freemem).mockReturnValue(400);

      await expect(source.memoryUsage()).resolves.toEqual({ usedBytes: 600, totalBytes: 1000 });
    });

    it('should throw when meminfo lacks the totals', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue('SwapTotal: 0 kB\n');

      await expect(source.memoryUsage()).rejects.toThrow('Missing fields in /proc/meminfo');
    });
  });

  describe('hardwareMACAddress', () => {
    it('should return the first external interface address in uppercase', async () => {
      mockNetworkInterfaces.mockReturnValue({
        lo: [iface('00:00:00:00:00:00', true)],
        wlan0: [iface('aa:bb:cc:00:11:22', false)],
        eth0: [iface('de:ad:be:ef:00:01', false)],
      });

      await expect(source.hardwareMACAddress()).resolves.toBe('DE:AD:BE:EF:00:01');
    });

    it('should throw when only loopback interfaces exist', async () => {
      mockNetworkInterfaces.mockReturnValue({ lo: [iface('00:00:00:00:00:00', true)] });

      await expect(source.hardwareMACAddress()).rejects.toBeInstanceOf(MetricUnavailableError);
    });
  });

  describe('localIPv4', () => {
    it('should return the local address of the route lookup socket', async () => {
      await expect(source.localIPv4()).resolves.toBe('192.168.1.50');
      expect(dgramState.closed).toBe(1);
    });

    it('should reject an unspecified local address', async () => {
      dgramState.address = '0.0.0.0';

      await expect(source.localIPv4()).rejects.toBeInstanceOf(NetworkUnavailableError);
    });

    it('should reject when the socket reports an error', async () => {
      dgramState.mode = 'error';

      await expect(source.localIPv4()).rejects.toThrow('Route lookup failed: connect ENETUNREACH');
      expect(dgramState.closed).toBe(1);
    });

    it('should reject when connect throws', async () => {
      dgramState.mode = 'throw';

      await expect(source.localIPv4()).rejects.toThrow('Route lookup failed');
    });

    it('should time out when no route answer arrives', async () => {
      dgramState.mode = 'hang';

      await expect(source.localIPv4()).rejects.toThrow('Route lookup timed out after 20ms');
      expect(dgramState.closed).toBe(1);
    });
  });
});
