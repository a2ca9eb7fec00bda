/**
 * Linux Metric Source
 *
 * Reads host metrics from procfs/sysfs and the network stack. Each method
 * either returns a reading or throws a MetricUnavailableError; substituting
 * sentinels is left to the sampler.
 */

import { readFileSync, existsSync } from 'node:fs';
import { createSocket } from 'node:dgram';
import { networkInterfaces, totalmem, freemem } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import type { MemoryUsage, MetricSource } from '../types/index.js';
import { MetricUnavailableError, NetworkUnavailableError } from '../errors.js';

export interface LinuxMetricSourceOptions {
  /** Window over which /proc/stat deltas are taken */
  cpuSampleMs: number;
  ipLookupTimeoutMs: number;
  probeHost: string;
  probePort: number;
}

interface CPUStat {
  idle: number;
  total: number;
}

const PROC_STAT = '/proc/stat';
const PROC_MEMINFO = '/proc/meminfo';
const EMPTY_MAC = '00:00:00:00:00:00';

export const DEFAULT_METRIC_SOURCE_OPTIONS: LinuxMetricSourceOptions = {
  cpuSampleMs: 250,
  ipLookupTimeoutMs: 1000,
  probeHost: '8.8.8.8',
  probePort: 80,
};

export class LinuxMetricSource implements MetricSource {
  private options: LinuxMetricSourceOptions;

  constructor(options: Partial<LinuxMetricSourceOptions> = {}) {
    this.options = { ...DEFAULT_METRIC_SOURCE_OPTIONS, ...options };
  }

  /**
   * Reads a thermal zone file holding millidegrees Celsius
   */
  async readThermalZone(path: string): Promise<number | undefined> {
    if (!existsSync(path)) {
      return undefined;
    }

    const raw = readFileSync(path, 'utf8').trim();
    if (!/^[+-]?\d+$/.test(raw)) {
      return undefined;
    }
    return Number(raw) / 1000;
  }

  /**
   * Calculates CPU usage by diffing two /proc/stat samples
   */
  async cpuLoadPercent(): Promise<number> {
    if (!existsSync(PROC_STAT)) {
      throw new MetricUnavailableError('cpuLoad', `${PROC_STAT} not found`);
    }

    const first = this.readCPUStat();
    await sleep(this.options.cpuSampleMs);
    const second = this.readCPUStat();

    const totalDiff = second.total - first.total;
    const idleDiff = second.idle - first.idle;
    if (totalDiff <= 0) return 0;

    return Math.max(0, Math.min(100, ((totalDiff - idleDiff) / totalDiff) * 100));
  }

  private readCPUStat(): CPUStat {
    const cpuLine = readFileSync(PROC_STAT, 'utf8').split('\n')[0] ?? '';
    if (!cpuLine.startsWith('cpu')) {
      throw new MetricUnavailableError('cpuLoad', `Unexpected ${PROC_STAT} format`);
    }

    const values = cpuLine.trim().split(/\s+/).slice(1).map(Number);
    const field = (index: number): number => values[index] || 0;
    // user nice system idle iowait irq softirq steal
    const idle = field(3) + field(4);
    const total = [0, 1, 2, 3, 4, 5, 6, 7].reduce((sum, index) => sum + field(index), 0);

    return { idle, total };
  }

  /**
   * Used memory is MemTotal - MemAvailable; falls back to the os module
   * when /proc/meminfo is absent
   */
  async memoryUsage(): Promise<MemoryUsage> {
    if (!existsSync(PROC_MEMINFO)) {
      const totalBytes = totalmem();
      return { usedBytes: totalBytes - freemem(), totalBytes };
    }

    const lines = readFileSync(PROC_MEMINFO, 'utf8').split('\n');
    const getMemValue = (key: string): number | undefined => {
      const line = lines.find(l => l.startsWith(key));
      const match = line?.match(/(\d+)/);
      return match?.[1] !== undefined ? parseInt(match[1], 10) * 1024 : undefined;
    };

    const totalBytes = getMemValue('MemTotal:');
    const availableBytes = getMemValue('MemAvailable:') ?? getMemValue('MemFree:');
    if (totalBytes === undefined || availableBytes === undefined) {
      throw new MetricUnavailableError('memory', `Missing fields in ${PROC_MEMINFO}`);
    }

    return { usedBytes: totalBytes - availableBytes, totalBytes };
  }

  /**
   * Finds the local address of the default route by pointing a UDP socket at
   * the probe host. connect() on a datagram socket only selects a route; no
   * packet leaves the host.
   */
  localIPv4(): Promise<string> {
    const { probeHost, probePort, ipLookupTimeoutMs } = this.options;

    return new Promise<string>((resolve, reject) => {
      const socket = createSocket('udp4');
      let settled = false;

      const finish = (error: Error | undefined, address?: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.close();
        if (error) {
          reject(error);
        } else if (!address || address === '0.0.0.0') {
          reject(new NetworkUnavailableError('No local IPv4 address for the default route'));
        } else {
          resolve(address);
        }
      };

      const timer = setTimeout(() => {
        finish(new NetworkUnavailableError(`Route lookup timed out after ${ipLookupTimeoutMs}ms`));
      }, ipLookupTimeoutMs);

      socket.once('error', (error) => {
        finish(new NetworkUnavailableError(`Route lookup failed: ${error.message}`, { cause: error }));
      });

      try {
        socket.connect(probePort, probeHost, () => {
          finish(undefined, socket.address().address);
        });
      } catch (error) {
        finish(new NetworkUnavailableError('Route lookup failed', { cause: error }));
      }
    });
  }

  /**
   * MAC address of the first external interface, uppercase and colon separated
   */
  async hardwareMACAddress(): Promise<string> {
    const interfaces = networkInterfaces();
    const names = Object.keys(interfaces).sort();

    for (const name of names) {
      const entry = interfaces[name]?.find(info => !info.internal && info.mac !== EMPTY_MAC);
      if (entry) {
        return entry.mac.toUpperCase();
      }
    }

    throw new MetricUnavailableError('mac', 'No network interface with a hardware address');
  }
}
