/**
 * Line formatting for each metric shown on the panel.
 */

import type { MemoryUsage, MetricLine } from '../types/index.js';

export const UNAVAILABLE = 'N/A';
export const LOOPBACK_IPV4 = '127.0.0.1';

const MIB = 1024 * 1024;

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** dd.mm.yyyy HH:MM:SS in local time */
export function formatDateTime(date: Date): string {
  const day = `${pad2(date.getDate())}.${pad2(date.getMonth() + 1)}.${date.getFullYear()}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function ipv4Line(address: string, available = true): MetricLine {
  return { metric: 'ipv4', text: `IPv4: ${address}`, available };
}

export function macLine(mac: string | undefined): MetricLine {
  return {
    metric: 'mac',
    text: `MAC: ${mac ?? UNAVAILABLE}`,
    available: mac !== undefined,
  };
}

export function dateTimeLine(date: Date): MetricLine {
  return { metric: 'datetime', text: formatDateTime(date), available: true };
}

export function temperatureLine(cpu: number | undefined, hotspot: number | undefined): MetricLine {
  const format = (value: number | undefined): string =>
    value === undefined ? UNAVAILABLE : value.toFixed(1);

  return {
    metric: 'temperature',
    text: `CPU/Hotspot: ${format(cpu)}/${format(hotspot)}°C`,
    available: cpu !== undefined && hotspot !== undefined,
  };
}

export function cpuLoadLine(percent: number | undefined): MetricLine {
  return {
    metric: 'cpuLoad',
    text: percent === undefined ? `CPU Load: ${UNAVAILABLE}` : `CPU Load: ${percent.toFixed(1)}%`,
    available: percent !== undefined,
  };
}

export function memoryLine(usage: MemoryUsage | undefined): MetricLine {
  if (!usage) {
    return { metric: 'memory', text: `RAM: ${UNAVAILABLE}`, available: false };
  }

  const used = (usage.usedBytes / MIB).toFixed(1);
  const total = (usage.totalBytes / MIB).toFixed(1);
  return { metric: 'memory', text: `RAM: ${used}/${total} MB`, available: true };
}
