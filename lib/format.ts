/**
 * Text helpers shared by probes
 */
import type { Style } from './drawables';

const ANSI_REGEX = /\x1B\[[0-9;?]*[A-Za-z]/g;

function visibleLength(str: string) {
  return [...str].length;
}

export function stripAnsi(str: string) {
  return str.replace(ANSI_REGEX, '');
}

export function rightJustify(width: number, str: string) {
  const pad = width - visibleLength(str);
  return pad > 0 ? ' '.repeat(pad) + str : str;
}

export function centerString(width: number, str: string) {
  const start = Math.floor(width / 2) - Math.floor(visibleLength(str) / 2);
  return start > 0 ? ' '.repeat(start) + str : str;
}

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

export function prettyBytes(bytes: number) {
  if (bytes > GB) return `${(bytes / GB).toFixed(2)}G`;
  if (bytes > MB) return `${(bytes / MB).toFixed(2)}M`;
  if (bytes > KB) return `${(bytes / KB).toFixed(2)}K`;
  return `${String(bytes)}bytes`;
}

/**
 * Colour for a value in [min, max].
 *
 * Normally high is good (free disk, battery). With `invert` high is bad (CPU, load).
 */
export function percentStyle(value: number, min: number, max: number, invert: boolean): Style {
  const span = max - min;

  if (invert) {
    if (value > 0.90 * span) return { color: 'red', bold: true };
    if (value > 0.75 * span) return { color: 'red' };
    if (value > 0.50 * span) return { color: 'yellow', bold: true };
    if (value > 0.25 * span) return { color: 'green' };
    if (value > 0.05 * span) return { color: 'green', bold: true };
    return { color: 'blue', bold: true };
  }

  if (value < 0.10 * span) return { color: 'red', bold: true };
  if (value < 0.25 * span) return { color: 'red' };
  if (value < 0.50 * span) return { color: 'yellow', bold: true };
  if (value < 0.75 * span) return { color: 'green' };
  if (value < 0.95 * span) return { color: 'green', bold: true };
  return { color: 'blue', bold: true };
}

function pad2(value: number) {
  return String(value).padStart(2, '0');
}

export function formatClockLabel(date: Date) {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function formatTimestamp(date: Date) {
  const zone = new Intl.DateTimeFormat('en-US', { timeZoneName: 'short' })
    .formatToParts(date)
    .find(part => part.type === 'timeZoneName')?.value ?? '';
  const day = `${String(date.getFullYear())}/${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return zone.length > 0 ? `${day} ${time} ${zone}` : `${day} ${time}`;
}

export function formatUptime(totalSeconds: number) {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: Array<string> = [];
  if (days > 0) parts.push(`${String(days)}d`);
  if (days > 0 || hours > 0) parts.push(`${String(hours)}h`);
  if (days > 0 || hours > 0 || minutes > 0) parts.push(`${String(minutes)}m`);
  parts.push(`${String(secs)}s`);
  return parts.join(' ');
}
