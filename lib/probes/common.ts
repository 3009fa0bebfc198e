import type { Gauge, Style } from '../drawables';

export const UNSUPPORTED_LABEL = 'UNSUPPORTED';
export const UNSUPPORTED_STYLE: Style = { color: 'magenta', bold: true };

export function unsupportedGauge(title: string): Gauge {
  return {
    kind: 'gauge',
    height: 3,
    border: true,
    title: [{ text: title }],
    percent: 0,
    label: UNSUPPORTED_LABEL,
    labelAlign: 'center',
    labelStyle: UNSUPPORTED_STYLE,
    barStyle: {},
  };
}


/**
 * strconv.ParseBool-style: 1/t/true and 0/f/false in any case
 */
export function parseBoolean(raw: string): boolean | null {
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 't' || value === 'true') return true;
  if (value === '0' || value === 'f' || value === 'false') return false;
  return null;
}
