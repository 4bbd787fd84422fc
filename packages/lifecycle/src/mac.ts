import type { MacAddress } from './types.js';

export function formatMacAddress(mac: MacAddress): string {
  return mac.map(byte => byte.toString(16).padStart(2, '0')).join(':');
}

/**
 * Parse `aa:bb:cc:dd:ee:ff` (case-insensitive). Returns undefined for anything else.
 */
export function parseMacAddress(text: string): MacAddress | undefined {
  const parts = text.trim().split(':');
  if (parts.length !== 6 || !parts.every(part => /^[0-9a-f]{2}$/i.test(part))) {
    return undefined;
  }
  return parts.map(part => parseInt(part, 16));
}
