/**
 * Parsers for `iw` output
 */

import { StationEventKind, parseMacAddress, type BandInfo, type MacAddress } from '@wlanctl/lifecycle';

export interface IwDevEntry {
  phy: number;
  name: string;
  ifindex: number;
  macAddress: MacAddress;
  type: string;
}

/**
 * Parse `iw dev`. Entries without an ifindex or a valid address are skipped.
 */
export function parseIwDev(output: string): IwDevEntry[] {
  const entries: IwDevEntry[] = [];
  let phy: number | undefined;
  let current: Partial<IwDevEntry> | undefined;

  const flush = (): void => {
    if (
      current?.name !== undefined &&
      current.phy !== undefined &&
      current.ifindex !== undefined &&
      current.macAddress !== undefined
    ) {
      entries.push({
        phy: current.phy,
        name: current.name,
        ifindex: current.ifindex,
        macAddress: current.macAddress,
        type: current.type ?? 'unknown',
      });
    }
    current = undefined;
  };

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();

    const phyMatch = line.match(/^phy#(\d+)$/);
    if (phyMatch?.[1] !== undefined) {
      flush();
      phy = parseInt(phyMatch[1], 10);
      continue;
    }

    const interfaceMatch = line.match(/^Interface (\S+)$/);
    if (interfaceMatch?.[1] !== undefined) {
      flush();
      current = { name: interfaceMatch[1], ...(phy !== undefined && { phy }) };
      continue;
    }

    if (!current) {
      continue;
    }

    const [key, value] = line.split(/\s+/, 2);
    if (value === undefined) {
      continue;
    }

    switch (key) {
      case 'ifindex':
        current.ifindex = parseInt(value, 10);
        break;
      case 'addr': {
        const mac = parseMacAddress(value);
        if (mac) {
          current.macAddress = mac;
        }
        break;
      }
      case 'type':
        current.type = value;
        break;
    }
  }

  flush();
  return entries;
}

/**
 * Collect enabled frequencies from `iw phy <phy> info`, split into 2.4 GHz, 5 GHz and
 * 5 GHz DFS (radar detection) channels. Other bands are ignored.
 */
export function parseIwPhyBands(output: string): BandInfo {
  const band2g: number[] = [];
  const band5g: number[] = [];
  const bandDfs: number[] = [];

  for (const line of output.split('\n')) {
    const match = line.match(/^\s*\*\s+(\d+)(?:\.\d+)?\s+MHz\b/);
    if (match?.[1] === undefined || line.includes('(disabled)')) {
      continue;
    }

    const frequency = parseInt(match[1], 10);
    if (frequency >= 2400 && frequency < 2500) {
      band2g.push(frequency);
    } else if (frequency >= 4900 && frequency < 5900) {
      (line.includes('radar detection') ? bandDfs : band5g).push(frequency);
    }
  }

  return { band2g, band5g, bandDfs };
}

export type IwEvent =
  | {
      type: 'station';
      interfaceName: string;
      kind: StationEventKind;
      macAddress: MacAddress;
    }
  | {
      type: 'reg-change';
      /** Absent when the kernel reported a global change */
      phy?: number;
      countryCode: string;
    };

const STATION_EVENT = /^(\S+?)(?: \(phy #\d+\))?: (new|del) station ([0-9a-fA-F:]{17})\b/;
const REG_CHANGE_EVENT = /^(?:phy #(\d+): )?regulatory domain change: (.*)$/;

/**
 * Parse one line of `iw event` output. Lines that are not station or regulatory-domain
 * events return undefined.
 */
export function parseIwEventLine(line: string): IwEvent | undefined {
  // `iw event -t` prefixes a timestamp
  const text = line.trim().replace(/^\d+\.\d+: /, '');

  const station = text.match(STATION_EVENT);
  if (station?.[1] !== undefined && station[2] !== undefined && station[3] !== undefined) {
    const macAddress = parseMacAddress(station[3]);
    if (!macAddress) {
      return undefined;
    }
    return {
      type: 'station',
      interfaceName: station[1],
      kind: station[2] === 'new' ? StationEventKind.JOINED : StationEventKind.LEFT,
      macAddress,
    };
  }

  const regChange = text.match(REG_CHANGE_EVENT);
  if (regChange?.[2] !== undefined) {
    const country = regChange[2].match(/set to ([A-Z0-9]{2})\b/)?.[1] ?? '';
    return {
      type: 'reg-change',
      ...(regChange[1] !== undefined && { phy: parseInt(regChange[1], 10) }),
      countryCode: country,
    };
  }

  return undefined;
}
