import { mkdir, writeFile } from 'fs/promises';
import path from 'path';

import { EncryptionType, type ApDaemonSettings, type HostapdController } from '@wlanctl/lifecycle';
import type { Logger } from '@wlanctl/logging';

import type { CommandRunner } from './exec.js';
import { ManagedProcess, type ProcessSpawner } from './process.js';

const MAX_SSID_BYTES = 32;
const MIN_PASSPHRASE_LENGTH = 8;
const MAX_PASSPHRASE_LENGTH = 63;

export interface HostapdManagerOptions {
  binary: string;
  args?: readonly string[];
  configPath: string;
  dualConfigPath: string;
  controlInterface?: string;
  logger: Logger;
  spawner?: ProcessSpawner;
  runner?: CommandRunner;
}

/**
 * hostapd process control and minimal config generation.
 * Single and dual mode run as separate processes with separate config files.
 */
export class HostapdManager implements HostapdController {
  private readonly logger: Logger;
  private readonly single: ManagedProcess;
  private readonly dual: ManagedProcess;

  constructor(private readonly options: HostapdManagerOptions) {
    this.logger = options.logger.child('hostapd');
    const processOptions = {
      binary: options.binary,
      logger: this.logger,
      ...(options.spawner && { spawner: options.spawner }),
      ...(options.runner && { runner: options.runner }),
    };
    this.single = new ManagedProcess(processOptions);
    this.dual = new ManagedProcess(processOptions);
  }

  buildConfig(interfaceName: string, settings: ApDaemonSettings): string {
    const { ssid, passphrase, channel, encryption, hidden } = settings;

    if (ssid.length === 0 || ssid.length > MAX_SSID_BYTES) {
      this.logger.error(`Invalid SSID length: ${ssid.length}`);
      return '';
    }
    if (!Number.isInteger(channel) || channel < 1 || channel > 196) {
      this.logger.error(`Invalid channel: ${channel}`);
      return '';
    }

    const lines = [
      `interface=${interfaceName}`,
      'driver=nl80211',
      `ctrl_interface=${this.options.controlInterface ?? '/var/run/hostapd'}`,
      `ssid2=${Buffer.from(ssid).toString('hex')}`,
      `hw_mode=${channel <= 14 ? 'g' : 'a'}`,
      `channel=${channel}`,
      `ignore_broadcast_ssid=${hidden ? 1 : 0}`,
    ];

    if (encryption !== EncryptionType.OPEN) {
      const secret = Buffer.from(passphrase).toString('utf8');
      if (secret.length < MIN_PASSPHRASE_LENGTH || secret.length > MAX_PASSPHRASE_LENGTH) {
        this.logger.error('Passphrase must be 8 to 63 characters');
        return '';
      }
      lines.push(
        `wpa=${encryption === EncryptionType.WPA ? 1 : 2}`,
        'wpa_key_mgmt=WPA-PSK',
        `${encryption === EncryptionType.WPA ? 'wpa_pairwise' : 'rsn_pairwise'}=CCMP`,
        `wpa_passphrase=${secret}`
      );
    }

    return `${lines.join('\n')}\n`;
  }

  async writeConfig(config: string, dual: boolean): Promise<boolean> {
    const file = this.configPath(dual);
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(file, config, { encoding: 'utf8', mode: 0o600 });
      this.logger.debug('Wrote hostapd config', { file });
      return true;
    } catch (error) {
      this.logger.error(`Failed to write hostapd config to ${file}`, error);
      return false;
    }
  }

  start(dual: boolean): Promise<boolean> {
    return this.process(dual).start([...(this.options.args ?? []), this.configPath(dual)]);
  }

  stop(dual: boolean): Promise<boolean> {
    return this.process(dual).stop();
  }

  private process(dual: boolean): ManagedProcess {
    return dual ? this.dual : this.single;
  }

  private configPath(dual: boolean): string {
    return dual ? this.options.dualConfigPath : this.options.configPath;
  }
}
