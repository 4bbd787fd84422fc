/**
 * Daemon configuration (`wlanctl.yaml`)
 */

import {
  ConfigManager,
  ExecutableConfigSchema,
  LoggingConfigSchema,
  z,
  type ConfigOptions,
} from '@wlanctl/configuration';
import {
  DEFAULT_MAX_COMMAND_TOKENS,
  DEFAULT_RESERVED_STATION_NAMES,
  DEFAULT_RESERVED_STATION_PREFIXES,
  EncryptionType,
  type ApDaemonSettings,
} from '@wlanctl/lifecycle';

export const DEFAULT_CONFIG_PATH = '/etc/wlanctl/wlanctl.yaml';

const AccessPointSchema = z.object({
  ssid: z.string().min(1).max(32),
  hidden: z.boolean().default(false),
  channel: z.number().int().min(1).default(6),
  encryption: z.nativeEnum(EncryptionType).default(EncryptionType.WPA2),
  passphrase: z.string().default(''),
});

export const WlanctlConfigSchema = z.object({
  radio: z
    .object({
      base_interface: z.string().min(1).default('wlan0'),
      reserved_station_names: z.array(z.string()).default([...DEFAULT_RESERVED_STATION_NAMES]),
      reserved_station_prefixes: z
        .array(z.string())
        .default([...DEFAULT_RESERVED_STATION_PREFIXES]),
    })
    .default({}),
  commands: z
    .object({
      max_tokens: z.number().int().min(2).default(DEFAULT_MAX_COMMAND_TOKENS),
    })
    .default({}),
  tools: z
    .object({
      iw: z.string().min(1).default('iw'),
      ip: z.string().min(1).default('ip'),
    })
    .default({}),
  hostapd: ExecutableConfigSchema.extend({
    binary: z.string().min(1).default('/usr/sbin/hostapd'),
    config_path: z.string().min(1).default('/var/run/wlanctl/hostapd.conf'),
    dual_config_path: z.string().min(1).default('/var/run/wlanctl/hostapd_dual.conf'),
    ctrl_interface: z.string().min(1).default('/var/run/hostapd'),
  }).default({}),
  supplicant: ExecutableConfigSchema.extend({
    binary: z.string().min(1).default('/usr/sbin/wpa_supplicant'),
    args: z
      .array(z.string())
      .default(['-i', 'wlan0', '-c', '/etc/wpa_supplicant/wpa_supplicant.conf']),
  }).default({}),
  vendor_tool: z
    .object({
      enabled: z.boolean().default(false),
      path: z.string().min(1).default('/usr/bin/qsap-cli'),
    })
    .default({}),
  startup: z
    .object({
      station: z.boolean().default(false),
      enable_supplicant: z.boolean().default(false),
      access_point: AccessPointSchema.optional(),
    })
    .default({}),
  logging: LoggingConfigSchema.default({}),
});

export type WlanctlConfig = z.infer<typeof WlanctlConfigSchema>;
export type AccessPointConfig = z.infer<typeof AccessPointSchema>;

export function createConfigManager(
  configPath: string,
  options: ConfigOptions = {}
): ConfigManager<WlanctlConfig> {
  return new ConfigManager(configPath, WlanctlConfigSchema, options);
}

export function toApDaemonSettings(config: AccessPointConfig): ApDaemonSettings {
  const encoder = new TextEncoder();
  return {
    ssid: encoder.encode(config.ssid),
    hidden: config.hidden,
    channel: config.channel,
    encryption: config.encryption,
    passphrase: encoder.encode(config.passphrase),
  };
}
