import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { createInterface } from 'readline';
import { fileURLToPath } from 'url';

import { ConfigValidationError } from '@wlanctl/configuration';
import { formatMacAddress } from '@wlanctl/lifecycle';
import { LoggerFactory, type Logger } from '@wlanctl/logging';
import { Command } from 'commander';

import { DEFAULT_CONFIG_PATH, createConfigManager, type WlanctlConfig } from './config.js';
import { WlanDaemon, createDaemonLogger, createSystemBackend } from './daemon.js';

interface ConfigCommandOptions {
  config: string;
}

interface RunCommandOptions extends ConfigCommandOptions {
  stdin?: boolean;
}

interface QueryCommandOptions extends ConfigCommandOptions {
  json?: boolean;
}

const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');

function readVersion(): string {
  const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
  return packageJson.version ?? '0.0.0';
}

const defaultConfigPath = (): string => process.env.WLANCTL_CONFIG ?? DEFAULT_CONFIG_PATH;

async function loadConfig(path: string, logger: Logger): Promise<WlanctlConfig | undefined> {
  try {
    return await createConfigManager(path).loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      logger.error(`Invalid configuration in ${path}`);
      error.getFormattedErrors().forEach(issue => logger.error(`  ${issue}`));
    } else {
      logger.error(`Failed to load configuration from ${path}`, error);
    }
    process.exitCode = 1;
    return undefined;
  }
}

async function runDaemon(options: RunCommandOptions, cliLogger: Logger): Promise<void> {
  const config = await loadConfig(options.config, cliLogger);
  if (!config) {
    return;
  }

  const logger = createDaemonLogger(config.logging);
  const daemon = new WlanDaemon(config, logger);
  // Keeps the event loop alive while idle
  const keepAlive = setInterval(() => undefined, 60_000);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn('Force exit requested');
      process.exit(1);
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, tearing down interfaces`);
    clearInterval(keepAlive);
    await daemon.stop();
    await logger.close();
    process.exit(process.exitCode ?? 0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  process.on('SIGUSR1', () => logger.info(`State dump:\n${daemon.dump()}`));

  const started = await daemon.start();
  if (!started.success) {
    logger.error('Failed to start daemon', started.error);
    process.exitCode = 1;
    await shutdown('startup failure');
    return;
  }

  if (options.stdin) {
    const lines = createInterface({ input: process.stdin });
    lines.on('line', line => {
      daemon
        .execute(line)
        .then(ok => logger.info(`${ok ? 'OK' : 'FAIL'}: ${line}`))
        .catch((error: unknown) => logger.error(`Command failed: ${line}`, error));
    });
  }
}

async function printInterfaces(options: QueryCommandOptions, cliLogger: Logger): Promise<void> {
  const config = await loadConfig(options.config, cliLogger);
  if (!config) {
    return;
  }

  const { netlink } = createSystemBackend(config, cliLogger);
  const radio = await netlink.resolveRadio(config.radio.base_interface);
  if (radio === undefined) {
    cliLogger.error(`No radio found for ${config.radio.base_interface}`);
    process.exitCode = 1;
    return;
  }

  const interfaces = await netlink.enumerateInterfaces(radio);
  if (options.json) {
    cliLogger.info(
      JSON.stringify(
        interfaces.map(iface => ({ ...iface, macAddress: formatMacAddress(iface.macAddress) })),
        null,
        2
      )
    );
    return;
  }

  cliLogger.info(`Radio phy${radio}:`);
  interfaces.forEach(iface => {
    cliLogger.info(`  ${iface.kernelIndex} ${iface.name} ${formatMacAddress(iface.macAddress)}`);
  });
}

async function printBands(options: QueryCommandOptions, cliLogger: Logger): Promise<void> {
  const config = await loadConfig(options.config, cliLogger);
  if (!config) {
    return;
  }

  const { netlink } = createSystemBackend(config, cliLogger);
  const radio = await netlink.resolveRadio(config.radio.base_interface);
  if (radio === undefined) {
    cliLogger.error(`No radio found for ${config.radio.base_interface}`);
    process.exitCode = 1;
    return;
  }

  const bands = await netlink.getSupportedBands(radio);
  if (options.json) {
    cliLogger.info(JSON.stringify(bands, null, 2));
    return;
  }

  cliLogger.info(`2.4 GHz: ${bands.band2g.join(' ')}`);
  cliLogger.info(`5 GHz: ${bands.band5g.join(' ')}`);
  cliLogger.info(`5 GHz DFS: ${bands.bandDfs.join(' ')}`);
}

/**
 * The `wlanctl` command line
 */
export function createProgram(cliLogger: Logger = LoggerFactory.createConsoleLogger('cli')): Command {
  const program = new Command();

  program
    .name('wlanctl')
    .description('Wireless station and access point interface lifecycle daemon')
    .version(readVersion());

  program
    .command('run')
    .description('Run the daemon (SIGUSR1 logs a state dump, SIGINT/SIGTERM tear down)')
    .option('-c, --config <path>', 'Configuration file', defaultConfigPath())
    .option('--stdin', 'Execute vendor commands read line by line from standard input')
    .action((options: RunCommandOptions) => runDaemon(options, cliLogger));

  program
    .command('interfaces')
    .description('List the interfaces of the configured radio')
    .option('-c, --config <path>', 'Configuration file', defaultConfigPath())
    .option('--json', 'Output as JSON')
    .action((options: QueryCommandOptions) => printInterfaces(options, cliLogger));

  program
    .command('bands')
    .description('List the frequencies the configured radio supports')
    .option('-c, --config <path>', 'Configuration file', defaultConfigPath())
    .option('--json', 'Output as JSON')
    .action((options: QueryCommandOptions) => printBands(options, cliLogger));

  program
    .command('check-config')
    .description('Validate a configuration file')
    .option('-c, --config <path>', 'Configuration file', defaultConfigPath())
    .action(async (options: ConfigCommandOptions) => {
      const config = await loadConfig(options.config, cliLogger);
      if (config) {
        cliLogger.info(`Configuration ${options.config} is valid`);
      }
    });

  return program;
}
