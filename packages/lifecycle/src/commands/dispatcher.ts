import { CommandParseError, ConflictError, failure, success, type Result } from '@wlanctl/errors';
import type { Logger } from '@wlanctl/logging';

import type { VendorTool } from '../collaborators.js';
import type { AccessPointInterfaceController } from '../controllers/ap-interface.js';
import type { InterfaceLifecycleManager } from '../manager.js';

export const DEFAULT_MAX_COMMAND_TOKENS = 10;

export interface CommandDispatcherOptions {
  maxTokens?: number;
}

/**
 * The access point started through `startap`, owned until `stopap` succeeds
 */
export interface ApSession {
  readonly controller: AccessPointInterfaceController;
  readonly dual: boolean;
  readonly startedAt: Date;
}

/**
 * Executes whitespace-separated vendor commands of the form `<prefix> <verb> [args...]`.
 * The prefix token is not inspected.
 */
export class CommandDispatcher {
  private readonly logger: Logger;
  private readonly maxTokens: number;
  private session: ApSession | undefined;

  constructor(
    private readonly manager: InterfaceLifecycleManager,
    private readonly vendorTool: VendorTool,
    logger: Logger,
    options: CommandDispatcherOptions = {}
  ) {
    this.logger = logger.child('commands');
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_COMMAND_TOKENS;
  }

  /**
   * The current session. A session whose controller was released by a teardown outside
   * the dispatcher is discarded.
   */
  getSession(): ApSession | undefined {
    if (this.session?.controller.isReleased()) {
      this.logger.debug('Discarding AP session of a released interface', {
        interface: this.session.controller.getName(),
      });
      this.session = undefined;
    }
    return this.session;
  }

  dump(): string {
    const session = this.getSession();
    if (!session) {
      return 'AP session: none';
    }
    return [
      'AP session:',
      `  Interface name: ${session.controller.getName()}`,
      `  Mode: ${session.dual ? 'dual' : 'single'}`,
      `  Started at: ${session.startedAt.toISOString()}`,
    ].join('\n');
  }

  async execute(command: Uint8Array | string): Promise<boolean> {
    const text = typeof command === 'string' ? command : Buffer.from(command).toString('utf8');
    this.logger.info(`Command: ${text}`, { length: Buffer.byteLength(text, 'utf8') });

    const tokens = this.tokenize(text);
    if (!tokens.success) {
      this.logger.error(tokens.error.message, tokens.error);
      return false;
    }

    try {
      return await this.dispatch(tokens.data);
    } catch (error) {
      this.logger.error(`Command failed: ${text}`, error);
      return false;
    }
  }

  private tokenize(text: string): Result<string[], CommandParseError> {
    const tokens = text.split(/\s+/).filter(token => token.length > 0);
    if (tokens.length > this.maxTokens) {
      return failure(
        new CommandParseError('Command too long', {
          context: { operation: 'tokenize_command', component: 'command-dispatcher' },
          data: { tokens: tokens.length, maxTokens: this.maxTokens },
        })
      );
    }
    return success(tokens);
  }

  private async dispatch(tokens: string[]): Promise<boolean> {
    const [, verb = '', modifier = ''] = tokens;

    if (tokens.length > 2) {
      switch (verb) {
        case 'qccmd':
          return this.vendorTool.exec(tokens);
        case 'create':
          return this.vendorTool.addOrRemoveInterface(modifier, true);
        case 'remove':
          return this.vendorTool.addOrRemoveInterface(modifier, false);
        case 'bridge':
          return this.vendorTool.controlBridge(tokens);
        case 'setsoftap':
          return this.vendorTool.setSoftap(tokens);
        case 'startap':
          if (modifier === 'dual') {
            return this.startDualAp(tokens);
          }
          break;
        case 'stopap':
          if (modifier === 'dual') {
            return this.stopAp(true);
          }
          break;
      }
    } else if (tokens.length === 2) {
      if (verb === 'startap') {
        return this.startAp();
      }
      if (verb === 'stopap') {
        return this.stopAp(false);
      }
    }

    const error = new CommandParseError(`Wrong/Unknown command: ${tokens.join(' ')}`, {
      context: { operation: 'dispatch_command', component: 'command-dispatcher' },
    });
    this.logger.error(error.message, error);
    return false;
  }

  private async startAp(): Promise<boolean> {
    if (this.rejectIfSessionActive()) {
      return false;
    }

    const created = await this.manager.createAccessPointInterface();
    if (!created.success) {
      this.logger.error('Failed to create AP interface', created.error);
      return false;
    }

    this.session = { controller: created.data, dual: false, startedAt: new Date() };

    const started = await created.data.startDaemon(false);
    if (!started.success) {
      this.logger.error('Failed to start hostapd', started.error);
      return false;
    }

    this.logger.info('hostapd started', { interface: created.data.getName() });
    return true;
  }

  /**
   * `<prefix> startap dual <bridge> <iface0> <iface1>`. Interfaces created before a failure
   * stay in place; `stopap dual` cleans them up.
   */
  private async startDualAp(tokens: string[]): Promise<boolean> {
    const [, , , bridge, first, second] = tokens;
    if (bridge === undefined || first === undefined || second === undefined) {
      this.logger.error('Need additional args <bridge, sap0, sap1> to start dual AP');
      return false;
    }

    if (this.rejectIfSessionActive()) {
      return false;
    }

    const bridgeAp = await this.manager.createNamedAccessPointInterface(bridge);
    if (!bridgeAp.success) {
      this.logger.error(`Failed to create AP interface ${bridge}`, bridgeAp.error);
      return false;
    }
    this.session = { controller: bridgeAp.data, dual: true, startedAt: new Date() };

    for (const name of [first, second]) {
      const created = await this.manager.createNamedAccessPointInterface(name);
      if (!created.success) {
        this.logger.error(`Failed to create AP interface ${name}`, created.error);
        return false;
      }
    }

    const started = await bridgeAp.data.startDaemon(true);
    if (!started.success) {
      this.logger.error('Failed to start dual hostapd', started.error);
      return false;
    }

    this.logger.info('Dual hostapd started', { bridge, interfaces: [first, second] });
    return true;
  }

  private async stopAp(dual: boolean): Promise<boolean> {
    const session = this.getSession();
    if (!session || this.manager.listApInterfaces().length === 0) {
      this.logger.error('Failed to stop hostapd: no active AP session');
      return false;
    }

    if (session.dual !== dual) {
      this.logger.error('Failed to stop hostapd: session mode mismatch', undefined, {
        sessionDual: session.dual,
        requestedDual: dual,
      });
      return false;
    }

    const stopped = await session.controller.stopDaemon(dual);
    if (!stopped.success) {
      this.logger.error('Failed to stop hostapd', stopped.error);
      return false;
    }

    await this.manager.tearDownApInterfaces();
    this.session = undefined;
    this.logger.info('hostapd stopped', { dual });
    return true;
  }

  private rejectIfSessionActive(): boolean {
    const session = this.getSession();
    if (!session) {
      return false;
    }

    const error = new ConflictError('An AP session is already active', {
      context: { operation: 'start_ap', component: 'command-dispatcher' },
      data: {
        interface: session.controller.getName(),
        dual: session.dual,
        startedAt: session.startedAt.toISOString(),
      },
    });
    this.logger.error(error.message, error);
    return true;
  }
}
