import {
  ConflictError,
  DaemonStartError,
  DaemonStopError,
  failure,
  safeAsync,
  success,
  type Result,
} from '@wlanctl/errors';
import type { Logger } from '@wlanctl/logging';

import type { InterfaceTool, SupplicantController } from '../collaborators.js';
import { formatMacAddress } from '../mac.js';
import { InterfaceMode, type InterfaceDescriptor, type RadioHandle } from '../types.js';

export interface StationControllerDeps {
  interfaceTool: InterfaceTool;
  supplicant: SupplicantController;
  logger: Logger;
}

/**
 * One interface claimed in station mode. Owns the supplicant for it.
 */
export class StationInterfaceController {
  readonly mode = InterfaceMode.STATION;

  private supplicantEnabled = false;
  private released = false;
  private releasing: Promise<void> | undefined;
  private readonly logger: Logger;

  constructor(
    readonly radio: RadioHandle,
    readonly descriptor: InterfaceDescriptor,
    private readonly deps: StationControllerDeps
  ) {
    this.logger = deps.logger.child(`sta:${descriptor.name}`);
    this.logger.debug('Station interface created', {
      index: descriptor.kernelIndex,
      radio,
    });
  }

  getName(): string {
    return this.descriptor.name;
  }

  getInterfaceIndex(): number {
    return this.descriptor.kernelIndex;
  }

  isReleased(): boolean {
    return this.released;
  }

  isSupplicantEnabled(): boolean {
    return this.supplicantEnabled;
  }

  async enableSupplicant(): Promise<Result<void, DaemonStartError | ConflictError>> {
    if (this.released) {
      return failure(
        new ConflictError(`Station interface ${this.getName()} has been released`, {
          context: { operation: 'enable_supplicant', component: 'station-interface' },
        })
      );
    }

    const started = await safeAsync(() => this.deps.supplicant.start());
    if (!started.success || !started.data) {
      const error = new DaemonStartError('Failed to start supplicant', {
        ...(started.error && { cause: started.error }),
        context: { operation: 'enable_supplicant', component: 'station-interface' },
        data: { interface: this.getName() },
      });
      this.logger.error(error.message, error);
      return failure(error);
    }

    this.supplicantEnabled = true;
    this.logger.info('Supplicant enabled');
    return success(undefined);
  }

  async disableSupplicant(): Promise<Result<void, DaemonStopError>> {
    const stopped = await safeAsync(() => this.deps.supplicant.stop());
    // The supplicant is treated as gone even if stopping reported an error
    this.supplicantEnabled = false;

    if (!stopped.success || !stopped.data) {
      const error = new DaemonStopError('Failed to stop supplicant', {
        ...(stopped.error && { cause: stopped.error }),
        context: { operation: 'disable_supplicant', component: 'station-interface' },
        data: { interface: this.getName() },
      });
      this.logger.error(error.message, error);
      return failure(error);
    }

    this.logger.info('Supplicant disabled');
    return success(undefined);
  }

  /**
   * Stop the supplicant if enabled and set the interface down. Safe to call repeatedly.
   */
  release(): Promise<void> {
    this.releasing ??= this.performRelease();
    return this.releasing;
  }

  dump(): string {
    return [
      'Station interface:',
      `  Interface index: ${this.descriptor.kernelIndex}`,
      `  Interface name: ${this.descriptor.name}`,
      `  Interface mac address: ${formatMacAddress(this.descriptor.macAddress)}`,
      `  Supplicant enabled: ${this.supplicantEnabled ? 'yes' : 'no'}`,
    ].join('\n');
  }

  private async performRelease(): Promise<void> {
    this.released = true;

    if (this.supplicantEnabled) {
      await this.disableSupplicant();
    }

    const down = await safeAsync(() => this.deps.interfaceTool.setUpState(this.getName(), false));
    if (!down.success || !down.data) {
      this.logger.warn('Failed to set interface down', {
        ...(down.error && { error: down.error.message }),
      });
    }

    this.logger.debug('Station interface released');
  }
}
