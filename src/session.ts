/**
 * DFU session: the state machine from the application-mode device to the
 * activated image.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { jumpToBootloader } from './buttonless';
import { resolveOptions } from './config';
import { awaitBootloader, findDevice } from './discovery';
import { DfuError, TransportError } from './exceptions';
import type { FirmwarePackage } from './models/firmware';
import {
  DfuState,
  isTerminal,
  type DfuOptions,
  type ResolvedDfuOptions,
  type TerminalState,
} from './models/session';
import { DFU_SERVICE_UUID } from './protocol/constants';
import { TransferEngine } from './transfer';
import type { Advertisement, DfuLink, DfuTransport } from './transport/types';

type ActiveState = Exclude<DfuState, TerminalState>;

interface Transition {
  next: DfuState;
  run: () => Promise<void>;
}

function describe(device: Advertisement): string {
  return `${device.name ?? 'unnamed'} (${device.address})`;
}

/**
 * One firmware update of one device.
 *
 * A session runs once; every exit path releases the link it holds.
 *
 * @example
 * ```typescript
 * const transport = new NodeBleTransport();
 * const firmware = await loadFirmwarePackage('app_dfu_package.zip');
 * const session = new DfuSession(transport, ['MyDevice'], firmware, { prn: 8 });
 * try {
 *   await session.run();
 * } finally {
 *   transport.close();
 * }
 * ```
 */
export class DfuSession {
  private readonly options: ResolvedDfuOptions;
  private _state: DfuState = DfuState.Idle;
  private attempting: DfuState = DfuState.Idle;
  private ran = false;
  private link: DfuLink | null = null;
  private appDevice: Advertisement | null = null;
  private engine: TransferEngine | null = null;

  /**
   * One step per active state, each leading to the next state in line.
   */
  private readonly transitions: Record<ActiveState, Transition> = {
    [DfuState.Idle]: { next: DfuState.AppConnected, run: () => this.connectApplication() },
    [DfuState.AppConnected]: { next: DfuState.BootloaderJumpSent, run: () => this.sendJump() },
    [DfuState.BootloaderJumpSent]: { next: DfuState.WaitingReboot, run: () => this.releaseApplication() },
    [DfuState.WaitingReboot]: { next: DfuState.BootloaderConnected, run: () => this.connectBootloader() },
    [DfuState.BootloaderConnected]: { next: DfuState.DfuStarted, run: () => this.requireEngine().start() },
    [DfuState.DfuStarted]: { next: DfuState.SizeSent, run: () => this.requireEngine().sendSize() },
    [DfuState.SizeSent]: { next: DfuState.InitSent, run: () => this.requireEngine().sendInitPacket() },
    [DfuState.InitSent]: { next: DfuState.ImageStreaming, run: () => this.requireEngine().streamImage() },
    [DfuState.ImageStreaming]: {
      next: DfuState.ImageComplete,
      run: () => this.requireEngine().awaitImageComplete(),
    },
    [DfuState.ImageComplete]: { next: DfuState.Validated, run: () => this.requireEngine().validate() },
    [DfuState.Validated]: { next: DfuState.Activated, run: () => this.requireEngine().activate() },
  };

  constructor(
    private readonly transport: DfuTransport,
    private readonly identifiers: readonly string[],
    private readonly firmware: FirmwarePackage,
    options: DfuOptions = {}
  ) {
    if (identifiers.length === 0) {
      throw new RangeError('At least one device identifier is required');
    }
    this.options = resolveOptions(options);
  }

  get state(): DfuState {
    return this._state;
  }

  /**
   * Image bytes written so far.
   */
  get bytesSent(): number {
    return this.engine?.bytesSent ?? 0;
  }

  /**
   * Run the update to completion.
   *
   * @throws {DfuError} With `stage` set to the state the session failed in
   */
  async run(): Promise<void> {
    if (this.ran) {
      throw new DfuError('A DFU session can only run once');
    }
    this.ran = true;

    const { signal } = this.options;
    const onAbort = (): void => {
      this.options.logger.warn('Operation cancelled, disconnecting');
      void this.releaseLink();
    };
    signal?.addEventListener('abort', onAbort);

    try {
      let state = this._state;
      while (!isTerminal(state)) {
        const transition = this.transitions[state];
        this.attempting = transition.next;
        if (signal?.aborted) {
          throw new TransportError('DFU aborted');
        }
        await transition.run();
        this.transitionTo(transition.next);
        state = transition.next;
      }
      this.options.logger.info('DFU Complete.');
    } catch (error) {
      throw this.fail(error);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.engine?.close();
      await this.releaseLink();
    }
  }

  private transitionTo(next: DfuState): void {
    const previous = this._state;
    this._state = next;
    this.options.logger.debug(`State ${previous} -> ${next}`);
    this.options.onStateChange?.(next, previous);
  }

  /**
   * Move to Failed and stamp the error with the state that was being reached.
   */
  private fail(error: unknown): DfuError {
    const stage = this.attempting;
    let dfuError: DfuError;
    if (this.options.signal?.aborted) {
      dfuError = new TransportError(`DFU aborted while reaching ${stage}`);
    } else if (error instanceof DfuError) {
      dfuError = error;
    } else {
      dfuError = new TransportError(error instanceof Error ? error.message : String(error));
    }
    dfuError.stage ??= stage;
    this.options.logger.error(`Failed reaching ${stage}: ${dfuError.message}`);
    this.transitionTo(DfuState.Failed);
    return dfuError;
  }

  private async releaseLink(): Promise<void> {
    const link = this.link;
    this.link = null;
    if (!link) {
      return;
    }
    try {
      await link.disconnect();
    } catch (error) {
      this.options.logger.debug(
        `Disconnect failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private requireLink(): DfuLink {
    if (!this.link) {
      throw new TransportError('No device connected');
    }
    return this.link;
  }

  private async connectApplication(): Promise<void> {
    const { options } = this;
    this.appDevice = await findDevice(this.transport, this.identifiers, {
      timeoutMs: options.scanTimeoutMs,
      scanWindowMs: options.scanWindowMs,
      forceScan: options.forceScan,
      wait: options.wait,
      logger: options.logger,
      signal: options.signal,
    });
    options.logger.info(`Connecting to ${describe(this.appDevice)} for Jump...`);
    this.link = await this.transport.connect(this.appDevice, DFU_SERVICE_UUID);
  }

  private async sendJump(): Promise<void> {
    const outcome = await jumpToBootloader(this.requireLink(), {
      timeoutMs: this.options.jumpTimeoutMs,
      logger: this.options.logger,
    });
    this.options.logger.debug(`Jump acknowledged by ${outcome}`);
  }

  private async releaseApplication(): Promise<void> {
    await this.releaseLink();
    this.options.logger.info(`Waiting for reboot...(${this.options.rebootDelayMs}ms)`);
    await sleep(this.options.rebootDelayMs, undefined, { signal: this.options.signal });
  }

  private async connectBootloader(): Promise<void> {
    const { options } = this;
    const original = this.appDevice ?? this.identifiers[0];
    const bootloader = await awaitBootloader(this.transport, original, {
      aliases: options.bootloaderAliases,
      matchIncrementedAddress: options.matchIncrementedAddress,
      timeoutMs: options.scanTimeoutMs,
      scanWindowMs: options.scanWindowMs,
      logger: options.logger,
      signal: options.signal,
    });
    options.logger.info(`Target Bootloader: ${bootloader.address}`);
    this.link = await this.transport.connect(bootloader, DFU_SERVICE_UUID);
    this.engine = new TransferEngine(this.link, this.firmware, options);
  }

  private requireEngine(): TransferEngine {
    if (!this.engine) {
      throw new DfuError('Bootloader is not connected');
    }
    return this.engine;
  }
}

/**
 * Update one device with a loaded firmware package.
 */
export async function performDfu(
  transport: DfuTransport,
  identifiers: readonly string[],
  firmware: FirmwarePackage,
  options: DfuOptions = {}
): Promise<void> {
  await new DfuSession(transport, identifiers, firmware, options).run();
}
