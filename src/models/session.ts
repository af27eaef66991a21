/**
 * DFU session states, options and observer types.
 */

/**
 * Session states, in the only order they are visited.
 */
export enum DfuState {
  Idle = 'Idle',
  AppConnected = 'AppConnected',
  BootloaderJumpSent = 'BootloaderJumpSent',
  WaitingReboot = 'WaitingReboot',
  BootloaderConnected = 'BootloaderConnected',
  DfuStarted = 'DfuStarted',
  SizeSent = 'SizeSent',
  InitSent = 'InitSent',
  ImageStreaming = 'ImageStreaming',
  ImageComplete = 'ImageComplete',
  Validated = 'Validated',
  Activated = 'Activated',
  Failed = 'Failed',
}

export type TerminalState = DfuState.Activated | DfuState.Failed;

export function isTerminal(state: DfuState): state is TerminalState {
  return state === DfuState.Activated || state === DfuState.Failed;
}

/**
 * Diagnostic sink. `console` satisfies it.
 */
export interface DfuLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Tunables of a DFU session. Durations are in milliseconds.
 */
export interface DfuOptions {
  /** Packet receipt notification interval in chunks, 0 disables */
  prn?: number;
  /** Pause between START_DFU and the size packet */
  startDelayMs?: number;
  /** Pause between image chunk writes */
  packetDelayMs?: number;
  /** Upper bound for a packet; the link may lower it */
  packetSize?: number;
  responseTimeoutMs?: number;
  /** Wait for the START_DFU response, which follows a flash erase */
  startTimeoutMs?: number;
  receiptTimeoutMs?: number;
  jumpTimeoutMs?: number;
  /** Pause between the jump and the bootloader scan */
  rebootDelayMs?: number;
  scanTimeoutMs?: number;
  scanWindowMs?: number;
  /**
   * Names the bootloader may advertise under; `{name}` expands to the
   * application's advertised name
   */
  bootloaderAliases?: string[];
  matchIncrementedAddress?: boolean;
  /** Skip the direct address lookup and always scan */
  forceScan?: boolean;
  /** Keep scanning for the application device until one is found */
  wait?: boolean;
  logger?: DfuLogger;
  onProgress?: (bytesSent: number, total: number) => void;
  onStateChange?: (state: DfuState, previous: DfuState) => void;
  signal?: AbortSignal;
}

export type ResolvedDfuOptions = Required<
  Omit<DfuOptions, 'onProgress' | 'onStateChange' | 'signal'>
> &
  Pick<DfuOptions, 'onProgress' | 'onStateChange' | 'signal'>;
