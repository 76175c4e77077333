import { ConnectTimeoutError, FixtureDisconnectedError, errorMessage } from './errors';
import { SharedLightState, sameLightState } from './light-state';
import { RunFlag } from './run-flag';
import { TIMING } from './types';
import type { FixtureClient, LightState, Logger, LoopTiming } from './types';

export type OutputStatus = 'disconnected' | 'connecting' | 'connected';

/** WLED segment carrying the light; brightness lives on the segment, master stays at full. */
export const SEGMENT_INDEX = 0;
export const MASTER_BRIGHTNESS = 255;

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ConnectTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export interface OutputSyncLoopOptions {
  createClient: () => FixtureClient;
  state: SharedLightState;
  flag: RunFlag;
  logger: Logger;
  timing?: Partial<LoopTiming>;
}

/**
 * Keeps the fixture in line with the shared state across reconnects.
 *
 * Every connection starts with an empty baseline, so the current state is
 * pushed as soon as the link is up.
 */
export class OutputSyncLoop {
  private readonly createClient: () => FixtureClient;
  private readonly state: SharedLightState;
  private readonly flag: RunFlag;
  private readonly logger: Logger;
  private readonly timing: LoopTiming;
  private lastPushed: LightState | null = null;
  private currentStatus: OutputStatus = 'disconnected';

  constructor(options: OutputSyncLoopOptions) {
    this.createClient = options.createClient;
    this.state = options.state;
    this.flag = options.flag;
    this.logger = options.logger;
    this.timing = { ...TIMING, ...options.timing };
  }

  get status(): OutputStatus {
    return this.currentStatus;
  }

  async run(): Promise<void> {
    while (this.flag.running) {
      const client = this.createClient();
      try {
        await this.connect(client);
        await this.syncUntilStopped(client);
      } catch (error) {
        if (error instanceof ConnectTimeoutError) {
          this.logger.log('Connection to WLED timed out. Retrying...');
        } else {
          this.logger.log(`An error occurred while connecting to WLED: ${errorMessage(error)}`);
        }
      } finally {
        await this.release(client);
      }

      await this.flag.sleep(this.timing.retryDelayMs);
    }
  }

  private async connect(client: FixtureClient): Promise<void> {
    this.currentStatus = 'connecting';
    this.lastPushed = null;
    await withTimeout(client.connect(), this.timing.connectTimeoutMs);
    if (!client.connected) {
      throw new FixtureDisconnectedError('WLED connection did not open');
    }

    this.currentStatus = 'connected';
    this.logger.debug('Connected to WLED!');
    await this.flag.sleep(this.timing.settleDelayMs);
  }

  private async syncUntilStopped(client: FixtureClient): Promise<void> {
    while (this.flag.running) {
      if (!client.connected) {
        throw new FixtureDisconnectedError('WLED connection lost');
      }
      await this.syncOnce(client);
      await this.flag.sleep(this.timing.pollIntervalMs);
    }
  }

  /**
   * Pushes the current state if it differs from the last successful push.
   * Returns true when commands were sent.
   */
  async syncOnce(client: FixtureClient): Promise<boolean> {
    const snapshot = this.state.read();
    if (this.lastPushed && sameLightState(snapshot, this.lastPushed)) {
      return false;
    }

    await client.setMaster(snapshot.on, MASTER_BRIGHTNESS);
    await client.setSegment(SEGMENT_INDEX, snapshot.brightness, snapshot.colorTemperature);
    this.lastPushed = snapshot;
    return true;
  }

  private async release(client: FixtureClient): Promise<void> {
    this.currentStatus = 'disconnected';
    try {
      await client.close();
    } catch (error) {
      this.logger.log(`Failed to close WLED connection: ${errorMessage(error)}`);
    }
  }
}
