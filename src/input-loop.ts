import { errorMessage } from './errors';
import { SharedLightState } from './light-state';
import type { LightMutation } from './light-state';
import { RunFlag } from './run-flag';
import { TIMING } from './types';
import type { InputDevice, InputEvent, LightState, Logger, LoopTiming } from './types';

/** Device units of rotation per brightness / color temperature step. */
export const ROTATION_SCALE = 300;

export const TOGGLE_BUTTON = 0;
export const PRESET_BUTTON = 1;

export const PRESET_STATE: LightState = {
  on: true,
  brightness: 255,
  colorTemperature: 127,
};

/**
 * Maps one device event to a state mutation, or null when the event is ignored.
 * Motion only applies while the light is on; buttons react to presses only.
 */
export function translateEvent(event: InputEvent): LightMutation | null {
  switch (event.kind) {
    case 'motion':
      return (current) => {
        if (!current.on) return null;
        return {
          colorTemperature: current.colorTemperature - event.rz / ROTATION_SCALE,
          // X rotation is inverted: tilting away dims
          brightness: current.brightness - event.rx / ROTATION_SCALE,
        };
      };
    case 'button':
      if (!event.pressed) return null;
      if (event.button === TOGGLE_BUTTON) {
        return (current) => ({ on: !current.on });
      }
      if (event.button === PRESET_BUTTON) {
        return { ...PRESET_STATE };
      }
      return null;
    default:
      return null;
  }
}

export interface InputEventLoopOptions {
  device: InputDevice;
  state: SharedLightState;
  flag: RunFlag;
  logger: Logger;
  timing?: Partial<LoopTiming>;
}

/**
 * Keeps the input device open and feeds its events into the shared state.
 */
export class InputEventLoop {
  private readonly device: InputDevice;
  private readonly state: SharedLightState;
  private readonly flag: RunFlag;
  private readonly logger: Logger;
  private readonly timing: LoopTiming;

  constructor(options: InputEventLoopOptions) {
    this.device = options.device;
    this.state = options.state;
    this.flag = options.flag;
    this.logger = options.logger;
    this.timing = { ...TIMING, ...options.timing };
  }

  async run(): Promise<void> {
    try {
      while (this.flag.running) {
        if (!(await this.open())) break;
        await this.pump();
      }
    } finally {
      this.device.close();
    }
  }

  /** Returns false if shutdown happened before the device opened. */
  private async open(): Promise<boolean> {
    while (this.flag.running) {
      try {
        await this.device.open();
        this.logger.log('Connection to SpaceNav driver established.');
        return true;
      } catch (error) {
        this.logger.log('No connection to the SpaceNav driver. Retrying...');
        this.logger.debug(`Open failed: ${errorMessage(error)}`);
        await this.flag.sleep(this.timing.retryDelayMs);
      }
    }
    return false;
  }

  private async pump(): Promise<void> {
    while (this.flag.running) {
      try {
        this.drain();
      } catch (error) {
        this.logger.log(`Lost connection to the SpaceNav driver: ${errorMessage(error)}`);
        this.device.close();
        await this.flag.sleep(this.timing.retryDelayMs);
        return;
      }
      await this.flag.sleep(this.timing.pollIntervalMs);
    }
  }

  private drain(): void {
    for (let event = this.device.poll(); event !== null; event = this.device.poll()) {
      this.handle(event);
    }
  }

  /** Applies one event; returns true if the shared state changed. */
  handle(event: InputEvent): boolean {
    const mutation = translateEvent(event);
    if (!mutation) return false;

    const changed = this.state.write(mutation);
    if (changed) {
      this.describe(event);
    }
    return changed;
  }

  private describe(event: InputEvent): void {
    const { on, brightness, colorTemperature } = this.state.read();
    if (event.kind === 'motion') {
      this.logger.debug(`Color temperature: ${colorTemperature}, Brightness: ${brightness}`);
    } else if (event.kind === 'button' && event.button === TOGGLE_BUTTON) {
      this.logger.debug(`Switched ${on ? 'on' : 'off'}`);
    } else {
      this.logger.debug(
        `Set color temperature: ${colorTemperature}, Brightness: ${brightness}, Switched ${on ? 'on' : 'off'}`,
      );
    }
  }
}
