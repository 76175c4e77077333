import type { LightState } from './types';

export const MIN_BRIGHTNESS = 1;
export const MAX_LEVEL = 255;

export type LightMutation =
  | Partial<LightState>
  | ((current: Readonly<LightState>) => Partial<LightState> | null);

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function clampBrightness(value: number): number {
  return clamp(value, MIN_BRIGHTNESS, MAX_LEVEL);
}

export function clampColorTemperature(value: number): number {
  return clamp(value, 0, MAX_LEVEL);
}

export function sameLightState(a: LightState, b: LightState): boolean {
  return a.on === b.on && a.brightness === b.brightness && a.colorTemperature === b.colorTemperature;
}

/**
 * Light state shared between the input and output loops.
 *
 * Writes are applied synchronously, so a reader on the same event loop never
 * sees a partially updated record. Motion produces fractional steps; those are
 * kept internally and snapshots carry the integer part.
 */
export class SharedLightState {
  private state: LightState = {
    on: false,
    brightness: 0,
    colorTemperature: 0,
  };

  read(): LightState {
    return Object.freeze({
      on: this.state.on,
      brightness: Math.trunc(this.state.brightness),
      colorTemperature: Math.trunc(this.state.colorTemperature),
    });
  }

  /**
   * Merge, clamp and store in one step.
   * Returns false when the mutation declined (null) or left the state unchanged.
   */
  write(mutation: LightMutation): boolean {
    const patch = typeof mutation === 'function' ? mutation({ ...this.state }) : mutation;
    if (!patch) return false;

    const next: LightState = {
      on: patch.on ?? this.state.on,
      brightness: clampBrightness(patch.brightness ?? this.state.brightness),
      colorTemperature: clampColorTemperature(patch.colorTemperature ?? this.state.colorTemperature),
    };

    if (sameLightState(next, this.state)) return false;
    this.state = next;
    return true;
  }
}
