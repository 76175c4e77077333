export interface LightState {
  on: boolean;
  brightness: number; // 1-255 once written
  colorTemperature: number; // 0-255, warm to cold
}

export interface MotionEvent {
  kind: 'motion';
  x: number;
  y: number;
  z: number;
  rx: number;
  ry: number;
  rz: number;
  period: number; // ms since the previous motion event
}

export interface ButtonEvent {
  kind: 'button';
  button: number;
  pressed: boolean;
}

export interface OtherEvent {
  kind: 'other';
  type: number;
}

export type InputEvent = MotionEvent | ButtonEvent | OtherEvent;

export interface InputDevice {
  open(): Promise<void>;
  /** Next queued event, or null when nothing is pending. */
  poll(): InputEvent | null;
  close(): void;
}

export interface FixtureClient {
  readonly connected: boolean;
  connect(): Promise<void>;
  setMaster(on: boolean, brightness: number): Promise<void>;
  setSegment(index: number, brightness: number, colorTemperature: number): Promise<void>;
  close(): Promise<void>;
}

export interface Logger {
  log(message: string): void;
  /** Only written when verbose logging is enabled. */
  debug(message: string): void;
}

export interface LoopTiming {
  pollIntervalMs: number;
  retryDelayMs: number;
  connectTimeoutMs: number;
  settleDelayMs: number;
}

export const TIMING: LoopTiming = {
  pollIntervalMs: 10,
  retryDelayMs: 1000,
  connectTimeoutMs: 5000,
  settleDelayMs: 500,
};

export interface DaemonConfig {
  fixtureAddress: string;
  logFile: string;
  pidFile: string;
  spacenavSocket: string;
  verbose: boolean;
}
