import WebSocket from 'ws';
import { encodeWledMaster, encodeWledSegment } from './encoding';
import { FixtureDisconnectedError, errorMessage } from './errors';
import type { FixtureClient, Logger } from './types';

export interface WledClientOptions {
  port?: number;
  logger?: Logger;
}

/**
 * WLED controller driven through its JSON API on the `/ws` WebSocket.
 * `connect()` does not time out on its own; callers race it.
 */
export class WledClient implements FixtureClient {
  private socket: WebSocket | null = null;

  constructor(
    private readonly host: string,
    private readonly options: WledClientOptions = {},
  ) {}

  get url(): string {
    const port = this.options.port ? `:${this.options.port}` : '';
    return `ws://${this.host}${port}/ws`;
  }

  get connected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  connect(): Promise<void> {
    if (this.socket) {
      this.socket.terminate();
    }

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url);
      this.socket = socket;

      socket.once('open', () => resolve());

      // ws emits 'error' before 'close'; an unhandled 'error' would crash the process
      socket.on('error', (error) => {
        this.options.logger?.debug(`WLED socket error: ${errorMessage(error)}`);
        reject(error);
      });

      socket.on('close', (code) => {
        this.options.logger?.debug(`WLED socket closed (${code})`);
        reject(new FixtureDisconnectedError(`WLED closed the connection (${code})`));
      });
    });
  }

  setMaster(on: boolean, brightness: number): Promise<void> {
    return this.send(encodeWledMaster(on, brightness));
  }

  setSegment(index: number, brightness: number, colorTemperature: number): Promise<void> {
    return this.send(encodeWledSegment(index, brightness, colorTemperature));
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;

    // no closing handshake: a silent controller would hold the process for ws's 30 s close timeout
    socket.terminate();
  }

  private send(payload: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new FixtureDisconnectedError());
    }

    return new Promise((resolve, reject) => {
      socket.send(payload, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
