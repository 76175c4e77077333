import * as net from 'net';
import { decodeSpnavStream } from './encoding';
import type { Endianness } from './encoding';
import { ConnectionError, errorMessage } from './errors';
import type { InputDevice, InputEvent } from './types';

export const DEFAULT_SPNAV_SOCKET = '/var/run/spnav.sock';

/**
 * SpaceNavigator input over the spacenavd UNIX socket.
 *
 * Events arrive asynchronously and are queued until `poll()` takes them.
 * Once the socket fails or closes, `poll()` throws `ConnectionError` until the
 * device is reopened.
 */
export class SpaceNavDevice implements InputDevice {
  private socket: net.Socket | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private queue: InputEvent[] = [];
  private failure: ConnectionError | null = null;

  constructor(
    private readonly socketPath: string = DEFAULT_SPNAV_SOCKET,
    private readonly endianness?: Endianness,
  ) {}

  open(): Promise<void> {
    this.close();

    return new Promise((resolve, reject) => {
      const socket = net.createConnection(this.socketPath);
      let opened = false;

      socket.once('connect', () => {
        opened = true;
        this.socket = socket;
        this.failure = null;
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        const { events, rest } = decodeSpnavStream(Buffer.concat([this.pending, chunk]), this.endianness);
        this.pending = rest;
        this.queue.push(...events);
      });

      socket.on('error', (error) => {
        const failure = new ConnectionError(
          opened
            ? `SpaceNav driver connection failed: ${errorMessage(error)}`
            : `Cannot reach the SpaceNav driver at ${this.socketPath}: ${errorMessage(error)}`,
          { cause: error },
        );
        if (!opened) {
          socket.destroy();
          reject(failure);
          return;
        }
        this.failure = failure;
      });

      socket.on('close', () => {
        if (opened && this.socket === socket) {
          if (!this.failure) {
            this.failure = new ConnectionError('SpaceNav driver closed the connection');
          }
          this.socket = null;
        }
      });
    });
  }

  poll(): InputEvent | null {
    const event = this.queue.shift();
    if (event) return event;
    if (this.failure) throw this.failure;
    if (!this.socket) throw new ConnectionError('SpaceNav device is not open');
    return null;
  }

  close(): void {
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      socket.destroy();
    }
    this.pending = Buffer.alloc(0);
    this.queue = [];
    this.failure = null;
  }
}
