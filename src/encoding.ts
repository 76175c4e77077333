/**
 * Wire formats.
 *
 * spacenavd: every event is a fixed 32-byte packet of eight host-endian int32
 *   [type, d1, d2, d3, d4, d5, d6, d7]
 *   type 0 = motion   (x, y, z, rx, ry, rz, period)
 *   type 1 = press    (button)
 *   type 2 = release  (button)
 *
 * WLED: JSON state objects, sent as text frames on the /ws socket.
 */

import * as os from 'os';
import type { InputEvent } from './types';

export const SPNAV_PACKET_SIZE = 32;

const SPNAV_EVENT_MOTION = 0;
const SPNAV_EVENT_PRESS = 1;
const SPNAV_EVENT_RELEASE = 2;

export type Endianness = 'LE' | 'BE';

export function decodeSpnavPacket(packet: Buffer, endianness: Endianness = os.endianness()): InputEvent {
  if (packet.length < SPNAV_PACKET_SIZE) {
    throw new RangeError(`spacenavd packet must be ${SPNAV_PACKET_SIZE} bytes, got ${packet.length}`);
  }

  const word = (index: number) =>
    endianness === 'LE' ? packet.readInt32LE(index * 4) : packet.readInt32BE(index * 4);

  const type = word(0);
  switch (type) {
    case SPNAV_EVENT_MOTION:
      return {
        kind: 'motion',
        x: word(1),
        y: word(2),
        z: word(3),
        rx: word(4),
        ry: word(5),
        rz: word(6),
        period: word(7),
      };
    case SPNAV_EVENT_PRESS:
    case SPNAV_EVENT_RELEASE:
      return { kind: 'button', button: word(1), pressed: type === SPNAV_EVENT_PRESS };
    default:
      return { kind: 'other', type };
  }
}

/**
 * Splits a byte stream into complete packets.
 * Returns the decoded events and whatever trailing bytes did not fill a packet.
 */
export function decodeSpnavStream(
  buffer: Buffer,
  endianness: Endianness = os.endianness(),
): { events: InputEvent[]; rest: Buffer } {
  const events: InputEvent[] = [];
  let offset = 0;
  while (buffer.length - offset >= SPNAV_PACKET_SIZE) {
    events.push(decodeSpnavPacket(buffer.subarray(offset, offset + SPNAV_PACKET_SIZE), endianness));
    offset += SPNAV_PACKET_SIZE;
  }
  return { events, rest: Buffer.from(buffer.subarray(offset)) };
}

function toByte(value: number): number {
  return Math.min(255, Math.max(0, Math.trunc(value)));
}

export interface WledMasterState {
  on: boolean;
  bri: number;
}

export interface WledSegmentState {
  seg: Array<{ id: number; bri: number; cct: number }>;
}

export function encodeWledMaster(on: boolean, brightness: number): string {
  const state: WledMasterState = { on, bri: toByte(brightness) };
  return JSON.stringify(state);
}

export function encodeWledSegment(index: number, brightness: number, colorTemperature: number): string {
  const state: WledSegmentState = {
    seg: [{ id: index, bri: toByte(brightness), cct: toByte(colorTemperature) }],
  };
  return JSON.stringify(state);
}
