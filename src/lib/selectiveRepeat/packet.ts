import { computeChecksum } from "./checksum";
import type { Packet } from "./types";

export const NOT_IN_USE = -1;

/** Filler byte for ACK payloads: ASCII '0'. */
export const ACK_FILLER = 0x30;

export const SEQNUM_SIZE = 4;
export const ACKNUM_SIZE = 4;
export const CHECKSUM_SIZE = 4;
export const PACKET_HEADER_SIZE = SEQNUM_SIZE + ACKNUM_SIZE + CHECKSUM_SIZE;

export function makeDataPacket(seqnum: number, data: Uint8Array): Packet {
  const packet: Packet = {
    seqnum,
    acknum: NOT_IN_USE,
    checksum: 0,
    payload: new Uint8Array(data),
  };
  packet.checksum = computeChecksum(packet);
  return packet;
}

export function makeAckPacket(acknum: number, payloadSize: number): Packet {
  const packet: Packet = {
    seqnum: NOT_IN_USE,
    acknum,
    checksum: 0,
    payload: new Uint8Array(payloadSize).fill(ACK_FILLER),
  };
  packet.checksum = computeChecksum(packet);
  return packet;
}

export function clonePacket(packet: Packet): Packet {
  return { ...packet, payload: new Uint8Array(packet.payload) };
}

export function encodePacket(packet: Packet): ArrayBuffer {
  const buffer = new ArrayBuffer(PACKET_HEADER_SIZE + packet.payload.byteLength);
  const view = new DataView(buffer);

  let offset = 0;
  view.setInt32(offset, packet.seqnum, true);
  offset += SEQNUM_SIZE;

  view.setInt32(offset, packet.acknum, true);
  offset += ACKNUM_SIZE;

  view.setInt32(offset, packet.checksum, true);
  offset += CHECKSUM_SIZE;

  new Uint8Array(buffer, offset).set(packet.payload);

  return buffer;
}

/**
 * Parse the fixed packet layout. Returns null when the buffer has the wrong
 * length; the checksum is left for the receiving engine to verify.
 */
export function decodePacket(data: ArrayBuffer, payloadSize: number): Packet | null {
  if (data.byteLength !== PACKET_HEADER_SIZE + payloadSize) {
    return null;
  }

  const view = new DataView(data);
  let offset = 0;

  const seqnum = view.getInt32(offset, true);
  offset += SEQNUM_SIZE;

  const acknum = view.getInt32(offset, true);
  offset += ACKNUM_SIZE;

  const checksum = view.getInt32(offset, true);
  offset += CHECKSUM_SIZE;

  const payload = new Uint8Array(data.slice(offset, offset + payloadSize));

  return { seqnum, acknum, checksum, payload };
}
