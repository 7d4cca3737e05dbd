import type { Packet } from "./types";

/**
 * Sum of both header fields and every payload byte. Sender and receiver must
 * agree on this exactly; there is no negotiation.
 */
export function computeChecksum(packet: Packet): number {
  let checksum = packet.seqnum + packet.acknum;
  for (const byte of packet.payload) {
    checksum += byte;
  }
  return checksum;
}

export function isCorrupted(packet: Packet): boolean {
  return packet.checksum !== computeChecksum(packet);
}
