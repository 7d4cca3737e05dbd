import { computeChecksum, isCorrupted } from "./checksum";
import { resolveConfig } from "./config";
import { createLogger, type LogSink, type TraceLogger } from "./logger";
import { clonePacket, makeAckPacket } from "./packet";
import {
  ENTITY,
  type Mutable,
  type Packet,
  type ProtocolAnomaly,
  type ProtocolHost,
  type ReceiverStatistics,
  type SelectiveRepeatConfig,
} from "./types";
import { SlidingWindow, inWindow, seqAdd, seqOffset } from "./window";

function emptyStatistics(): Mutable<ReceiverStatistics> {
  return {
    packetsReceived: 0,
    packetsDelivered: 0,
    duplicatePackets: 0,
    corruptedPackets: 0,
    acksSent: 0,
  };
}

/**
 * Receiving side (entity B) of selective repeat. Buffers out-of-order
 * packets inside its window and delivers them upward strictly in sequence.
 * B never originates data, so it has no timer.
 */
export class ReceiverEngine {
  private readonly host: ProtocolHost;
  private readonly config: SelectiveRepeatConfig;
  private readonly log: TraceLogger;
  private readonly window: SlidingWindow<Packet>;
  private expectedSeqNum = 0;
  private stats: Mutable<ReceiverStatistics> = emptyStatistics();

  constructor(
    host: ProtocolHost,
    config: Partial<SelectiveRepeatConfig> = {},
    logSink?: LogSink
  ) {
    this.host = host;
    this.config = resolveConfig(config);
    this.log = createLogger("Receiver", this.config.trace, logSink);
    this.window = new SlidingWindow<Packet>(this.config.windowSize);
  }

  init(): void {
    this.window.clear();
    this.expectedSeqNum = 0;
    this.stats = emptyStatistics();
  }

  onPacketArrival(packet: Packet): void {
    if (packet.payload.byteLength !== this.config.payloadSize || isCorrupted(packet)) {
      this.log.trace(1, "Packet is corrupted, dropped without ACK");
      this.log.trace(
        3,
        `Checksum ${packet.checksum}, recomputed ${computeChecksum(packet)}, ` +
          `payload ${packet.payload.byteLength} bytes`
      );
      this.stats.corruptedPackets++;
      this.report("corrupted", packet);
      return;
    }

    this.log.trace(1, `Packet ${packet.seqnum} is correctly received, send ACK`);
    this.stats.packetsReceived++;
    this.sendAck(packet.seqnum);

    const { windowSize, seqSpace } = this.config;
    if (!inWindow(this.expectedSeqNum, packet.seqnum, windowSize, seqSpace)) {
      this.log.trace(2, `Packet ${packet.seqnum} is outside the receive window`);
      this.stats.duplicatePackets++;
      this.report("out-of-window", packet);
      return;
    }

    const offset = seqOffset(this.expectedSeqNum, packet.seqnum, seqSpace);
    if (this.window.has(offset)) {
      this.log.trace(2, `Packet ${packet.seqnum} is already buffered`);
      this.stats.duplicatePackets++;
      this.report("duplicate-data", packet);
      return;
    }

    this.window.set(offset, clonePacket(packet));
    this.log.trace(3, `Buffered packet ${packet.seqnum} at offset ${offset}`);

    if (offset !== 0) {
      return;
    }

    const run = this.window.prefixLength(() => true);
    for (const ready of this.window.slide(run)) {
      this.log.trace(1, `Delivering packet ${ready.seqnum} to application`);
      this.stats.packetsDelivered++;
      this.host.deliverToApplication(ENTITY.RECEIVER, ready.payload);
    }
    this.expectedSeqNum = seqAdd(this.expectedSeqNum, run, seqSpace);
    this.log.trace(2, `Receive window slides by ${run}, expecting ${this.expectedSeqNum}`);
  }

  getExpectedSeqNum(): number {
    return this.expectedSeqNum;
  }

  getBufferedCount(): number {
    return this.window.occupied();
  }

  getBufferedSeqnums(): number[] {
    const seqnums: number[] = [];
    for (let offset = 0; offset < this.config.windowSize; offset++) {
      const packet = this.window.get(offset);
      if (packet) {
        seqnums.push(packet.seqnum);
      }
    }
    return seqnums;
  }

  getStatistics(): ReceiverStatistics {
    return { ...this.stats };
  }

  private sendAck(acknum: number): void {
    this.stats.acksSent++;
    this.host.deliverToNetwork(
      ENTITY.RECEIVER,
      makeAckPacket(acknum, this.config.payloadSize)
    );
  }

  private report(anomaly: ProtocolAnomaly, packet?: Packet): void {
    this.host.onAnomaly?.(ENTITY.RECEIVER, anomaly, packet);
  }
}
