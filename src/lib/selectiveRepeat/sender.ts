import { computeChecksum, isCorrupted } from "./checksum";
import { resolveConfig } from "./config";
import { PayloadSizeError } from "./errors";
import { createLogger, type LogSink, type TraceLogger } from "./logger";
import { clonePacket, makeDataPacket } from "./packet";
import {
  ENTITY,
  type Alarm,
  type Message,
  type Mutable,
  type Packet,
  type ProtocolAnomaly,
  type ProtocolHost,
  type SelectiveRepeatConfig,
  type SenderStatistics,
  type SubmitResult,
} from "./types";
import { SlidingWindow, inWindow, seqAdd, seqOffset } from "./window";

interface SendSlot {
  packet: Packet;
  acknowledged: boolean;
}

export interface SendSlotView {
  seqnum: number;
  acknowledged: boolean;
}

function emptyStatistics(): Mutable<SenderStatistics> {
  return {
    packetsSent: 0,
    packetsResent: 0,
    windowFullRejections: 0,
    acksReceived: 0,
    newAcks: 0,
    duplicateAcks: 0,
    corruptedAcks: 0,
    staleAcks: 0,
  };
}

/**
 * Sending side (entity A) of selective repeat.
 *
 * Every packet is acknowledged on its own. The window base only moves past a
 * contiguous run of acknowledged packets, and the single retransmission
 * timer always guards the packet at the base.
 */
export class SenderEngine {
  private readonly host: ProtocolHost;
  private readonly config: SelectiveRepeatConfig;
  private readonly log: TraceLogger;
  private readonly window: SlidingWindow<SendSlot>;
  private windowBase = 0;
  private nextSeqNum = 0;
  private windowCount = 0;
  private outstanding = 0;
  private alarm: Alarm | null = null;
  private stats: Mutable<SenderStatistics> = emptyStatistics();

  constructor(
    host: ProtocolHost,
    config: Partial<SelectiveRepeatConfig> = {},
    logSink?: LogSink
  ) {
    this.host = host;
    this.config = resolveConfig(config);
    this.log = createLogger("Sender", this.config.trace, logSink);
    this.window = new SlidingWindow<SendSlot>(this.config.windowSize);
  }

  init(): void {
    if (this.alarm) {
      this.disarm();
    }
    this.window.clear();
    this.windowBase = 0;
    this.nextSeqNum = 0;
    this.windowCount = 0;
    this.outstanding = 0;
    this.stats = emptyStatistics();
  }

  canSubmit(): boolean {
    const { windowSize, seqSpace } = this.config;
    return (
      this.windowCount < windowSize &&
      inWindow(this.windowBase, this.nextSeqNum, windowSize, seqSpace)
    );
  }

  onApplicationSubmit(message: Message): SubmitResult {
    if (message.data.byteLength !== this.config.payloadSize) {
      throw new PayloadSizeError(this.config.payloadSize, message.data.byteLength);
    }

    if (!this.canSubmit()) {
      this.log.trace(2, "New message arrives, send window is full");
      this.stats.windowFullRejections++;
      this.report("window-full");
      return { status: "window-full" };
    }

    this.log.trace(2, "New message arrives, window is not full, send new packet");

    const seqnum = this.nextSeqNum;
    const packet = makeDataPacket(seqnum, message.data);
    const offset = seqOffset(this.windowBase, seqnum, this.config.seqSpace);
    const wasEmpty = this.windowCount === 0;

    this.window.set(offset, { packet, acknowledged: false });
    this.windowCount++;
    this.outstanding++;
    this.nextSeqNum = seqAdd(seqnum, 1, this.config.seqSpace);
    this.stats.packetsSent++;

    this.log.trace(1, `Sending packet ${seqnum} to network`);
    this.host.deliverToNetwork(ENTITY.SENDER, clonePacket(packet));

    if (wasEmpty) {
      this.arm();
    }

    return { status: "sent", seqnum };
  }

  onPacketArrival(packet: Packet): void {
    if (isCorrupted(packet)) {
      this.log.trace(1, "Corrupted ACK is received, do nothing");
      this.log.trace(3, `Checksum ${packet.checksum}, recomputed ${computeChecksum(packet)}`);
      this.stats.corruptedAcks++;
      this.report("corrupted", packet);
      return;
    }

    this.log.trace(1, `Uncorrupted ACK ${packet.acknum} is received`);
    this.stats.acksReceived++;

    const { windowSize, seqSpace } = this.config;
    // Only sequence numbers already handed out are acknowledgeable.
    if (
      !inWindow(this.windowBase, packet.acknum, windowSize, seqSpace) ||
      seqOffset(this.windowBase, packet.acknum, seqSpace) >= this.windowCount
    ) {
      this.log.trace(2, `ACK ${packet.acknum} is outside the send window, ignored`);
      this.stats.staleAcks++;
      this.report("out-of-window", packet);
      return;
    }

    const offset = seqOffset(this.windowBase, packet.acknum, seqSpace);
    const slot = this.window.get(offset);
    if (!slot || slot.acknowledged) {
      this.log.trace(1, `Duplicate ACK ${packet.acknum} received, do nothing`);
      this.stats.duplicateAcks++;
      this.report("duplicate-ack", packet);
      return;
    }

    this.log.trace(1, `ACK ${packet.acknum} is not a duplicate`);
    slot.acknowledged = true;
    this.outstanding--;
    this.stats.newAcks++;

    if (offset !== 0) {
      return;
    }

    const run = this.window.prefixLength((candidate) => candidate.acknowledged);
    this.window.slide(run);
    this.windowBase = seqAdd(this.windowBase, run, seqSpace);
    this.windowCount -= run;
    this.log.trace(2, `Window slides by ${run}, base is now ${this.windowBase}`);

    this.disarm();
    if (this.outstanding > 0) {
      this.arm();
    }
  }

  onTimerExpiry(): void {
    // The host's alarm has already fired; it is no longer pending.
    this.alarm = null;

    const base = this.windowCount > 0 ? this.window.get(0) : undefined;
    if (!base) {
      this.log.trace(2, "Timer expired with an empty window, nothing to resend");
      return;
    }

    this.log.trace(1, `Time out, resending packet ${base.packet.seqnum}`);
    this.stats.packetsResent++;
    this.host.deliverToNetwork(ENTITY.SENDER, clonePacket(base.packet));
    this.arm();
  }

  getWindowBase(): number {
    return this.windowBase;
  }

  getNextSeqNum(): number {
    return this.nextSeqNum;
  }

  getWindowCount(): number {
    return this.windowCount;
  }

  getOutstandingCount(): number {
    return this.outstanding;
  }

  isTimerArmed(): boolean {
    return this.alarm !== null;
  }

  getAlarm(): Alarm | null {
    return this.alarm;
  }

  getWindowSlots(): SendSlotView[] {
    const slots: SendSlotView[] = [];
    for (let offset = 0; offset < this.windowCount; offset++) {
      const slot = this.window.get(offset);
      if (slot) {
        slots.push({ seqnum: slot.packet.seqnum, acknowledged: slot.acknowledged });
      }
    }
    return slots;
  }

  getStatistics(): SenderStatistics {
    return { ...this.stats };
  }

  private arm(): void {
    const base = this.window.get(0);
    this.alarm = {
      interval: this.config.retransmitInterval,
      seqnum: base ? base.packet.seqnum : this.windowBase,
    };
    this.host.armTimer(ENTITY.SENDER, this.config.retransmitInterval);
  }

  private disarm(): void {
    if (!this.alarm) {
      return;
    }
    this.alarm = null;
    this.host.disarmTimer(ENTITY.SENDER);
  }

  private report(anomaly: ProtocolAnomaly, packet?: Packet): void {
    this.host.onAnomaly?.(ENTITY.SENDER, anomaly, packet);
  }
}
