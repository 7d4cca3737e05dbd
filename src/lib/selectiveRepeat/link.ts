import { resolveConfig } from "./config";
import { WindowFullError } from "./errors";
import { createLogger, type LogSink, type TraceLogger } from "./logger";
import { decodePacket, encodePacket } from "./packet";
import { ReceiverEngine } from "./receiver";
import { SenderEngine } from "./sender";
import type {
  EntityId,
  ProtocolHost,
  ReceiverStatistics,
  SelectiveRepeatConfig,
  SenderStatistics,
  UnreliableCommunicator,
} from "./types";

/**
 * Binds a SenderEngine to a byte-oriented communicator and backs its single
 * retransmission alarm with setTimeout.
 */
export class ReliableSender {
  private communicator: UnreliableCommunicator;
  private config: SelectiveRepeatConfig;
  private engine: SenderEngine;
  private log: TraceLogger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private framesDropped = 0;
  private closed = false;

  constructor(
    communicator: UnreliableCommunicator,
    config: Partial<SelectiveRepeatConfig> = {},
    logSink?: LogSink
  ) {
    this.communicator = communicator;
    this.config = resolveConfig(config);
    this.log = createLogger("ReliableSender", this.config.trace, logSink);

    const host: ProtocolHost = {
      deliverToNetwork: (_entity, packet) => {
        this.communicator.send(encodePacket(packet));
      },
      deliverToApplication: () => {
        // A never receives application data.
      },
      armTimer: (entity, interval) => this.startTimer(entity, interval),
      disarmTimer: () => this.stopTimer(),
    };

    this.engine = new SenderEngine(host, this.config, logSink);
    this.engine.init();

    this.communicator.onReceive = (data) => this.handleReceivedData(data);
    this.communicator.onError = (error) => this.handleError(error);
  }

  get bufferedAmount(): number {
    return this.engine.getWindowCount() * this.config.payloadSize;
  }

  canSend(): boolean {
    return !this.closed && this.engine.canSubmit();
  }

  send(data: Uint8Array): number {
    if (this.closed) {
      throw new Error("Sender is closed");
    }

    const result = this.engine.onApplicationSubmit({ data });
    if (result.status === "window-full") {
      throw new WindowFullError(this.config.windowSize);
    }
    return result.seqnum;
  }

  getEngine(): SenderEngine {
    return this.engine;
  }

  getStatistics(): SenderStatistics {
    return this.engine.getStatistics();
  }

  getFramesDropped(): number {
    return this.framesDropped;
  }

  close(): void {
    this.closed = true;
    this.stopTimer();
    this.communicator.onReceive = undefined;
    this.communicator.onError = undefined;
  }

  private handleReceivedData(data: ArrayBuffer): void {
    if (this.closed) {
      return;
    }
    const packet = decodePacket(data, this.config.payloadSize);
    if (!packet) {
      this.log.trace(1, `Dropping undecodable frame of ${data.byteLength} bytes`);
      this.framesDropped++;
      return;
    }
    this.engine.onPacketArrival(packet);
  }

  private handleError(error: Error): void {
    console.error(`[ReliableSender] communicator error: ${error.message}`);
  }

  private startTimer(entity: EntityId, interval: number): void {
    this.stopTimer();
    this.log.trace(3, `Arming timer for ${entity}, ${interval}ms`);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.engine.onTimerExpiry();
    }, interval);
  }

  private stopTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

/**
 * Binds a ReceiverEngine to a byte-oriented communicator. In-order payloads
 * surface through `onmessage`.
 */
export class ReliableReceiver {
  private communicator: UnreliableCommunicator;
  private config: SelectiveRepeatConfig;
  private engine: ReceiverEngine;
  private log: TraceLogger;
  private framesDropped = 0;
  private closed = false;

  onmessage: ((data: Uint8Array) => void) | null = null;

  constructor(
    communicator: UnreliableCommunicator,
    config: Partial<SelectiveRepeatConfig> = {},
    logSink?: LogSink
  ) {
    this.communicator = communicator;
    this.config = resolveConfig(config);
    this.log = createLogger("ReliableReceiver", this.config.trace, logSink);

    const host: ProtocolHost = {
      deliverToNetwork: (_entity, packet) => {
        this.communicator.send(encodePacket(packet));
      },
      deliverToApplication: (_entity, payload) => {
        if (this.onmessage) {
          this.onmessage(payload);
        }
      },
      armTimer: () => {
        // B never arms a timer.
      },
      disarmTimer: () => {
        // B never arms a timer.
      },
    };

    this.engine = new ReceiverEngine(host, this.config, logSink);
    this.engine.init();

    this.communicator.onReceive = (data) => this.handleReceivedData(data);
    this.communicator.onError = (error) => this.handleError(error);
  }

  getEngine(): ReceiverEngine {
    return this.engine;
  }

  getStatistics(): ReceiverStatistics {
    return this.engine.getStatistics();
  }

  getFramesDropped(): number {
    return this.framesDropped;
  }

  close(): void {
    this.closed = true;
    this.communicator.onReceive = undefined;
    this.communicator.onError = undefined;
  }

  private handleReceivedData(data: ArrayBuffer): void {
    if (this.closed) {
      return;
    }
    const packet = decodePacket(data, this.config.payloadSize);
    if (!packet) {
      this.log.trace(1, `Dropping undecodable frame of ${data.byteLength} bytes`);
      this.framesDropped++;
      return;
    }
    this.engine.onPacketArrival(packet);
  }

  private handleError(error: Error): void {
    console.error(`[ReliableReceiver] communicator error: ${error.message}`);
  }
}
