export type EntityId = "A" | "B";

export const ENTITY = {
  SENDER: "A",
  RECEIVER: "B",
} as const satisfies Record<string, EntityId>;

/**
 * A packet as it travels between the two entities.
 *
 * Data packets carry a meaningful `seqnum`; ACK packets carry a meaningful
 * `acknum`. The unused field holds `NOT_IN_USE`.
 */
export interface Packet {
  seqnum: number;
  acknum: number;
  checksum: number;
  payload: Uint8Array;
}

export interface Message {
  data: Uint8Array;
}

/**
 * Everything the engines need from the environment. The engines never call
 * each other; packets only move through `deliverToNetwork`.
 */
export interface ProtocolHost {
  deliverToNetwork(entity: EntityId, packet: Packet): void;
  deliverToApplication(entity: EntityId, payload: Uint8Array): void;
  armTimer(entity: EntityId, interval: number): void;
  disarmTimer(entity: EntityId): void;
  onAnomaly?: (entity: EntityId, anomaly: ProtocolAnomaly, packet?: Packet) => void;
}

export type ProtocolAnomaly =
  | "corrupted"
  | "out-of-window"
  | "duplicate-ack"
  | "duplicate-data"
  | "window-full";

export type SubmitResult =
  | { status: "sent"; seqnum: number }
  | { status: "window-full" };

export interface SelectiveRepeatConfig {
  windowSize: number;
  seqSpace: number;
  payloadSize: number;
  retransmitInterval: number;
  trace: TraceLevel;
}

export type TraceLevel = 0 | 1 | 2 | 3;

export const DEFAULT_CONFIG: SelectiveRepeatConfig = {
  windowSize: 6,
  seqSpace: 12,
  payloadSize: 20,
  retransmitInterval: 16,
  trace: 0,
};

export interface SenderStatistics {
  readonly packetsSent: number;
  readonly packetsResent: number;
  readonly windowFullRejections: number;
  readonly acksReceived: number;
  readonly newAcks: number;
  readonly duplicateAcks: number;
  readonly corruptedAcks: number;
  readonly staleAcks: number;
}

export interface ReceiverStatistics {
  readonly packetsReceived: number;
  readonly packetsDelivered: number;
  readonly duplicatePackets: number;
  readonly corruptedPackets: number;
  readonly acksSent: number;
}

export type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Pending retransmission alarm. At most one exists per entity.
 */
export interface Alarm {
  readonly interval: number;
  readonly seqnum: number;
}

export interface UnreliableCommunicator {
  send(data: ArrayBuffer, onComplete?: () => void): void;
  onReceive?: (data: ArrayBuffer) => void;
  onError?: (error: Error) => void;
}
