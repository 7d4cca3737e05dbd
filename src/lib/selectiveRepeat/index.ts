export type {
  EntityId,
  Packet,
  Message,
  ProtocolHost,
  ProtocolAnomaly,
  SubmitResult,
  SelectiveRepeatConfig,
  TraceLevel,
  SenderStatistics,
  ReceiverStatistics,
  Alarm,
  UnreliableCommunicator,
} from "./types";
export { ENTITY, DEFAULT_CONFIG } from "./types";
export { resolveConfig } from "./config";
export { WindowFullError, InvalidConfigError, PayloadSizeError } from "./errors";
export { computeChecksum, isCorrupted } from "./checksum";
export {
  NOT_IN_USE,
  PACKET_HEADER_SIZE,
  makeDataPacket,
  makeAckPacket,
  encodePacket,
  decodePacket,
} from "./packet";
export { SlidingWindow, inWindow, seqOffset, seqAdd } from "./window";
export { SenderEngine } from "./sender";
export type { SendSlotView } from "./sender";
export { ReceiverEngine } from "./receiver";
export { ReliableSender, ReliableReceiver } from "./link";
export { createLogger } from "./logger";
export type { LogSink, TraceLogger } from "./logger";
