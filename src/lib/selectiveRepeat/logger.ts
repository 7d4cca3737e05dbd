import type { TraceLevel } from "./types";

export type LogSink = (line: string) => void;

export interface TraceLogger {
  trace(level: Exclude<TraceLevel, 0>, message: string): void;
}

// Tag format matches "[Component] message".
export function createLogger(
  tag: string,
  level: TraceLevel,
  sink: LogSink = (line) => console.log(line)
): TraceLogger {
  return {
    trace(messageLevel, message) {
      if (level >= messageLevel) {
        sink(`[${tag}] ${message}`);
      }
    },
  };
}
