import { z } from "zod";
import { DEFAULT_CONFIG, type SelectiveRepeatConfig } from "./types";
import { InvalidConfigError } from "./errors";

// Largest delay setTimeout honours.
const MAX_TIMER_DELAY = 2 ** 31 - 1;
// Keeps seqnum and checksum inside the int32 wire fields.
const MAX_SEQ_SPACE = 2 ** 24;
const MAX_PAYLOAD_SIZE = 65535;

const configSchema = z
  .object({
    windowSize: z.number().int().positive(),
    seqSpace: z.number().int().positive().max(MAX_SEQ_SPACE),
    payloadSize: z.number().int().positive().max(MAX_PAYLOAD_SIZE),
    retransmitInterval: z.number().int().positive().max(MAX_TIMER_DELAY),
    trace: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]),
  })
  .refine((config) => config.seqSpace >= 2 * config.windowSize, {
    message: "seqSpace must be at least twice windowSize",
    path: ["seqSpace"],
  });

/**
 * Merge overrides over the defaults and reject configurations where old and
 * new packets could share a sequence number inside one window.
 */
export function resolveConfig(
  overrides: Partial<SelectiveRepeatConfig> = {}
): SelectiveRepeatConfig {
  const result = configSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
      )
    );
  }
  return result.data;
}
