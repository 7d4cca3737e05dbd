import { describe, it, expect } from "vitest";
import { ChannelEmulator } from "./__tests__/emulator";

const sequence = (count: number) => Array.from({ length: count }, (_, i) => i);

describe("Selective repeat over an emulated channel", () => {
  it("should deliver everything once with no retransmissions on a clean channel", () => {
    const emulator = new ChannelEmulator({ messages: 30, jitter: 2 }).run();

    expect(emulator.violations).toEqual([]);
    expect(emulator.deliveredIndices).toEqual(sequence(30));
    expect(emulator.transmissions).toBe(60);
    expect(emulator.sender.getStatistics().packetsResent).toBe(0);
    expect(emulator.sender.getWindowCount()).toBe(0);
    expect(emulator.sender.isTimerArmed()).toBe(false);
    expect(emulator.receiver.getExpectedSeqNum()).toBe(6);
  });

  it.each([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12])(
    "should deliver in order exactly once under loss and corruption (seed %i)",
    (seed) => {
      const emulator = new ChannelEmulator({
        messages: 50,
        lossProb: 0.2,
        corruptProb: 0.2,
        seed,
      }).run();

      expect(emulator.violations).toEqual([]);
      expect(emulator.deliveredIndices).toEqual(sequence(50));
      expect(emulator.sender.getOutstandingCount()).toBe(0);
      expect(emulator.sender.isTimerArmed()).toBe(false);
      expect(emulator.receiver.getBufferedCount()).toBe(0);
    }
  );

  it("should survive a channel that loses half of everything", () => {
    const emulator = new ChannelEmulator({
      messages: 40,
      lossProb: 0.5,
      corruptProb: 0.1,
      seed: 42,
    }).run();

    expect(emulator.violations).toEqual([]);
    expect(emulator.deliveredIndices).toEqual(sequence(40));
    expect(emulator.sender.getStatistics().packetsResent).toBeGreaterThan(0);
  });

  it("should reject submissions while the window is full and recover", () => {
    const emulator = new ChannelEmulator({
      messages: 20,
      messageInterval: 1,
      delay: 20,
      jitter: 0,
      config: { retransmitInterval: 200 },
    }).run();

    expect(emulator.violations).toEqual([]);
    expect(emulator.windowFullRejections).toBeGreaterThan(0);
    expect(emulator.deliveredIndices).toEqual(sequence(20));
  });

  it("should work with a minimal window over the smallest legal sequence space", () => {
    const emulator = new ChannelEmulator({
      messages: 25,
      lossProb: 0.3,
      corruptProb: 0.1,
      seed: 7,
      config: { windowSize: 1, seqSpace: 2 },
    }).run();

    expect(emulator.violations).toEqual([]);
    expect(emulator.deliveredIndices).toEqual(sequence(25));
  });
});
