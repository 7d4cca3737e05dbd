export class WindowFullError extends Error {
  readonly windowSize: number;

  constructor(windowSize: number) {
    super(`Send window is full (${windowSize} packets awaiting ACK)`);
    this.name = "WindowFullError";
    this.windowSize = windowSize;
  }
}

export class InvalidConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid selective repeat configuration: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

export class PayloadSizeError extends Error {
  constructor(expected: number, actual: number) {
    super(`Payload must be exactly ${expected} bytes, got ${actual}`);
    this.name = "PayloadSizeError";
  }
}
