import type { Timestamp } from "./timer";

const describeCause = (cause: unknown) => {
  if (cause instanceof Error) return cause.message;
  return JSON.stringify(cause);
};

export class LinkError extends Error {
  readonly code = "link_error";
  readonly linkName: string;
  readonly token: string;

  constructor(linkName: string, token: string, cause: unknown) {
    super(`Actuator link "${linkName}" failed to write ${token}: ${describeCause(cause)}`, { cause });
    this.name = "LinkError";
    this.linkName = linkName;
    this.token = token;
  }
}

export class InvalidCountError extends Error {
  readonly code = "invalid_count";
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Vehicle count must be a non-negative integer, received ${String(value)}`);
    this.name = "InvalidCountError";
    this.value = value;
  }
}

export class ClockRegressionError extends Error {
  readonly code = "clock_regression";
  readonly previous: Timestamp;
  readonly received: Timestamp;

  constructor(previous: Timestamp, received: Timestamp) {
    super(`Clock moved backwards by ${(previous - received).toFixed(1)}ms; treating elapsed time as zero`);
    this.name = "ClockRegressionError";
    this.previous = previous;
    this.received = received;
  }
}

export function assertValidCount(value: unknown): asserts value is number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new InvalidCountError(value);
  }
}
