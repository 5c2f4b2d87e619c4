import type { ControllerStatus } from "@signalpair/core";
import { CommandEmitter, type ActuatorLink, type EmitResult } from "./commandEmitter";
import {
  confirmationRemaining,
  createStabilizerState,
  observeCount,
  type StabilizerEvent,
  type StabilizerState,
} from "./detectionStabilizer";
import { assertValidCount, ClockRegressionError, InvalidCountError } from "./errors";
import {
  createModeState,
  highTrafficRemaining,
  modeLabel,
  tickMode,
  yellowRemaining,
  type LightChange,
  type ModeState,
} from "./modeMachine";
import { isClockRegression, monotonicClock, type Clock, type Timestamp } from "./timer";
import { DEFAULT_TIMINGS, type SignalTimings } from "./timings";
import { logger as defaultLogger, type Logger } from "../utils/logger";

export interface ControllerState {
  stabilizer: StabilizerState;
  modeState: ModeState;
  /** Last accepted raw sample. */
  rawCount: number | null;
  /** Latest instant seen; never moves backwards. */
  lastNow: Timestamp | null;
}

export const createControllerState = (now: Timestamp = 0): ControllerState => ({
  stabilizer: createStabilizerState(now),
  modeState: createModeState(),
  rawCount: null,
  lastNow: null,
});

export interface StepOutcome {
  state: ControllerState;
  confirmedCount: number;
  change: LightChange | null;
  stabilizerEvent: StabilizerEvent | null;
  regression: ClockRegressionError | null;
}

const effectiveInstant = (state: ControllerState, now: Timestamp): Timestamp =>
  state.lastNow === null ? now : Math.max(state.lastNow, now);

/**
 * One control tick over an explicit state value. A null `rawCount` is a heartbeat: the mode machine
 * runs on the current confirmed count and the detection history is left alone.
 */
export const stepControllerState = (
  state: ControllerState,
  rawCount: number | null,
  now: Timestamp,
  timings: SignalTimings,
): StepOutcome => {
  const regression =
    state.lastNow !== null && isClockRegression(state.lastNow, now) ? new ClockRegressionError(state.lastNow, now) : null;
  // A regressed `now` is held at the latest instant seen before anything is stamped with it.
  const at = effectiveInstant(state, now);

  const observed = rawCount === null ? null : observeCount(state.stabilizer, rawCount, at, timings);
  const stabilizer = observed?.state ?? state.stabilizer;
  const ticked = tickMode(state.modeState, stabilizer.confirmedCount, at, timings);

  return {
    state: {
      stabilizer,
      modeState: ticked.state,
      rawCount: rawCount ?? state.rawCount,
      lastNow: at,
    },
    confirmedCount: stabilizer.confirmedCount,
    change: ticked.change,
    stabilizerEvent: observed?.event ?? null,
    regression,
  };
};

export interface StepResult {
  confirmedCount: number;
  change: LightChange | null;
  emit: EmitResult;
  rejected: InvalidCountError | null;
}

export interface SignalControllerOptions {
  link: ActuatorLink;
  timings?: SignalTimings;
  clock?: Clock;
  logger?: Logger;
  /** Called after every tick, reset and start with the fresh status. */
  onStatus?: (status: ControllerStatus) => void;
}

export class SignalController {
  private state: ControllerState;
  private readonly link: ActuatorLink;
  private readonly timings: SignalTimings;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly emitter: CommandEmitter;
  private readonly onStatus: ((status: ControllerStatus) => void) | undefined;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: SignalControllerOptions) {
    this.link = options.link;
    this.timings = options.timings ?? DEFAULT_TIMINGS;
    this.clock = options.clock ?? monotonicClock;
    const baseLogger = options.logger ?? defaultLogger;
    this.logger = baseLogger.child("controller");
    this.onStatus = options.onStatus;
    this.emitter = new CommandEmitter({ logger: baseLogger.child("emitter") });
    this.state = createControllerState(this.clock.now());
  }

  get linkName(): string {
    return this.link.name;
  }

  /** Sends the initial lights unconditionally. */
  start(): Promise<EmitResult> {
    return this.enqueue(async () => {
      const result = await this.emitter.emit(this.state.modeState.lights, false, this.link, { force: true });
      this.notify(this.clock.now());
      return result;
    });
  }

  /** Feeds one raw vehicle count and advances the lights. Invalid counts are rejected and logged. */
  observe(rawCount: unknown, now: Timestamp = this.clock.now()): Promise<StepResult> {
    return this.enqueue(async () => {
      try {
        assertValidCount(rawCount);
        return await this.runStep(rawCount, now, null);
      } catch (error) {
        if (!(error instanceof InvalidCountError)) throw error;
        this.logger.warn("Rejected vehicle count sample", { message: error.message });
        return this.runStep(null, now, error);
      }
    });
  }

  /** Heartbeat tick; lets yellow clearances and high-traffic windows expire between samples. */
  advance(now: Timestamp = this.clock.now()): Promise<StepResult> {
    return this.enqueue(() => this.runStep(null, now, null));
  }

  /** Forces Normal mode with cross traffic green and re-sends that command. */
  reset(now: Timestamp = this.clock.now()): Promise<EmitResult> {
    return this.enqueue(async () => {
      const at = effectiveInstant(this.state, now);
      this.state = { ...this.state, modeState: createModeState(), lastNow: at };
      this.logger.info("Controller reset - cross traffic green");
      const result = await this.emitter.emit(this.state.modeState.lights, false, this.link, {
        force: true,
        clearAlert: true,
      });
      this.notify(at);
      return result;
    });
  }

  getState(): ControllerState {
    return this.state;
  }

  getStatus(now: Timestamp = this.clock.now()): ControllerStatus {
    const { stabilizer, modeState } = this.state;
    const { mode } = modeState;
    const round = (value: number | null) => (value === null ? null : Math.round(value));
    return {
      lights: { ...modeState.lights },
      modeLabel: modeLabel(mode),
      rawCount: this.state.rawCount,
      confirmedCount: stabilizer.confirmedCount,
      pendingCount: stabilizer.pendingCount,
      confirmingRemainingMs: round(confirmationRemaining(stabilizer, now, this.timings)),
      yellowRemainingMs: round(yellowRemaining(mode, now, this.timings)),
      highTrafficDirection: mode.kind === "highTraffic" ? mode.activeDirection : null,
      highTrafficRemainingMs: round(highTrafficRemaining(mode, now, this.timings)),
      lastCommand: this.emitter.getLastToken(),
      linkFailures: this.emitter.getFailureCount(),
      generatedAt: new Date().toISOString(),
    };
  }

  private async runStep(
    rawCount: number | null,
    now: Timestamp,
    rejected: InvalidCountError | null,
  ): Promise<StepResult> {
    const outcome = stepControllerState(this.state, rawCount, now, this.timings);
    this.state = outcome.state;

    if (outcome.regression) {
      this.logger.warn(outcome.regression.message, {
        previous: outcome.regression.previous,
        received: outcome.regression.received,
      });
    }
    const event = outcome.stabilizerEvent;
    if (event?.type === "pending") {
      this.logger.debug("New detection pending", { count: event.count, requiredMs: event.requiredMs });
    } else if (event?.type === "confirmed") {
      this.logger.info("Detection confirmed", {
        count: event.count,
        previous: event.previous,
        stableForMs: Math.round(event.stableForMs),
      });
    }
    if (outcome.change) {
      this.logger.info("Light transition", {
        reason: outcome.change.reason,
        confirmedCount: outcome.confirmedCount,
        mode: modeLabel(outcome.state.modeState.mode),
      });
    }

    const alert = outcome.change?.alert ?? false;
    const emit = await this.emitter.emit(outcome.state.modeState.lights, alert, this.link);
    this.notify(outcome.state.lastNow ?? now);
    return { confirmedCount: outcome.confirmedCount, change: outcome.change, emit, rejected };
  }

  private notify(now: Timestamp) {
    this.onStatus?.(this.getStatus(now));
  }

  /** Ticks run one at a time, in call order; failures still reach the caller through the returned promise. */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
