import type { LightColor, LightPair } from "@signalpair/core";
import { LinkError } from "./errors";
import { sameLights } from "./modeMachine";
import { logger as defaultLogger, type Logger } from "../utils/logger";

export interface ActuatorLink {
  readonly name: string;
  write: (token: string) => Promise<void>;
}

export type EmitResult =
  | { status: "skipped" }
  | { status: "sent"; token: string }
  | { status: "failed"; token: string; error: LinkError };

export interface EmitOptions {
  /** Write even when nothing changed; used by reset. */
  force?: boolean;
  /** Drops an alert left over from a failed write instead of carrying it; used by reset. */
  clearAlert?: boolean;
}

const LIGHT_CODES: Record<LightColor, "R" | "Y" | "G"> = {
  red: "R",
  yellow: "Y",
  green: "G",
};

const LIGHT_NAMES: Record<LightColor, string> = {
  red: "RED",
  yellow: "YELLOW",
  green: "GREEN",
};

/** `A<c>B<c>` with a trailing `H` when the high-traffic alert rides along, e.g. `ARBGH`. */
export const encodeCommand = (lights: LightPair, alert: boolean): string =>
  `A${LIGHT_CODES[lights.colorA]}B${LIGHT_CODES[lights.colorB]}${alert ? "H" : ""}`;

export interface CommandEmitterOptions {
  logger?: Logger;
}

/**
 * Diffs the desired lights against what the actuator last acknowledged. A failed write leaves
 * `lastSent` untouched, so the next call retries the same command; an undelivered alert stays
 * pending until a write carrying it succeeds.
 */
export class CommandEmitter {
  private lastSent: LightPair | null = null;
  private lastToken: string | null = null;
  private alertPending = false;
  private failures = 0;
  private readonly logger: Logger;

  constructor(options: CommandEmitterOptions = {}) {
    this.logger = options.logger ?? defaultLogger.child("emitter");
  }

  async emit(desired: LightPair, alert: boolean, link: ActuatorLink, options: EmitOptions = {}): Promise<EmitResult> {
    const withAlert = alert || (this.alertPending && !options.clearAlert);
    const changed = !this.lastSent || !sameLights(this.lastSent, desired);
    if (!changed && !withAlert && !options.force) {
      return { status: "skipped" };
    }

    const token = encodeCommand(desired, withAlert);
    try {
      await link.write(token);
    } catch (error) {
      const linkError = error instanceof LinkError ? error : new LinkError(link.name, token, error);
      this.alertPending = withAlert;
      this.failures += 1;
      this.logger.error("Failed to send light command", {
        link: link.name,
        token,
        message: linkError.message,
      });
      return { status: "failed", token, error: linkError };
    }

    this.lastSent = { ...desired };
    this.lastToken = token;
    this.alertPending = false;
    this.logger.info(withAlert ? "HIGH TRAFFIC ALERT" : "Lights changed", {
      token,
      trafficA: LIGHT_NAMES[desired.colorA],
      trafficB: LIGHT_NAMES[desired.colorB],
    });
    return { status: "sent", token };
  }

  getLastSent(): LightPair | null {
    return this.lastSent ? { ...this.lastSent } : null;
  }

  getLastToken(): string | null {
    return this.lastToken;
  }

  getFailureCount(): number {
    return this.failures;
  }

  hasPendingAlert(): boolean {
    return this.alertPending;
  }
}
