import type { Direction, IsoTimestamp, LightPair } from "./common";

export type ModeLabel = "normal" | "yellow_clearance" | "high_traffic";

export interface ControllerStatus {
  lights: LightPair;
  modeLabel: ModeLabel;
  rawCount: number | null;
  confirmedCount: number;
  pendingCount: number;
  confirmingRemainingMs: number | null;
  yellowRemainingMs: number | null;
  highTrafficDirection: Direction | null;
  highTrafficRemainingMs: number | null;
  lastCommand: string | null;
  linkFailures: number;
  generatedAt: IsoTimestamp;
}

export type EmitSummary =
  | { status: "skipped" }
  | { status: "sent"; token: string }
  | { status: "failed"; token: string; message: string };

export interface SampleRequest {
  count: number;
}

export interface SampleResponse {
  status: ControllerStatus;
  emit: EmitSummary;
}

export interface ResetResponse {
  status: ControllerStatus;
  emit: EmitSummary;
}
