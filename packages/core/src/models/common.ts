export type LightColor = "red" | "yellow" | "green";

/** A is the camera-observed approach, B is the cross traffic. */
export type Direction = "A" | "B";

export interface LightPair {
  colorA: LightColor;
  colorB: LightColor;
}

export type IsoTimestamp = string;

export interface SignalErrorResponse {
  error: string;
  message?: string;
}
