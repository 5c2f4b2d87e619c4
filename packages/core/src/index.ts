export * from "./models/common";
export * from "./models/signal";
export * from "./api/endpoints";
export type { RequestInitWithSignal } from "./api/types";
