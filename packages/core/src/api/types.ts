export type RequestInitWithSignal = Omit<RequestInit, "method" | "body">;
