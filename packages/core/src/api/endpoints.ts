import type { RequestInitWithSignal } from "./types";
import type { ControllerStatus, ResetResponse, SampleRequest, SampleResponse } from "../models/signal";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

const buildUrl = (baseUrl: string, path: string) =>
  new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`).toString();

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw new Error(`Signal API request failed (${response.status})`);
  }
  return (await response.json()) as T;
};

export const fetchStatus = async (baseUrl: string, init?: RequestInitWithSignal): Promise<ControllerStatus> => {
  const response = await fetch(buildUrl(baseUrl, "/api/status"), { ...init });
  return handleJson<ControllerStatus>(response);
};

export const postSample = async (
  baseUrl: string,
  count: number,
  init?: RequestInitWithSignal,
): Promise<SampleResponse> => {
  const payload: SampleRequest = { count };
  const response = await fetch(buildUrl(baseUrl, "/api/samples"), {
    ...init,
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(payload),
  });
  return handleJson<SampleResponse>(response);
};

export const postReset = async (baseUrl: string, init?: RequestInitWithSignal): Promise<ResetResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/reset"), { ...init, method: "POST" });
  return handleJson<ResetResponse>(response);
};
