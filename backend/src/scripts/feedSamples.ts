import fs from "node:fs/promises";
import path from "node:path";
import { fetchStatus, postSample } from "@signalpair/core";
import { parseTrace } from "../services/traceReplay";

const DEFAULT_BASE_URL = `http://localhost:${process.env.PORT ?? 4100}`;
const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const main = async () => {
  const argv = process.argv.slice(2);
  const urlArg = argv.find((arg) => arg.startsWith("--url="));
  const baseUrl = urlArg ? urlArg.slice("--url=".length) : DEFAULT_BASE_URL;
  const traceArg = argv.find((arg) => !arg.startsWith("--"));
  const tracePath = traceArg ? path.resolve(traceArg) : path.join(__dirname, "..", "..", "fixtures", "rushHour.json");

  const samples = parseTrace(JSON.parse(await fs.readFile(tracePath, "utf8")));
  let previousAt = samples[0]?.atMs ?? 0;
  for (const sample of samples) {
    await sleep(Math.max(0, sample.atMs - previousAt));
    previousAt = sample.atMs;
    const response = await postSample(baseUrl, sample.count);
    const sent = response.emit.status === "sent" ? ` -> ${response.emit.token}` : "";
    console.log(`count=${sample.count} confirmed=${response.status.confirmedCount} ${response.status.modeLabel}${sent}`);
  }

  const status = await fetchStatus(baseUrl);
  console.log(JSON.stringify(status, null, 2));
};

main().catch((error) => {
  console.error("Feeding samples failed", error);
  process.exit(1);
});
