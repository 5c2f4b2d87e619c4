import fs from "node:fs/promises";
import path from "node:path";
import { parseTrace, replayTrace } from "../services/traceReplay";
import { DEFAULT_TIMINGS } from "../engine/timings";

const DEFAULT_TRACE = path.join(__dirname, "..", "..", "fixtures", "rushHour.json");

interface ReplayArgs {
  tracePath: string;
  heartbeatMs: number;
}

const parseArgs = (argv: string[]): ReplayArgs => {
  const args: ReplayArgs = { tracePath: DEFAULT_TRACE, heartbeatMs: 250 };
  argv.forEach((arg) => {
    if (!arg.startsWith("--")) {
      args.tracePath = path.resolve(arg);
      return;
    }
    const [key, rawValue] = arg.slice(2).split("=");
    if (key === "heartbeat") {
      const parsed = Number(rawValue);
      if (Number.isFinite(parsed) && parsed >= 0) args.heartbeatMs = parsed;
    }
  });
  return args;
};

const formatSeconds = (ms: number) => `${(ms / 1000).toFixed(2).padStart(8)}s`;

const main = async () => {
  const args = parseArgs(process.argv.slice(2));
  const raw: unknown = JSON.parse(await fs.readFile(args.tracePath, "utf8"));
  const samples = parseTrace(raw);
  const result = await replayTrace(samples, { heartbeatMs: args.heartbeatMs, timings: DEFAULT_TIMINGS });

  console.log(`Replayed ${samples.length} samples from ${path.basename(args.tracePath)}`);
  result.commands.forEach((command) => {
    console.log(`${formatSeconds(command.atMs)}  ${command.token}`);
  });
  if (result.rejectedSamples > 0) {
    console.log(`Rejected samples: ${result.rejectedSamples}`);
  }
  console.log(
    `Final: ${result.finalStatus.modeLabel}, confirmed=${result.finalStatus.confirmedCount}, last=${result.finalStatus.lastCommand ?? "none"}`,
  );
};

main().catch((error) => {
  console.error("Trace replay failed", error);
  process.exit(1);
});
