import { HttpEventSource } from "../verifier/source.ts";
import { EventVerifier } from "../verifier/verifier.ts";
import { createLogger } from "../logger.ts";
import { errorMessage } from "../errors.ts";
import type { EventRecord } from "../events/types.ts";
import type { Args } from "./args.ts";
import { durationArg, filterFromArgs, parseArgs, pretty, strArg } from "./args.ts";

function baseUrl(): string {
  return process.env.COLLECTOR_URL || `http://127.0.0.1:${process.env.COLLECTOR_PORT || "8080"}`;
}

function print(ev: EventRecord, args: Args) {
  process.stdout.write(args.pretty ? `${pretty(ev)}\n` : `${JSON.stringify(ev)}\n`);
}

async function search(source: HttpEventSource, args: Args) {
  const limitRaw = strArg(args, "limit");
  const limit = limitRaw ? Math.max(0, Number(limitRaw) || 0) : Infinity;
  const events = await source.query(filterFromArgs(args));
  for (const ev of events.slice(0, limit)) print(ev, args);
}

async function wait(source: HttpEventSource, args: Args) {
  const filter = filterFromArgs(args);
  const verifier = new EventVerifier(source, { logger: createLogger({ service: "eventctl", level: "warn" }) });
  const ev = await verifier.assertContains(filter, {
    timeoutMs: durationArg(args, "timeout", 10_000),
    pollIntervalMs: durationArg(args, "interval", 250),
  });
  print(ev, args);
}

async function reset(source: HttpEventSource) {
  const cleared = await source.reset();
  process.stdout.write(`cleared: ${cleared}\n`);
}

function help() {
  process.stdout.write(
    `eventctl

Usage:
  eventctl search [--name <n>] [--name-mode exact|contains|starts_with|regex] [--since <30s|5m>] [--contains '<json>'] [--limit <n>] [--pretty]
  eventctl wait --name <n> [--name-mode <m>] [--contains '<json>'] [--timeout 10s] [--interval 250ms] [--pretty]
  eventctl reset
  eventctl health

Notes:
  - Talks to $COLLECTOR_URL (default http://127.0.0.1:$COLLECTOR_PORT, port 8080).
  - --contains matches a JSON subset: "*" any value, "~text" substring.
`
  );
}

async function main() {
  const { cmd, args } = parseArgs(process.argv.slice(2));
  const source = new HttpEventSource(baseUrl());
  try {
    if (cmd === "search") return await search(source, args);
    if (cmd === "wait") return await wait(source, args);
    if (cmd === "reset") return await reset(source);
    if (cmd === "health") {
      const ok = await source.health();
      process.stdout.write(ok ? "ok\n" : "unreachable\n");
      if (!ok) process.exitCode = 1;
      return;
    }
    return help();
  } catch (e) {
    process.stderr.write(`eventctl: ${errorMessage(e)}\n`);
    process.exit(1);
  }
}

await main();
