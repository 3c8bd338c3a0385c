#!/usr/bin/env node
import { parseArgs, runCollect, runSend, runServe } from "./cli";
import { ConfigError, PipelineAbortedError } from "./common/errors";
import { getConfig } from "./config";

async function main(): Promise<number | undefined> {
  console.log("— — —");
  console.log("news-sieve");
  console.log("Prior-day news collection, near-duplicate removal and triage.");
  console.log("— — —");

  const args = parseArgs(process.argv.slice(2));
  const cfg = getConfig();

  if (args.command === "serve") {
    runServe(cfg);
    return undefined; // keep the process alive for the server
  }

  const controller = new AbortController();
  const interrupt = () => {
    console.warn("[main] Interrupt received; finishing in-flight calls and stopping.");
    controller.abort();
  };
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  return args.command === "collect" ? runCollect(cfg, args, controller.signal) : runSend(cfg, args);
}

main()
  .then((code) => {
    if (code !== undefined) process.exit(code);
  })
  .catch((err) => {
    if (err instanceof ConfigError || err instanceof PipelineAbortedError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error("Error:", err);
    }
    process.exit(err instanceof PipelineAbortedError ? 130 : 1);
  });
