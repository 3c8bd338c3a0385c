import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { createCheckpointStore, createPipeline } from "./bootstrap";
import { isDateKey, runDateKey, windowForRunDate } from "./collectors/window";
import { ConfigError } from "./common/errors";
import { ConsoleProgressReporter, ProgressReporter } from "./common/ProgressReporter";
import { AppConfig, DeliveryMode, requireConfigKeys } from "./config";
import { ConsoleDeliveryChannel, DeliveryChannel } from "./delivery/DeliveryChannel";
import { DeliveryService } from "./delivery/DeliveryService";
import { WebhookDeliveryChannel } from "./delivery/WebhookDeliveryChannel";
import { HttpClient } from "./fetchers/http";
import { buildReports } from "./output/reports";
import { createServer } from "./server";
import { StatsSnapshot } from "./types";

export type Command = "collect" | "send" | "serve";

export interface CliArgs {
  command: Command;
  date?: string;
  mode?: DeliveryMode;
  dryRun: boolean;
}

export const USAGE = `Usage:
  news-sieve collect [--date YYYY-MM-DD]
  news-sieve send [--date YYYY-MM-DD] [--mode single|batch] [--dry-run]
  news-sieve serve`;

export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  if (command !== "collect" && command !== "send" && command !== "serve") {
    throw new ConfigError(`Unknown command "${command ?? ""}".\n${USAGE}`);
  }

  const args: CliArgs = { command, dryRun: false };
  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    const [name, inline] = flag.split("=", 2);
    const value = () => {
      const v = inline ?? rest[++i];
      if (!v) throw new ConfigError(`${name} needs a value`);
      return v;
    };
    switch (name) {
      case "--date": {
        const date = value();
        if (!isDateKey(date)) throw new ConfigError(`--date must be YYYY-MM-DD, got "${date}"`);
        args.date = date;
        break;
      }
      case "--mode": {
        const mode = value();
        if (mode !== "single" && mode !== "batch") throw new ConfigError(`--mode must be single or batch, got "${mode}"`);
        args.mode = mode;
        break;
      }
      case "--dry-run":
        args.dryRun = true;
        break;
      default:
        throw new ConfigError(`Unknown option "${flag}".\n${USAGE}`);
    }
  }
  return args;
}

/** Non-zero when the run produced nothing or lost a regulatory item. */
export function collectExitCode(stats: StatsSnapshot): number {
  if (stats.final === 0) return 1;
  if (stats.regulatoryRetained < stats.regulatoryFound) return 1;
  return 0;
}

function printStats(stats: StatsSnapshot) {
  console.log("— — —");
  console.log("Pipeline summary");
  console.log(`Collected: ${stats.collected}`);
  console.log(`After title dedup: ${stats.afterDedup1}`);
  console.log(`After category filter: ${stats.afterFilter}`);
  console.log(`After content dedup: ${stats.afterDedup2}`);
  console.log(`After validation: ${stats.afterValidation}`);
  console.log(`Final messages: ${stats.final}`);
  console.log(`Regulatory retained: ${stats.regulatoryRetained}/${stats.regulatoryFound}`);
  console.log("— — —");
}

export async function runCollect(cfg: AppConfig, args: CliArgs, signal: AbortSignal): Promise<number> {
  requireConfigKeys(cfg, ["openAiKey"]);
  const reporter = new ConsoleProgressReporter();
  const dateKey = args.date ?? runDateKey(Date.now(), cfg.referenceUtcOffsetMinutes);
  const window = windowForRunDate(dateKey, cfg.referenceUtcOffsetMinutes);
  console.log(`[collect] run ${dateKey}, collecting articles published on ${window.dateKey}`);

  const result = await createPipeline(cfg, reporter).run(window, dateKey, signal);
  printStats(result.stats);

  if (result.messages.length) {
    const outDir = path.resolve(process.cwd(), cfg.outputDir);
    await mkdir(outDir, { recursive: true });
    for (const report of buildReports(dateKey, result.messages, result.partners)) {
      const filePath = path.join(outDir, report.fileName);
      await writeFile(filePath, report.content, "utf-8");
      console.log(`[persist] ${report.fileName} written to ${filePath}`);
    }
  }

  const code = collectExitCode(result.stats);
  if (result.stats.regulatoryRetained < result.stats.regulatoryFound) {
    console.error("[collect] Regulatory retention invariant violated.");
  } else if (code !== 0) {
    console.error("[collect] No output produced.");
  }
  return code;
}

function createChannel(cfg: AppConfig, args: CliArgs): DeliveryChannel {
  if (args.dryRun) return new ConsoleDeliveryChannel();
  requireConfigKeys(cfg, ["deliveryBotToken", "deliveryRoomId"]);
  return new WebhookDeliveryChannel(
    { apiBase: cfg.deliveryApiBase, botToken: cfg.deliveryBotToken ?? "", roomId: cfg.deliveryRoomId ?? "" },
    new HttpClient({ label: "Delivery webhook", allowInsecureTls: cfg.allowInsecureTls })
  );
}

export async function runSend(cfg: AppConfig, args: CliArgs, reporter: ProgressReporter = new ConsoleProgressReporter()): Promise<number> {
  const dateKey = args.date ?? runDateKey(Date.now(), cfg.referenceUtcOffsetMinutes);
  const channel = createChannel(cfg, args);
  const record = await createCheckpointStore(cfg, reporter).read(dateKey);
  if (!record) {
    console.error(`[send] No checkpoint found for ${dateKey}. Run "collect" first.`);
    return 1;
  }

  const report = await new DeliveryService(channel).deliver(record.messages, dateKey, args.mode ?? cfg.deliveryMode);
  console.log(`[send] ${report.delivered}/${report.total} delivered (${report.mode}${args.dryRun ? ", dry run" : ""})`);
  if (report.total === 0) {
    console.error("[send] Checkpoint has no direct-relevance messages to send.");
    return 1;
  }
  return report.delivered === 0 ? 1 : 0;
}

export function runServe(cfg: AppConfig): void {
  const app = createServer(createCheckpointStore(cfg, new ConsoleProgressReporter()));
  app.listen(cfg.port, () => {
    console.log(`news-sieve checkpoint API running at http://localhost:${cfg.port}`);
  });
}
