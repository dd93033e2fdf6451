#!/usr/bin/env node
import { Command, Option } from "commander";
import pc from "picocolors";
import { DEFAULT_PAGE_SIZE, TGF_DATASETS } from "./config/defaults.js";
import { loadConfig, type RefreshConfig } from "./config/loadConfig.js";
import { resolveToken, runInstall } from "./install/runInstall.js";
import { runStatus } from "./install/runStatus.js";
import { RefreshClient, type RefreshResponse } from "./services/refresh/refreshClient.js";
import {
  formatInstallText,
  formatResponseJson,
  formatResponseText,
  formatStatusJson,
  formatStatusText
} from "./report/formatters.js";
import { promptHidden } from "./ui/prompts.js";
import { ConfigError } from "./errors/config.errors.js";
import { createAppLogger, noopLogger, withSecrets, type AppLogger, type Logger } from "./logging/logger.js";

const program = new Command();

type CommonOptions = {
  config?: string;
  baseUrl?: string;
  token?: string;
};

async function openAppLogger(config: RefreshConfig, label: string): Promise<AppLogger | null> {
  try {
    return await createAppLogger({
      stateDir: config.stateDir,
      label,
      secrets: config.token ? [config.token] : []
    });
  } catch {
    // Logging to file is best effort; the console still gets everything.
    return null;
  }
}

function createUiLogger(appLog: Logger, quiet: boolean): Logger {
  return {
    info: (message, meta) => {
      appLog.info(message, meta);
      if (!quiet) console.log(message);
    },
    warn: (message, meta) => {
      appLog.warn(message, meta);
      if (!quiet) console.log(pc.yellow(message));
    },
    error: (message, meta) => {
      appLog.error(message, meta);
      console.error(pc.red(message));
    },
    debug: (message, meta) => appLog.debug(message, meta)
  };
}

/**
 * Loads config, opens the run's log file and runs `fn`, mapping failures to
 * exit codes: 2 for configuration errors, 1 for everything else.
 */
async function withCommand(
  label: string,
  options: CommonOptions & { schedule?: string; quiet?: boolean },
  fn: (ctx: { config: RefreshConfig; uiLogger: Logger; appLogger: Logger }) => Promise<void>
): Promise<void> {
  let appLogger: AppLogger | null = null;
  let uiLogger = createUiLogger(noopLogger, Boolean(options.quiet));
  try {
    const config = await loadConfig({
      cwd: process.cwd(),
      configPath: options.config,
      overrides: { baseUrl: options.baseUrl, schedule: options.schedule }
    });
    appLogger = await openAppLogger(config, label);
    const appLog = appLogger ?? noopLogger;
    uiLogger = createUiLogger(appLog, Boolean(options.quiet));
    await fn({ config, uiLogger, appLogger: appLog });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    uiLogger.error(`Error: ${message}`);
    process.exitCode = err instanceof ConfigError ? 2 : 1;
  } finally {
    await appLogger?.close();
  }
}

async function createClient(
  config: RefreshConfig,
  explicitToken: string | undefined,
  logger: Logger
): Promise<RefreshClient> {
  const { token } = await resolveToken({ explicit: explicitToken, config, prompt: null });
  return new RefreshClient({
    baseUrl: config.baseUrl,
    token,
    timeoutSeconds: config.timeoutSeconds,
    logger: withSecrets(logger, [token])
  });
}

function printResponse(response: RefreshResponse, json: boolean | undefined): void {
  console.log(json ? formatResponseJson(response) : formatResponseText(response));
}

const configOption = () => new Option("-c, --config <path>", "Path to dx-refresh.config.json");
const baseUrlOption = () =>
  new Option("--base-url <url>", "Backend base URL (default http://localhost:5000/backup)");
const tokenOption = () => new Option("-t, --token <value>", "Authorization header value");

program
  .name("dx-refresh")
  .description("Install and drive the Data Explorer daily dataset refresh")
  .version("0.1.0");

program
  .command("install")
  .description("Add the daily refresh cron job unless it is already installed")
  .addOption(configOption())
  .addOption(baseUrlOption())
  .addOption(tokenOption())
  .option("--schedule <expr>", "Cron schedule (default \"30 9 * * *\")")
  .option("--dry-run", "Print the entry without touching the crontab")
  .action(async (options: CommonOptions & { schedule?: string; dryRun?: boolean }) => {
    await withCommand("install", options, async ({ config, uiLogger, appLogger }) => {
      const result = await runInstall({
        config,
        token: options.token,
        dryRun: options.dryRun,
        prompt: promptHidden,
        uiLogger,
        appLogger
      });
      const text = formatInstallText(result);
      appLogger.info(text, { status: result.status });
      console.log(result.status === "added" ? pc.green(text) : text);
    });
  });

program
  .command("status")
  .description("Report whether the refresh cron job is installed")
  .addOption(configOption())
  .addOption(baseUrlOption())
  .addOption(tokenOption())
  .option("--schedule <expr>", "Cron schedule to look for")
  .option("--json", "Output JSON")
  .action(async (options: CommonOptions & { schedule?: string; json?: boolean }) => {
    await withCommand("status", { ...options, quiet: options.json }, async ({ config, appLogger }) => {
      const result = await runStatus({ config, token: options.token, appLogger });
      console.log(options.json ? formatStatusJson(result) : formatStatusText(result));
      process.exitCode = result.installed ? 0 : 1;
    });
  });

program
  .command("trigger")
  .description("Call the dataset refresh endpoint once")
  .addOption(configOption())
  .addOption(baseUrlOption())
  .addOption(tokenOption())
  .addOption(
    new Option("-d, --dataset <name>", "Force-update a single dataset").choices([...TGF_DATASETS])
  )
  .option("--json", "Output JSON")
  .action(async (options: CommonOptions & { dataset?: string; json?: boolean }) => {
    await withCommand("trigger", { ...options, quiet: options.json }, async ({ config, uiLogger, appLogger }) => {
      const client = await createClient(config, options.token, appLogger);
      uiLogger.info(
        options.dataset ? `Forcing update of ${options.dataset}...` : "Refreshing datasets..."
      );
      const response = options.dataset
        ? await client.forceUpdateDataset(options.dataset)
        : await client.updateDatasets();
      printResponse(response, options.json);
    });
  });

program
  .command("health")
  .description("Call the backend health check")
  .addOption(configOption())
  .addOption(baseUrlOption())
  .addOption(tokenOption())
  .option("--json", "Output JSON")
  .action(async (options: CommonOptions & { json?: boolean }) => {
    await withCommand("health", { ...options, quiet: options.json }, async ({ config, appLogger }) => {
      const client = await createClient(config, options.token, appLogger);
      printResponse(await client.healthCheck(), options.json);
    });
  });

program
  .command("sample")
  .description("Fetch the sample rows the backend serves for a dataset")
  .addOption(configOption())
  .addOption(baseUrlOption())
  .addOption(tokenOption())
  .requiredOption("-d, --dataset <name>", "Dataset name")
  .option("--json", "Output JSON")
  .action(async (options: CommonOptions & { dataset: string; json?: boolean }) => {
    await withCommand("sample", { ...options, quiet: options.json }, async ({ config, appLogger }) => {
      const client = await createClient(config, options.token, appLogger);
      printResponse(await client.sampleDataset(options.dataset), options.json);
    });
  });

program
  .command("dataset")
  .description("Fetch one page of a parsed dataset")
  .addOption(configOption())
  .addOption(baseUrlOption())
  .addOption(tokenOption())
  .requiredOption("-d, --dataset <name>", "Dataset name")
  .option("--page <n>", "Page number, from 1", Number, 1)
  .option("--page-size <n>", "Rows per page", Number, DEFAULT_PAGE_SIZE)
  .option("--json", "Output JSON")
  .action(
    async (options: CommonOptions & { dataset: string; page: number; pageSize: number; json?: boolean }) => {
      await withCommand("dataset", { ...options, quiet: options.json }, async ({ config, appLogger }) => {
        const client = await createClient(config, options.token, appLogger);
        const response = await client.getDataset(options.dataset, {
          page: options.page,
          pageSize: options.pageSize
        });
        printResponse(response, options.json);
      });
    }
  );

await program.parseAsync(process.argv);
