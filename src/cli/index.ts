#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import {
  createStreamLogger,
  LogLevel,
  type GateLogger,
} from "../logging/logger.js";
import { VerdictKind } from "../signature/types.js";
import { runCheckCommand } from "./check-command.js";
import { runConfigValidate } from "./config-command.js";
import { runPreflightCommand } from "./preflight-command.js";
import { runServerCommand } from "./server-command.js";

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("cla-gate")
  .description("Keep pull request CLA labels in sync with signatures")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Suppress non-essential output");

program
  .command("check")
  .description("Evaluate a pull request and update its labels and comments")
  .argument("<org>", "Organization or owner")
  .argument("<repo>", "Repository name")
  .argument("<number>", "Pull request number")
  .option("--config <path>", "Configuration file")
  .option("--token <token>", "GitHub token (defaults to GITHUB_TOKEN)")
  .action(async (org: string, repo: string, number: string, options) => {
    try {
      const result = await runCheckCommand({
        org,
        repo,
        number: Number(number),
        configPath: options.config,
        token: options.token,
        logger: cliLogger(),
      });
      await writeStdout(result.output + "\n");
      if (result.outcome.status !== "pass") {
        process.exitCode = 2;
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("preflight")
  .description("Check the contributors of a local commit range")
  .argument("[target]", "Path to the local repository", ".")
  .requiredOption("--org <org>", "Organization the pull request targets")
  .requiredOption("--repo <repo>", "Repository the pull request targets")
  .requiredOption("--base <gitref>", "Base of the commit range")
  .option("--head <gitref>", "Head of the commit range", "HEAD")
  .option("--config <path>", "Configuration file")
  .option("--format <format>", "Output format (text|json)", "text")
  .action(async (target: string, options) => {
    try {
      const result = await runPreflightCommand({
        target,
        org: options.org,
        repo: options.repo,
        base: options.base,
        head: options.head,
        configPath: options.config,
        format: parseFormat(options.format),
        logger: cliLogger(),
      });
      await writeStdout(result.output + "\n");
      if (result.aggregation?.verdict.kind !== VerdictKind.Pass) {
        process.exitCode = 2;
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

const configCommand = program.command("config");
configCommand
  .command("validate")
  .description("Validate a configuration file")
  .argument("[file]", "Configuration file")
  .action(async (file: string | undefined) => {
    try {
      const output = await runConfigValidate({ configPath: file });
      await writeStdout(output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("serve")
  .description("Receive GitHub webhooks and evaluate pull requests")
  .option("--port <number>", "Server port", "8787")
  .option("--config <path>", "Configuration file")
  .option("--token <token>", "GitHub token (defaults to GITHUB_TOKEN)")
  .option("--secret <secret>", "Webhook secret (defaults to WEBHOOK_SECRET)")
  .action(async (options) => {
    try {
      const logger = cliLogger();
      const result = await runServerCommand({
        port: Number(options.port),
        configPath: options.config,
        token: options.token,
        secret: options.secret,
        logger,
      });
      logger.info(`cla-gate listening on http://localhost:${result.port}`);
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

function cliLogger(): GateLogger {
  const globals = program.opts<{ verbose?: boolean; quiet?: boolean }>();
  const level = globals.quiet
    ? LogLevel.Error
    : globals.verbose
      ? LogLevel.Debug
      : LogLevel.Info;
  return createStreamLogger(process.stderr, { level });
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

function parseFormat(value: string): "text" | "json" {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
