import * as core from "@actions/core";
import * as github from "@actions/github";
import { loadConfig } from "../src/config/config-loader.js";
import { dispatchEvent } from "../src/server/webhook.js";
import type { GateLogger } from "../src/logging/logger.js";
import { GitHubPlatform } from "../src/platform/github-platform.js";
import { createHttpChecker } from "../src/signature/signature-checker.js";

const coreLogger: GateLogger = {
  debug: (message) => core.debug(message),
  info: (message) => core.info(message),
  warning: (message) => core.warning(message),
  error: (message) => core.error(message),
};

async function run(): Promise<void> {
  const token = process.env.GITHUB_TOKEN ?? core.getInput("github-token");
  if (!token) {
    core.setFailed("Missing GITHUB_TOKEN");
    return;
  }

  const configPath = core.getInput("config") || ".github/cla-gate.yaml";
  const failOnUnsigned =
    core.getInput("fail-on-unsigned").toLowerCase() !== "false";
  const config = await loadConfig(configPath);

  const outcome = await dispatchEvent(
    github.context.eventName,
    github.context.payload,
    {
      config,
      platform: new GitHubPlatform(github.getOctokit(token)),
      createChecker: createHttpChecker,
      logger: coreLogger,
    },
  );

  core.setOutput("status", outcome.status);
  core.setOutput("names", outcome.names.join(", "));

  if (failOnUnsigned && outcome.status === "fail") {
    core.setFailed(`Unsigned CLA: ${outcome.names.join(", ")}`);
  }
}

run().catch((error: unknown) => {
  core.setFailed(error instanceof Error ? error.message : String(error));
});
