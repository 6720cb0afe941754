import { loadConfig } from "../config/config-loader.js";
import type { GateLogger } from "../logging/logger.js";
import { startServer, type ServerHandle } from "../server/index.js";
import { createHttpChecker } from "../signature/signature-checker.js";
import { createGitHubPlatform } from "./check-command.js";
import { resolveConfigPath } from "./runtime-paths.js";

export interface ServerCommandOptions {
  readonly port: number;
  readonly configPath?: string;
  readonly token?: string;
  readonly secret?: string;
  readonly logger: GateLogger;
}

export async function runServerCommand(
  options: ServerCommandOptions,
): Promise<ServerHandle> {
  const config = await loadConfig(await resolveConfigPath(options.configPath));
  return await startServer({
    port: options.port,
    secret: options.secret ?? process.env.WEBHOOK_SECRET,
    deps: {
      config,
      platform: createGitHubPlatform(options.token),
      createChecker: createHttpChecker,
      logger: options.logger,
    },
  });
}
