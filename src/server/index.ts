import http from "node:http";
import { describeError } from "../logging/logger.js";
import { handleWebhook, type WebhookOptions } from "./webhook.js";

export interface ServerOptions extends WebhookOptions {
  readonly port?: number;
}

export interface ServerHandle {
  readonly port: number;
  readonly close: () => Promise<void>;
}

export async function startServer(
  options: ServerOptions,
): Promise<ServerHandle> {
  const logger = options.deps.logger;
  const server = http.createServer(async (req, res) => {
    try {
      const handled = await handleWebhook(req, res, options);
      if (handled) {
        return;
      }
      res.statusCode = 404;
      res.end("Not found");
    } catch (error) {
      logger.error(`Webhook handling failed: ${describeError(error)}`);
      res.statusCode = 500;
      res.end("Server error");
    }
  });

  const port = await new Promise<number>((resolve, reject) => {
    server.on("error", reject);
    server.listen(options.port ?? 8787, () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Failed to bind server port"));
        return;
      }
      resolve(address.port);
    });
  });

  return {
    port,
    close: () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
      }),
  };
}
