import fs from "node:fs/promises";
import yaml from "js-yaml";
import { validateConfig } from "./config-validator.js";
import type { GateConfig } from "./types.js";

export async function loadConfig(configPath: string): Promise<GateConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    throw error;
  }
  return parseConfigText(raw, configPath);
}

export function parseConfigText(raw: string, source = "<inline>"): GateConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid YAML in ${source}: ${message}`);
  }
  return validateConfig(doc);
}
