import fs from "node:fs/promises";
import path from "node:path";

const DEFAULT_CONFIG_FILES = [
  ".github/cla-gate.yaml",
  ".github/cla-gate.yml",
  "cla-gate.yaml",
];

/**
 * Resolve the configuration file: an explicit path, otherwise the first
 * default location found under `cwd`.
 */
export async function resolveConfigPath(
  customPath?: string,
  cwd: string = process.cwd(),
): Promise<string> {
  if (customPath) {
    return path.resolve(cwd, customPath);
  }

  for (const candidate of DEFAULT_CONFIG_FILES) {
    const fullPath = path.resolve(cwd, candidate);
    if (await existsFile(fullPath)) {
      return fullPath;
    }
  }

  throw new Error(
    `Unable to find a configuration file. Pass --config <path> or create ${DEFAULT_CONFIG_FILES[0]}.`,
  );
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
