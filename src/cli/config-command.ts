import { loadConfig } from "../config/config-loader.js";
import { resolveConfigPath } from "./runtime-paths.js";

export interface ConfigValidateOptions {
  readonly configPath?: string;
}

export async function runConfigValidate(
  options: ConfigValidateOptions,
): Promise<string> {
  const configPath = await resolveConfigPath(options.configPath);
  const config = await loadConfig(configPath);
  const lines = [`Configuration OK: ${configPath}`];
  for (const item of config.config_items) {
    const scope = item.repos.join(", ");
    const mode = item.check_by_committer ? "committer" : "author";
    const labels = `${item.cla_label_yes}/${item.cla_label_no}`;
    lines.push(`- ${scope} (by ${mode}, labels ${labels})`);
  }
  return lines.join("\n");
}
