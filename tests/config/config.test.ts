import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadConfig, parseConfigText } from "../../src/config/config-loader.js";
import { validateConfig } from "../../src/config/config-validator.js";
import { findRepoPolicy } from "../../src/config/repo-filter.js";
import { config as validConfig } from "../helpers/fakes.js";

const rootDir = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
);

describe("config loading", () => {
  it("loads the example configuration", async () => {
    const config = await loadConfig(
      path.join(rootDir, "config", "cla-gate.example.yaml"),
    );
    expect(config.config_items.length).toBe(2);
    expect(config.placeholder_committer).toBe("${committer}");
    expect(config.config_items[0]?.check_by_committer).toBe(false);
    expect(config.config_items[1]?.lite_pr_committer).toEqual({
      email: "lite-bot@example.com",
      name: "lite-bot",
    });
  });

  it("reports a missing file", async () => {
    await expect(
      loadConfig(path.join(rootDir, "config", "missing.yaml")),
    ).rejects.toThrow("Configuration file not found");
  });

  it("reports broken YAML", () => {
    expect(() => parseConfigText("a: [1, 2", "broken.yaml")).toThrow(
      "Invalid YAML in broken.yaml",
    );
  });
});

describe("config validation", () => {
  it("accepts a complete configuration", () => {
    expect(validateConfig(validConfig)).toEqual(validConfig);
  });

  it("fills in default url placeholders", () => {
    const { placeholder_sign_url, placeholder_faq_url, ...rest } = validConfig;
    const config = validateConfig(rest);
    expect(config.placeholder_sign_url).toBe(placeholder_sign_url);
    expect(config.placeholder_faq_url).toBe(placeholder_faq_url);
  });

  it("collects every missing field", () => {
    const { comment_all_signed: _omitted, ...rest } = validConfig;
    const item = { ...validConfig.config_items[0], cla_label_yes: undefined };
    expect(() => validateConfig({ ...rest, config_items: [item] })).toThrow(
      "Invalid configuration: missing comment_all_signed; missing config_items[0].cla_label_yes",
    );
  });

  it("requires the lite committer when checking by committer", () => {
    const item = {
      repos: ["org1"],
      cla_label_yes: "cla/yes",
      cla_label_no: "cla/no",
      check_url: "https://cla.example.com/check",
      sign_url: "https://cla.example.com/sign",
      faq_url: "https://cla.example.com/faq",
      check_by_committer: true,
    };
    expect(() =>
      validateConfig({ ...validConfig, config_items: [item] }),
    ).toThrow(
      "config_items[0].lite_pr_committer is required when check_by_committer is true",
    );
  });

  it("rejects unsupported fields and empty repo lists", () => {
    const item = { ...validConfig.config_items[0], repos: [], labels: "x" };
    expect(() =>
      validateConfig({ ...validConfig, config_items: [item] }),
    ).toThrow(
      "Invalid configuration: config_items[0] contains unsupported field 'labels'; config_items[0].repos must not be empty",
    );
  });

  it("rejects a check url that is not absolute", () => {
    const item = { ...validConfig.config_items[0], check_url: "cla/check" };
    expect(() =>
      validateConfig({ ...validConfig, config_items: [item] }),
    ).toThrow(
      "Invalid configuration: config_items[0].check_url must be an absolute URL",
    );
  });
});

describe("repository matching", () => {
  it("matches by organization or full name and honours exclusions", async () => {
    const config = await loadConfig(
      path.join(rootDir, "config", "cla-gate.example.yaml"),
    );
    expect(findRepoPolicy(config, "example-org", "api")?.faq_url).toBe(
      "https://cla.example.com/faq",
    );
    expect(findRepoPolicy(config, "example-org", "sandbox")).toBeUndefined();
    expect(findRepoPolicy(config, "example-org-lite", "web")?.faq_url).toBe(
      "https://cla.example.com/faq/committer",
    );
    expect(findRepoPolicy(config, "someone-else", "api")).toBeUndefined();
  });

  it("takes the first applying item", () => {
    const first = { ...validConfig.config_items[0], repos: ["org1/repo1"] };
    const second = { ...first, repos: ["org1"], cla_label_yes: "signed" };
    const config = validateConfig({
      ...validConfig,
      config_items: [second, first],
    });
    expect(findRepoPolicy(config, "org1", "repo1")?.cla_label_yes).toBe(
      "signed",
    );
  });
});
