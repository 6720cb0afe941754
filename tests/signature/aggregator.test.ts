import { describe, expect, it } from "vitest";
import type { Identity } from "../../src/contributor/types.js";
import { aggregateSignStates } from "../../src/signature/aggregator.js";
import { classifySignAnswer } from "../../src/signature/sign-state.js";
import { SignState, VerdictKind } from "../../src/signature/types.js";
import { createMemoryLogger, MapChecker, policy } from "../helpers/fakes.js";

const alice: Identity = { name: "Alice", email: "alice@example.com" };
const bob: Identity = { name: "Bob", email: "bob@example.com" };
const carol: Identity = { name: "Carol", email: "carol@example.com" };

describe("sign answer classification", () => {
  it("maps only exact tokens", () => {
    expect(classifySignAnswer("yes")).toBe(SignState.Signed);
    expect(classifySignAnswer("no")).toBe(SignState.Unsigned);
    expect(classifySignAnswer("YES")).toBe(SignState.Unknown);
    expect(classifySignAnswer(" no")).toBe(SignState.Unknown);
    expect(classifySignAnswer("")).toBe(SignState.Unknown);
    expect(classifySignAnswer("maybe")).toBe(SignState.Unknown);
  });
});

describe("sign-state aggregation", () => {
  it("is pending when any answer is not yes or no", async () => {
    const checker = new MapChecker({
      "alice@example.com": "yes",
      "bob@example.com": "unknown",
    });
    const result = await aggregateSignStates([alice, bob], policy, checker);
    expect(result.verdict).toEqual({
      kind: VerdictKind.Pending,
      names: ["Bob"],
    });
  });

  it("fails with the unsigned names", async () => {
    const checker = new MapChecker({
      "alice@example.com": "yes",
      "bob@example.com": "no",
    });
    const result = await aggregateSignStates([alice, bob], policy, checker);
    expect(result.verdict).toEqual({ kind: VerdictKind.Fail, names: ["Bob"] });
    expect(result.signed).toEqual([alice]);
    expect(result.unsigned).toEqual([bob]);
  });

  it("passes with the signer names in order", async () => {
    const checker = new MapChecker({
      "alice@example.com": "yes",
      "bob@example.com": "yes",
    });
    const result = await aggregateSignStates([alice, bob], policy, checker);
    expect(result.verdict).toEqual({
      kind: VerdictKind.Pass,
      names: ["Alice", "Bob"],
    });
  });

  it("prefers pending over fail", async () => {
    const checker = new MapChecker({
      "alice@example.com": "no",
      "carol@example.com": "error",
    });
    const result = await aggregateSignStates(
      [alice, bob, carol],
      policy,
      checker,
    );
    expect(result.verdict.kind).toBe(VerdictKind.Pending);
    expect(result.verdict.names).toEqual(["Bob", "Carol"]);
    expect(result.unsigned).toEqual([alice]);
  });

  it("never asks the service about the lite committer or empty emails", async () => {
    const checker = new MapChecker({
      "alice@example.com": "yes",
      "lite@example.com": "yes",
      "": "yes",
    });
    const lite: Identity = { name: "lite-bot", email: "lite@example.com" };
    const anonymous: Identity = { name: "anonymous", email: "" };
    const result = await aggregateSignStates(
      [lite, alice, anonymous],
      policy,
      checker,
    );
    expect(checker.calls).toEqual(["alice@example.com"]);
    expect(result.unknown).toEqual([lite, anonymous]);
    expect(result.verdict).toEqual({
      kind: VerdictKind.Pending,
      names: ["lite-bot", "anonymous"],
    });
  });

  it("treats a failed lookup as unknown and logs it", async () => {
    const logger = createMemoryLogger();
    const checker = new MapChecker({ "alice@example.com": "yes" });
    const result = await aggregateSignStates([alice, bob], policy, checker, {
      logger,
    });
    expect(result.unknown).toEqual([bob]);
    expect(logger.messages).toEqual([
      "warning Signature check failed for bob@example.com: lookup failed for bob@example.com",
    ]);
  });

  it("checks identities one at a time in order", async () => {
    const checker = new MapChecker({
      "alice@example.com": "yes",
      "bob@example.com": "yes",
      "carol@example.com": "yes",
    });
    await aggregateSignStates([carol, alice, bob], policy, checker);
    expect(checker.calls).toEqual([
      "carol@example.com",
      "alice@example.com",
      "bob@example.com",
    ]);
  });
});
