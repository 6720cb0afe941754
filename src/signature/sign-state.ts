import type { Identity } from "../contributor/types.js";
import { SignState, VerdictKind, type Verdict } from "./types.js";

export function classifySignAnswer(answer: string): SignState {
  switch (answer) {
    case "yes":
      return SignState.Signed;
    case "no":
      return SignState.Unsigned;
    default:
      return SignState.Unknown;
  }
}

export function deriveVerdict(
  signed: readonly Identity[],
  unsigned: readonly Identity[],
  unknown: readonly Identity[],
): Verdict {
  if (unknown.length > 0) {
    return { kind: VerdictKind.Pending, names: namesOf(unknown) };
  }
  if (unsigned.length > 0) {
    return { kind: VerdictKind.Fail, names: namesOf(unsigned) };
  }
  return { kind: VerdictKind.Pass, names: namesOf(signed) };
}

function namesOf(identities: readonly Identity[]): string[] {
  return identities.map((identity) => identity.name);
}
