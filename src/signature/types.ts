import type { Identity } from "../contributor/types.js";

export const enum SignState {
  Signed = "signed",
  Unsigned = "unsigned",
  Unknown = "unknown",
}

export const enum VerdictKind {
  Pass = "pass",
  Pending = "pending",
  Fail = "fail",
}

/** Names carried by a verdict: signers, unsigned or unresolved identities. */
export type Verdict =
  | { readonly kind: VerdictKind.Pass; readonly names: readonly string[] }
  | { readonly kind: VerdictKind.Fail; readonly names: readonly string[] }
  | { readonly kind: VerdictKind.Pending; readonly names: readonly string[] };

export interface ClassifiedIdentity extends Identity {
  readonly state: SignState;
}

export interface Aggregation {
  readonly verdict: Verdict;
  readonly signed: readonly Identity[];
  readonly unsigned: readonly Identity[];
  readonly unknown: readonly Identity[];
}

/**
 * Raw answer lookup against the signature service. Anything other than
 * `"yes"` or `"no"`, including a rejected promise, counts as unknown.
 */
export interface SignatureChecker {
  checkSignature(email: string): Promise<string>;
}
