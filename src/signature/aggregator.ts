import type { Identity } from "../contributor/types.js";
import type { LitePrCommitter } from "../config/types.js";
import {
  describeError,
  silentLogger,
  type GateLogger,
} from "../logging/logger.js";
import { classifySignAnswer, deriveVerdict } from "./sign-state.js";
import {
  SignState,
  type Aggregation,
  type ClassifiedIdentity,
  type SignatureChecker,
} from "./types.js";

export interface AggregationPolicy {
  readonly lite_pr_committer: LitePrCommitter;
}

export interface AggregationOptions {
  readonly logger?: GateLogger;
}

/**
 * Query the signature state of every identity, one at a time, and derive
 * the verdict. Unknown outranks unsigned, which outranks signed.
 */
export async function aggregateSignStates(
  identities: readonly Identity[],
  policy: AggregationPolicy,
  checker: SignatureChecker,
  options: AggregationOptions = {},
): Promise<Aggregation> {
  const logger = options.logger ?? silentLogger;
  const signed: Identity[] = [];
  const unsigned: Identity[] = [];
  const unknown: Identity[] = [];

  for (const identity of identities) {
    const classified = await classifyIdentity(
      identity,
      policy,
      checker,
      logger,
    );
    switch (classified.state) {
      case SignState.Signed:
        signed.push(identity);
        break;
      case SignState.Unsigned:
        unsigned.push(identity);
        break;
      default:
        unknown.push(identity);
        break;
    }
  }

  return {
    verdict: deriveVerdict(signed, unsigned, unknown),
    signed,
    unsigned,
    unknown,
  };
}

async function classifyIdentity(
  identity: Identity,
  policy: AggregationPolicy,
  checker: SignatureChecker,
  logger: GateLogger,
): Promise<ClassifiedIdentity> {
  const email = identity.email;
  if (email === "" || email === policy.lite_pr_committer.email) {
    return { ...identity, state: SignState.Unknown };
  }

  try {
    const answer = await checker.checkSignature(identity.email);
    const state = classifySignAnswer(answer);
    if (state === SignState.Unknown) {
      logger.debug(
        `Unrecognized signature answer for ${identity.email}: ${answer}`,
      );
    }
    return { ...identity, state };
  } catch (error) {
    logger.warning(
      `Signature check failed for ${identity.email}: ${describeError(error)}`,
    );
    return { ...identity, state: SignState.Unknown };
  }
}
