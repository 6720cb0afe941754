export { aggregateSignStates } from "./aggregator.js";
export type { AggregationOptions, AggregationPolicy } from "./aggregator.js";
export { classifySignAnswer, deriveVerdict } from "./sign-state.js";
export {
  createHttpChecker,
  extractSignState,
  HttpSignatureChecker,
} from "./signature-checker.js";
export type { HttpSignatureCheckerOptions } from "./signature-checker.js";
export { SignState, VerdictKind } from "./types.js";
export type {
  Aggregation,
  ClassifiedIdentity,
  SignatureChecker,
  Verdict,
} from "./types.js";
