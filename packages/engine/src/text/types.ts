import type { CommitmentTerms } from "../protocol/types";
import type { ParseFailure } from "../errors";

/**
 * External natural-language capability.
 *
 * Calls must be safe to retry. The engine bounds every call with a timeout and
 * works from structured terms alone when the capability is absent or failing.
 */
export interface TextCapability {
  readonly name: string;
  open?(): Promise<void>;
  close?(): Promise<void>;
  generate(terms: CommitmentTerms, context: TextContext): Promise<string>;
  parse(text: string): Promise<CommitmentTerms | ParseFailure>;
}

export interface TextContext {
  kind: "proposal" | "counter";
  from: string;
  to: string;
  episode: string;
}
