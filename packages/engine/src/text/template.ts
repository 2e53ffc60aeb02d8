import { ParseFailure } from "../errors";
import type { CommitmentTerms } from "../protocol/types";
import type { TextCapability, TextContext } from "./types";

/**
 * Deterministic in-process text capability.
 *
 * Renders a short message and appends the exact terms as a fenced JSON block;
 * parsing reads that block back.
 */
export class TemplateTextCapability implements TextCapability {
  readonly name = "template";

  async generate(terms: CommitmentTerms, context: TextContext): Promise<string> {
    const minutes = Math.abs(terms.time_adjustment);
    const direction = terms.time_adjustment < 0 ? "earlier" : "later";
    const verb = context.kind === "proposal" ? "PROPOSE" : "COUNTER";
    const lines = [
      `${verb}: ${context.from} to ${context.to} (${context.episode}).`,
      `${terms.debtor} will release its class ${minutes} minute${minutes === 1 ? "" : "s"} ${direction}.`,
      `In return: ${terms.future_obligation}`,
      "```json",
      JSON.stringify(terms, null, 2),
      "```",
    ];
    return lines.join("\n");
  }

  async parse(text: string): Promise<CommitmentTerms | ParseFailure> {
    return parseTermsBlock(text);
  }
}

/**
 * Extract terms from the JSON object between the first "{" and the last "}".
 */
export function parseTermsBlock(text: string): CommitmentTerms | ParseFailure {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return new ParseFailure("No JSON block found", text);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    return new ParseFailure(`Malformed JSON block: ${err instanceof Error ? err.message : String(err)}`, text);
  }

  if (typeof raw !== "object" || raw === null) {
    return new ParseFailure("JSON block is not an object", text);
  }
  const block: object = raw;
  const field = (key: string): unknown => Reflect.get(block, key);
  const debtor = field("debtor");
  const creditor = field("creditor");
  const time_adjustment = field("time_adjustment");
  const future_obligation = field("future_obligation");
  if (
    typeof debtor !== "string" ||
    typeof creditor !== "string" ||
    typeof time_adjustment !== "number" ||
    !Number.isInteger(time_adjustment) ||
    typeof future_obligation !== "string"
  ) {
    return new ParseFailure("JSON block is missing commitment fields", text);
  }

  return { debtor, creditor, time_adjustment, future_obligation };
}
