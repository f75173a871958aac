// pattern: Functional Core
import { digestSchema, type Digest } from "./schema";

export type ExtractionResult = Readonly<{
  digest: Digest;
  /** False when no JSON payload was found and the raw text became the summary. */
  structured: boolean;
}>;

/**
 * Returns the index of the `}` that closes the object opened at `start`,
 * or -1 if the text ends first. Braces inside JSON strings are ignored.
 */
export function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

function parseDigestCandidate(candidate: string): Digest | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }

  const result = digestSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Isolates the digest payload in free-form model output.
 *
 * Each `{` is tried from left to right; the balanced span it opens is parsed
 * and validated, and the first span that is a valid digest wins. Prose around
 * the payload, braces in that prose, and braces inside string values do not
 * affect the result. With no valid payload the whole text becomes the summary.
 */
export function extractDigest(text: string): ExtractionResult {
  let start = text.indexOf("{");

  while (start !== -1) {
    const end = findObjectEnd(text, start);
    if (end !== -1) {
      const digest = parseDigestCandidate(text.slice(start, end + 1));
      if (digest) {
        return { digest, structured: true };
      }
    }
    start = text.indexOf("{", start + 1);
  }

  return {
    digest: { summary: text, action_items: [], decisions: [] },
    structured: false,
  };
}
