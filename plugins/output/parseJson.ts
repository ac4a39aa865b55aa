// ---------------------------------------------------------------------------
// parseJson — extract and parse JSON from LLM output
// ---------------------------------------------------------------------------

import type { Validator } from "../../src";

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Extract and parse JSON from a (possibly noisy) LLM response.
 *
 * Handles common cases:
 * - Raw JSON string
 * - JSON wrapped in markdown code fences (```json ... ```)
 * - JSON embedded in surrounding prose (first `{` to last `}`)
 *
 * When a `validator` is provided the parsed value is passed through
 * `validator.parse()` for type-safe validation.
 *
 * @example
 * const data = parseJsonOutput(llmText, z.object({ name: z.string() }));
 */
export function parseJsonOutput(text: string): unknown;
export function parseJsonOutput<T>(text: string, validator: Validator<T>): T;
export function parseJsonOutput<T>(
  text: string,
  validator?: Validator<T>,
): T | unknown {
  // 1. Direct parse
  let result = tryParse(text);

  // 2. Markdown code fences
  if (!result.ok) {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/)?.[1];
    if (fenced !== undefined) result = tryParse(fenced.trim());
  }

  // 3. First JSON object/array
  if (!result.ok) {
    const firstBrace = text.indexOf("{");
    const firstBracket = text.indexOf("[");
    const start =
      firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)
        ? firstBrace
        : firstBracket;
    if (start >= 0) {
      const closer = text[start] === "{" ? "}" : "]";
      const lastClose = text.lastIndexOf(closer);
      if (lastClose > start) result = tryParse(text.slice(start, lastClose + 1));
    }
  }

  if (!result.ok) {
    throw new Error("parseJsonOutput: could not extract valid JSON from input");
  }

  return validator ? validator.parse(result.value) : result.value;
}
