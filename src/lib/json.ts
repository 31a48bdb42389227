/**
 * JSON extraction utilities for recovering structured outputs from LLM text.
 *
 * These helpers only locate and parse the first balanced JSON object or array;
 * they do not attempt to repair arbitrary JavaScript.
 *
 * @module json
 */

/**
 * Extract the first balanced `open ... close` substring from arbitrary text.
 * Resilient to brackets inside quoted strings.
 */
function extractFirstBalanced(text: string, open: "{" | "[", close: "}" | "]"): string | null {
  const raw = String(text ?? "");
  const start = raw.indexOf(open);
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escape) {
        escape = false;
        continue;
      }
      if (ch === "\\") {
        escape = true;
        continue;
      }
      if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === open) depth++;
    if (ch === close) depth--;

    if (depth === 0) return raw.slice(start, i + 1);
  }

  return null;
}

export function extractFirstJsonObjectFromText(text: string): string | null {
  return extractFirstBalanced(text, "{", "}");
}

export function extractFirstJsonArrayFromText(text: string): string | null {
  return extractFirstBalanced(text, "[", "]");
}

export function tryParseFirstJsonObject(text: string): unknown {
  const jsonStr = extractFirstJsonObjectFromText(text);
  if (!jsonStr) return null;
  try {
    return JSON.parse(jsonStr);
  } catch {
    return null;
  }
}

export function tryParseFirstJsonArray(text: string): unknown {
  const jsonStr = extractFirstJsonArrayFromText(text);
  if (!jsonStr) return null;
  try {
    return JSON.parse(jsonStr);
  } catch {
    return null;
  }
}
