import logger from './logger.js';

const AGGRESSIVE_REPAIR_MAX_CHARS = 50_000;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Multi-step JSON recovery for model output that may include markdown fences,
 * surrounding prose, trailing commas or unquoted keys.
 *
 * Output cut off mid-document is left alone: closing unbalanced braces would
 * invent structure the model never produced. Returns null when nothing
 * parseable is found.
 */
export function repairJSON(text: string): unknown {
  if (!text || typeof text !== 'string') return null;

  // Step 1: Strip markdown fences
  let cleaned = text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  // Step 2: Direct parse attempt
  let attempt = tryParse(cleaned);
  if (attempt.ok) return attempt.value;

  // Step 3: Extract JSON object/array from surrounding text
  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }

  if (start >= 0) {
    const lastClose = cleaned.lastIndexOf(closeChar);
    if (lastClose > start) {
      cleaned = cleaned.slice(start, lastClose + 1);
      attempt = tryParse(cleaned);
      if (attempt.ok) return attempt.value;
    }
  }

  // Step 4: Fix trailing commas
  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  attempt = tryParse(noTrailing);
  if (attempt.ok) return attempt.value;

  // Skip regex-heavy steps on large inputs to avoid catastrophic backtracking
  if (noTrailing.length > AGGRESSIVE_REPAIR_MAX_CHARS) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return null;
  }

  // Step 5: Unescaped newlines/tabs inside strings, single-quoted strings
  const aggressive = noTrailing
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    .replace(/(?<=[\[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');
  attempt = tryParse(aggressive);
  if (attempt.ok) return attempt.value;

  // Step 6: Unquoted keys: { key: "value" } becomes { "key": "value" }
  const quotedKeys = aggressive.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  attempt = tryParse(quotedKeys);
  if (attempt.ok) return attempt.value;

  logger.debug({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
