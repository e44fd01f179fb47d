import type { JsonObject, JsonValue } from '../../shared/types';

/**
 * JSON extraction for model responses: unwraps code fences and pulls out the
 * first balanced object/array, auto-closing a payload that was cut off.
 */

const FENCED_BLOCK = /```(?:json5?|javascript|js|text)?[ \t]*\r?\n?([\s\S]*?)```/i;

/**
 * Returns the contents of the first fenced block, or the input with a dangling
 * opening/closing fence removed.
 */
export const stripCodeFence = (value: string): string => {
  const fenced = value.match(FENCED_BLOCK);
  if (fenced?.[1] != null && fenced[1].trim()) {
    return fenced[1].trim();
  }
  return value.replace(/^\s*```(?:json5?|text)?\s*\r?\n?/i, '').replace(/```[\s\r\n]*$/, '').trim();
};

const buildClosers = (stack: string[]): string =>
  stack
    .slice()
    .reverse()
    .map((token) => (token === '{' ? '}' : token === '[' ? ']' : ''))
    .join('');

export const extractBalancedJson = (value: string): string | null => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  let start = -1;
  let end = -1;
  let inString = false;
  let escapeNext = false;
  const stack: string[] = [];

  for (let i = 0; i < trimmed.length; i += 1) {
    const char = trimmed[i];

    if (inString) {
      if (escapeNext) {
        escapeNext = false;
      } else if (char === '\\') {
        escapeNext = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      // strings before the first opener are prose, not JSON
      if (stack.length > 0) inString = true;
      continue;
    }

    if (char === '{' || char === '[') {
      if (stack.length === 0) {
        start = i;
      }
      stack.push(char);
      continue;
    }

    if (char === '}' || char === ']') {
      if (stack.length === 0) {
        continue;
      }
      // a mismatched closer still pops so a stray bracket cannot wedge the scan
      stack.pop();
      if (stack.length === 0) {
        end = i;
        break;
      }
    }
  }

  if (start === -1) {
    return null;
  }

  let candidate = end !== -1 ? trimmed.slice(start, end + 1) : trimmed.slice(start);

  if (end === -1 && inString) {
    if (escapeNext) {
      candidate = candidate.slice(0, -1);
    }
    candidate += '"';
  }

  if (end === -1 && stack.length > 0) {
    candidate = `${candidate}${buildClosers(stack)}`;
  }

  return candidate.trim();
};

export const extractJson = (rawResponse: string): string | null => extractBalancedJson(stripCodeFence(rawResponse));

export const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Parsed JSON as a `JsonValue`; `undefined` and non-finite numbers become `null`. */
export const toJsonValue = (value: unknown): JsonValue => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toJsonValue(entry)]));
  }
  return null;
};
