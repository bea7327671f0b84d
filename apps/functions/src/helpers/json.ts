import { LlmError } from './errors';

export interface SchemaLike<T> {
  parse(data: unknown): T;
}

/**
 * Pulls the outermost {...} span out of model text and parses it. Prose or
 * code fences around it are ignored; raw control characters inside strings and
 * output cut off by max_tokens are repaired.
 */
export function safeParseJsonFromModel(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1) {
    throw new Error('Model response contains no JSON object');
  }

  // A truncated response may have no closing brace at all
  const jsonSlice = (end > start ? text.slice(start, end + 1) : text.slice(start)).trim();

  try {
    return JSON.parse(jsonSlice);
  } catch {
    // fall through to cleaning
  }

  const cleaned = escapeControlCharsInStrings(jsonSlice);

  try {
    return JSON.parse(cleaned);
  } catch (err) {
    const repaired = attemptTruncationRepair(cleaned);
    if (repaired) {
      try {
        return JSON.parse(repaired);
      } catch {
        // report the original parse error below
      }
    }
    console.error('Failed JSON (cleaned):', cleaned);
    throw err;
  }
}

/**
 * Parses model text and validates it. Any failure is a malformed_output LlmError
 * so callers can retry it like a timeout.
 */
export function parseModelJson<T>(text: string, schema: SchemaLike<T>): T {
  let data: unknown;
  try {
    data = safeParseJsonFromModel(text);
  } catch (err) {
    throw new LlmError('malformed_output', `Unparseable model output: ${reasonOf(err)}`, { cause: err });
  }
  try {
    return schema.parse(data);
  } catch (err) {
    throw new LlmError('malformed_output', `Model output failed validation: ${reasonOf(err)}`, { cause: err });
  }
}

const reasonOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

function escapeControlCharsInStrings(json: string): string {
  let cleaned = '';
  let inString = false;
  let escape = false;

  for (const ch of json) {
    if (escape) {
      cleaned += ch;
      escape = false;
      continue;
    }
    if (ch === '\\') {
      cleaned += ch;
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      cleaned += ch;
      continue;
    }
    if (inString) {
      if (ch === '\n') {
        cleaned += '\\n';
        continue;
      }
      if (ch === '\r') {
        cleaned += '\\r';
        continue;
      }
      if (ch === '\t') {
        cleaned += '\\t';
        continue;
      }
      const code = ch.charCodeAt(0);
      if (code < 0x20) {
        cleaned += `\\u${code.toString(16).padStart(4, '0')}`;
        continue;
      }
    }
    cleaned += ch;
  }

  return cleaned;
}

/** Closes brackets and strings left open by a max_tokens cutoff. Null when nothing to repair. */
function attemptTruncationRepair(json: string): string | null {
  const closers: string[] = [];
  let inString = false;
  let escape = false;

  for (const ch of json) {
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\') {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === '{') closers.push('}');
    else if (ch === '[') closers.push(']');
    else if (ch === '}' || ch === ']') closers.pop();
  }

  let base = inString ? `${json}"` : json;
  base = base.replace(/,\s*$/, '');

  const repaired = base + closers.reverse().join('');
  return repaired !== json ? repaired : null;
}
