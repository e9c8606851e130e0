/**
 * JSON parsing that tolerates the non-standard NaN / Infinity / -Infinity
 * literals some data backends emit for missing numeric values. Those
 * bare tokens (outside strings) are read as null; anything else that is
 * not valid JSON still fails.
 */

const NON_FINITE_TOKENS = ['-Infinity', 'Infinity', 'NaN'] as const;

export function parseLenientJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const rewritten = replaceNonFiniteTokens(text);
    if (rewritten === text) {
      throw err;
    }
    return JSON.parse(rewritten);
  }
}

export function replaceNonFiniteTokens(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      i += 1;
      continue;
    }

    const token = NON_FINITE_TOKENS.find((candidate) => text.startsWith(candidate, i));
    if (token) {
      out += 'null';
      i += token.length;
      continue;
    }

    out += ch;
    i += 1;
  }

  return out;
}
