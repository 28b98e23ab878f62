/**
 * Raw JSON member extraction
 *
 * Finds the top-level members of a JSON object and returns each value exactly
 * as written in the source text. The input must already have passed JSON.parse;
 * no validation happens here.
 */

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

function skipWhitespace(text: string, index: number): number {
  let i = index;
  while (i < text.length && isWhitespace(text.charAt(i))) i++;
  return i;
}

/**
 * @param index position of the opening quote
 * @returns position just after the closing quote
 */
function skipString(text: string, index: number): number {
  let i = index + 1;
  while (i < text.length) {
    const char = text.charAt(i);
    if (char === '\\') {
      i += 2;
      continue;
    }
    if (char === '"') return i + 1;
    i++;
  }
  return i;
}

function skipContainer(text: string, index: number): number {
  let depth = 0;
  let i = index;
  while (i < text.length) {
    const char = text.charAt(i);
    if (char === '"') {
      i = skipString(text, i);
      continue;
    }
    if (char === '{' || char === '[') {
      depth++;
    } else if (char === '}' || char === ']') {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
  return i;
}

function skipValue(text: string, index: number): number {
  const char = text.charAt(index);
  if (char === '"') return skipString(text, index);
  if (char === '{' || char === '[') return skipContainer(text, index);

  // number, true, false or null
  let i = index;
  while (i < text.length) {
    const next = text.charAt(i);
    if (next === ',' || next === '}' || isWhitespace(next)) break;
    i++;
  }
  return i;
}

/**
 * Map each top-level member name to its raw value text.
 * A repeated name keeps its last value, as JSON.parse does.
 */
export function extractRawMembers(text: string): Map<string, string> {
  const members = new Map<string, string>();

  let i = skipWhitespace(text, 0);
  if (text.charAt(i) !== '{') return members;
  i = skipWhitespace(text, i + 1);

  while (i < text.length && text.charAt(i) === '"') {
    const keyEnd = skipString(text, i);
    const key: unknown = JSON.parse(text.slice(i, keyEnd));

    // past the colon
    i = skipWhitespace(text, skipWhitespace(text, keyEnd) + 1);
    const valueEnd = skipValue(text, i);
    if (typeof key === 'string') {
      members.set(key, text.slice(i, valueEnd));
    }

    i = skipWhitespace(text, valueEnd);
    if (text.charAt(i) === ',') {
      i = skipWhitespace(text, i + 1);
    }
  }

  return members;
}
