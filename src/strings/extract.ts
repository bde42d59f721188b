/**
 * Incidental text extraction from a decoded byte stream
 *
 * Independent of block framing: useful when structure is too damaged for
 * a listing but message text survived.
 */

const STRING_PATTERN = /[A-Za-z0-9][A-Za-z0-9 \-_,.!?'"]+/g;

export const DEFAULT_MIN_STRING_LENGTH = 2;

/**
 * Bytes → text with line breaks kept and unprintables as NUL separators
 */
export function bytesToText(data: Uint8Array): string {
  let out = '';
  for (const b of data) {
    if (b === 10 || b === 13) {
      out += '\n';
    } else if (b === 0xA0) {
      out += ' ';
    } else if (b >= 32 && b <= 126) {
      out += String.fromCharCode(b);
    } else {
      out += '\0';
    }
  }
  return out;
}

/**
 * Printable runs at least minLength long, whitespace collapsed
 */
export function extractStrings(text: string, minLength = DEFAULT_MIN_STRING_LENGTH): string[] {
  const out: string[] = [];
  for (const match of text.matchAll(STRING_PATTERN)) {
    const s = match[0].replace(/\s+/g, ' ').trim();
    if (s.length >= minLength) out.push(s);
  }
  return out;
}

/**
 * Remove repeats, keeping first-seen order
 */
export function uniqueStrings(strings: readonly string[]): string[] {
  return [...new Set(strings)];
}

export function dumpStrings(data: Uint8Array, minLength = DEFAULT_MIN_STRING_LENGTH): string[] {
  return uniqueStrings(extractStrings(bytesToText(data), minLength));
}
