const ESCAPE_PATTERN = /\\(u[0-9a-fA-F]{4}|["\\/bfnrt])/g;

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Decode JSON-style escape sequences left in text captured by a regex
 * (`\n`, `\"`, `\u00e9`...). Surrogate pairs written as two `\uXXXX`
 * escapes come out as a single code point. Unknown escapes are left as-is.
 */
export function decodeEscapes(text: string): string {
  if (!text.includes('\\')) return text;

  return text.replace(ESCAPE_PATTERN, (_match, seq: string) => {
    if (seq.length === 5) {
      return String.fromCharCode(parseInt(seq.slice(1), 16));
    }
    return SIMPLE_ESCAPES[seq] ?? seq;
  });
}
