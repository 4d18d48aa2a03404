const WORD_CHARS = '\\p{L}\\p{N}_';
const WORD_CHAR = `[${WORD_CHARS}]`;
const NON_WORD_CHAR = `[^${WORD_CHARS}]`;
const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;
const NON_WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?=${WORD_CHAR})|(?<!${WORD_CHAR})(?!${WORD_CHAR}))`;

const OUTSIDE_CLASS: Readonly<Partial<Record<string, string>>> = {
  b: WORD_BOUNDARY,
  B: NON_WORD_BOUNDARY,
  w: WORD_CHAR,
  W: NON_WORD_CHAR,
};

/**
 * Rewrites `\b`, `\B`, `\w` and `\W` so that letters and digits of any script
 * count as word characters. Inside a character class only `\w` is rewritten.
 */
export function toUnicodeWordSource(source: string): string {
  let result = '';
  let inClass = false;

  for (let i = 0; i < source.length; i++) {
    const char = source.charAt(i);

    if (char === '\\' && i + 1 < source.length) {
      const escaped = source.charAt(++i);
      if (inClass) {
        result += escaped === 'w' ? WORD_CHARS : `\\${escaped}`;
      } else {
        result += OUTSIDE_CLASS[escaped] ?? `\\${escaped}`;
      }
      continue;
    }

    if (char === '[' && !inClass) {
      inClass = true;
    } else if (char === ']' && inClass) {
      inClass = false;
    }
    result += char;
  }

  return result;
}

/** Compiles a pattern with Unicode word semantics; the `u` flag is always set. */
export function compileWordPattern(source: string, flags = ''): RegExp {
  return new RegExp(toUnicodeWordSource(source), flags.includes('u') ? flags : `${flags}u`);
}
