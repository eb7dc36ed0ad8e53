const ATTRIBUTE_PATTERN = /(?<![\w:-])(v-bind:class|:class|class:list|className|class)\s*=\s*/g;
const APPLY_PATTERN = /@apply\s+([^;{}]+)/g;
const STRING_LITERAL_PATTERN = /(["'`])((?:\\.|(?!\1)[^\\])*)\1/g;
const INVALID_CANDIDATE = /["'`<>{}=$]/;
const HAS_WORD_CHARACTER = /[A-Za-z0-9]/;

/** Attributes whose quoted value is an expression rather than a class list. */
const DYNAMIC_ATTRIBUTES = new Set([":class", "v-bind:class", "class:list"]);

function findClosingQuote(input: string, openIndex: number): number {
  const quote = input[openIndex];
  for (let i = openIndex + 1; i < input.length; i += 1) {
    if (input[i] === "\\") {
      i += 1;
      continue;
    }
    if (input[i] === quote) {
      return i;
    }
  }
  return -1;
}

function findMatchingBrace(input: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < input.length; i += 1) {
    const char = input[i];
    if (char === "\"" || char === "'" || char === "`") {
      const close = findClosingQuote(input, i);
      if (close === -1) {
        return -1;
      }
      i = close;
      continue;
    }
    if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function stringLiterals(expression: string): string[] {
  const literals: string[] = [];
  for (const match of expression.matchAll(STRING_LITERAL_PATTERN)) {
    literals.push(match[2]);
  }
  return literals;
}

/**
 * Pull candidate utility classes out of markup or component source.
 * Reads `class`, `className`, `:class`, `v-bind:class` and `class:list`
 * attribute values and `@apply` lists. Returns unique tokens in first-seen order.
 */
export function extractClasses(source: string): string[] {
  const lists: string[] = [];

  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const attribute = match[1];
    const start = (match.index ?? 0) + match[0].length;
    const opener = source[start];

    if (opener === "\"" || opener === "'" || opener === "`") {
      const close = findClosingQuote(source, start);
      if (close === -1) continue;
      const value = source.slice(start + 1, close);
      if (DYNAMIC_ATTRIBUTES.has(attribute)) {
        lists.push(...stringLiterals(value));
      } else {
        lists.push(value);
      }
    } else if (opener === "{") {
      const close = findMatchingBrace(source, start);
      if (close === -1) continue;
      lists.push(...stringLiterals(source.slice(start + 1, close)));
    }
  }

  for (const match of source.matchAll(APPLY_PATTERN)) {
    lists.push(match[1]);
  }

  const seen = new Set<string>();
  for (const list of lists) {
    for (const candidate of list.split(/\s+/)) {
      if (INVALID_CANDIDATE.test(candidate) || !HAS_WORD_CHARACTER.test(candidate)) {
        continue;
      }
      seen.add(candidate);
    }
  }
  return [...seen];
}
