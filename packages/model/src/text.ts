const SENTENCE_TERMINATORS = new Set([".", "!", "?"]);

const ABBREVIATIONS = new Set(["e.g.", "i.e.", "cf.", "vs.", "approx."]);

function isWhitespace(char: string): boolean {
  return /\s/.test(char);
}

function endsWithAbbreviation(text: string): boolean {
  const lastSpace = text.search(/\S+$/);
  const word = lastSpace < 0 ? text : text.slice(lastSpace);
  return ABBREVIATIONS.has(word.toLowerCase());
}

/**
 * Index of the character ending the first sentence of `text`, or -1.
 *
 * A terminator counts only when followed by whitespace or the end of the
 * text, so "1.0" and "zeek.org" do not end a sentence. Periods of an
 * ellipsis and of the abbreviations above are skipped.
 */
export function findSentenceEnd(text: string): number {
  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);
    if (!SENTENCE_TERMINATORS.has(char)) {
      continue;
    }

    const next = text.charAt(index + 1);
    if (next !== "" && !isWhitespace(next)) {
      continue;
    }

    if (char === "." && text.charAt(index - 1) === ".") {
      continue;
    }

    if (char === "." && endsWithAbbreviation(text.slice(0, index + 1))) {
      continue;
    }

    return index;
  }

  return -1;
}

/** Strips the "v" of tags like "v1.2.3"; other tags pass through. */
export function normalizeVersionTag(tag: string): string {
  if (tag.length > 1 && tag.startsWith("v") && /\d/.test(tag.charAt(1))) {
    return tag.slice(1);
  }

  return tag;
}
