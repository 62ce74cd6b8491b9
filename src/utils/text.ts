const IDEOGRAPHIC = '\\p{Script=Han}\\p{Script=Hiragana}\\p{Script=Katakana}';
const WORD_CHAR = `(?![${IDEOGRAPHIC}])[\\p{L}\\p{N}\\p{M}]`;

const TOKEN_PATTERN = new RegExp(
  `[${IDEOGRAPHIC}]|${WORD_CHAR}+(?:['’]${WORD_CHAR}+)*`,
  'gu'
);
const IDEOGRAPH_PATTERN = new RegExp(`^[${IDEOGRAPHIC}]$`, 'u');
const NUMERIC_PATTERN = /^\p{N}+$/u;

// Terminal punctuation followed by whitespace, or a full-width / non-Latin
// terminator that needs no trailing space.
const SENTENCE_BOUNDARY =
  /(?<=[.!?…]["'”’)\]]*)\s+|(?<=[。！？؟।])\s*/u;

const ABBREVIATION_END =
  /(?:^|[\s(])(?:mr|mrs|ms|dr|prof|sr|jr|st|gov|sen|rep|gen|lt|col|capt|sgt|inc|ltd|co|corp|vs|etc|jan|feb|mar|apr|jun|jul|aug|sep|sept|oct|nov|dec|[a-z])\.$/i;

/**
 * Word tokens in document order. Each CJK ideograph or kana is its own
 * token; other runs of letters, digits and marks form a token, with inner
 * apostrophes kept.
 */
export function tokenizeWords(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

export function countWords(text: string): number {
  return tokenizeWords(text).length;
}

export function isIdeograph(token: string): boolean {
  return IDEOGRAPH_PATTERN.test(token);
}

export function isNumeric(token: string): boolean {
  return NUMERIC_PATTERN.test(token);
}

function splitParagraph(paragraph: string): string[] {
  const pieces = paragraph
    .split(SENTENCE_BOUNDARY)
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);

  const sentences: string[] = [];
  let pending = '';
  for (const piece of pieces) {
    pending = pending ? `${pending} ${piece}` : piece;
    if (!ABBREVIATION_END.test(pending)) {
      sentences.push(pending);
      pending = '';
    }
  }
  if (pending) sentences.push(pending);
  return sentences;
}

/**
 * Sentences in source order. Paragraph breaks always end a sentence.
 */
export function splitSentences(text: string): string[] {
  return text
    .split('\n')
    .flatMap((paragraph) => splitParagraph(paragraph.trim()));
}
