/**
 * Text statistics for the word-count node.
 *
 * Pure functions, no I/O. Lengths are measured in code points, so a word
 * written in a non-Latin script counts its characters, not its bytes.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Statistics produced by `exec` and carried unchanged through `post`. */
export type WordStats = {
  total_words: number;
  unique_words: number;
  /** Keyed by word; enumeration follows first occurrence. */
  word_frequencies: Record<string, number>;
  average_word_length: number;
  longest_word: string;
  shortest_word: string;
};

export interface WordFilterOptions {
  caseSensitive: boolean;
  /** Minimum length in code points; shorter tokens are dropped. */
  minWordLength: number;
  stopWords: readonly string[];
}

/** Routing action chosen by `post`. */
export type WordCountRoute = 'empty' | 'short' | 'medium' | 'long';

// ---------------------------------------------------------------------------
// Cleaning and tokenizing
// ---------------------------------------------------------------------------

const NOT_WORD_OR_SPACE = /[^\p{Alphabetic}\p{N}\p{White_Space}]/gu;
const WHITE_SPACE_RUN = /\p{White_Space}+/u;

/**
 * Replace every code point that is neither alphanumeric nor white space
 * with a single space. Length in code points is preserved.
 */
export function cleanText(text: string): string {
  return text.replace(NOT_WORD_OR_SPACE, ' ');
}

/** Split on runs of white space, dropping empty tokens. */
export function tokenize(text: string): string[] {
  return text.split(WHITE_SPACE_RUN).filter((token) => token.length > 0);
}

/** Length of `word` in code points. */
export function codePointLength(word: string): number {
  return Array.from(word).length;
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/** Result for text with no countable words. */
export function emptyWordStats(): WordStats {
  return {
    total_words: 0,
    unique_words: 0,
    word_frequencies: {},
    average_word_length: 0,
    longest_word: '',
    shortest_word: '',
  };
}

/** Tokenize, filter by length, fold case and drop stop words. */
export function selectWords(cleanedText: string, options: WordFilterOptions): string[] {
  const stopWords = new Set(options.stopWords);
  return tokenize(cleanedText)
    .filter((token) => codePointLength(token) >= options.minWordLength)
    .map((token) => (options.caseSensitive ? token : token.toLowerCase()))
    .filter((word) => !stopWords.has(word));
}

/**
 * Compute word statistics for already-cleaned text.
 *
 * Ties for longest and shortest word go to the first occurrence.
 */
export function computeWordStats(cleanedText: string, options: WordFilterOptions): WordStats {
  const words = selectWords(cleanedText, options);
  if (words.length === 0) {
    return emptyWordStats();
  }

  const frequencies = new Map<string, number>();
  let totalLength = 0;
  let longest = words[0];
  let shortest = words[0];
  let longestLength = codePointLength(longest);
  let shortestLength = longestLength;

  for (const word of words) {
    frequencies.set(word, (frequencies.get(word) ?? 0) + 1);

    const length = codePointLength(word);
    totalLength += length;
    if (length > longestLength) {
      longest = word;
      longestLength = length;
    }
    if (length < shortestLength) {
      shortest = word;
      shortestLength = length;
    }
  }

  return {
    total_words: words.length,
    unique_words: frequencies.size,
    word_frequencies: Object.fromEntries(frequencies),
    average_word_length: totalLength / words.length,
    longest_word: longest,
    shortest_word: shortest,
  };
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export function routeByWordCount(totalWords: number): WordCountRoute {
  if (totalWords === 0) return 'empty';
  if (totalWords < 100) return 'short';
  if (totalWords < 1000) return 'medium';
  return 'long';
}
