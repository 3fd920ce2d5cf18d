export type IndicatorPair = readonly [string, string];

export function parsePairs(pairs: readonly string[]): IndicatorPair[] {
  return pairs.map((pair) => {
    const [first = '', second = ''] = pair.split('/');
    return [first, second] as const;
  });
}

/** Both words of a reversal pair (e.g. "was" and "saw") appear in the same text. */
export function detectWordReversals(
  words: readonly string[],
  pairs: readonly IndicatorPair[],
): string[] {
  const present = new Set(words);
  return pairs
    .filter(([first, second]) => present.has(first) && present.has(second))
    .map(([first, second]) => `Potential word reversal: '${first}' / '${second}'`);
}

function swapLetters(word: string, a: string, b: string): string {
  return [...word].map((ch) => (ch === a ? b : ch === b ? a : ch)).join('');
}

/**
 * Two distinct words in the text differ only by swapping a confusable letter
 * pair, e.g. "bad" and "dad" for b/d.
 */
export function detectLetterReversals(
  words: readonly string[],
  pairs: readonly IndicatorPair[],
): string[] {
  const present = new Set(words);
  const reported = new Set<string>();
  const findings: string[] = [];

  for (const [a, b] of pairs) {
    for (const word of present) {
      if (!word.includes(a) && !word.includes(b)) continue;

      const swapped = swapLetters(word, a, b);
      if (swapped === word || !present.has(swapped)) continue;

      const [left, right] = [word, swapped].sort();
      const key = `${a}/${b}:${left}|${right}`;
      if (reported.has(key)) continue;
      reported.add(key);

      findings.push(`Potential ${a}/${b} reversal: '${left}' / '${right}'`);
    }
  }

  return findings;
}

/** A word contains the phonetic form ("fone") but not the conventional one ("phone"). */
export function detectPhoneticSpellings(
  words: readonly string[],
  pairs: readonly IndicatorPair[],
): string[] {
  const findings: string[] = [];
  for (const word of words) {
    for (const [correct, phonetic] of pairs) {
      if (word.includes(phonetic) && !word.includes(correct)) {
        findings.push(`Phonetic spelling: '${word}' (possibly '${correct}')`);
      }
    }
  }
  return findings;
}
