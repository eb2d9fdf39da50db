// "plant leaf", "leaves", "plant"; never the first word of a longer noun
// phrase such as "leaf wetness" or "plant disease".
const LEAF_SUBJECT = '(?:(?:plant\\s+)?(?:leaf|leaves)|plant)\\b';
const PHRASE_END =
  '(?=\\s*(?:$|[.,;:!?)"\'\\]}]|(?:but|and|or|nor|so|because|though|either|here|there|at\\s+all|' +
  'in\\s+(?:the|this|your)\\s+(?:image|photo|picture))\\b))';

const NON_LEAF_PATTERNS: readonly RegExp[] = [
  /\binvalid[\s_-]?image\b/i,
  new RegExp(`\\bnot\\s+(?:a|an|any)\\s+${LEAF_SUBJECT}${PHRASE_END}`, 'i'),
  new RegExp(
    `\\b(?:does\\s+not|doesn't|do\\s+not|don't)\\s+(?:appear\\s+to\\s+|seem\\s+to\\s+)?` +
      `(?:be|show|contain|depict|include)\\s+(?:a\\s+|an\\s+|any\\s+)?${LEAF_SUBJECT}${PHRASE_END}`,
    'i',
  ),
  new RegExp(
    `\\bno\\s+${LEAF_SUBJECT}\\s+(?:is\\s+|are\\s+)?(?:visible|present|detected|found|shown)\\b${PHRASE_END}`,
    'i',
  ),
];

/** True when the text says the photo is not of a plant leaf. */
export function indicatesNonLeafImage(text: string): boolean {
  return NON_LEAF_PATTERNS.some((pattern) => pattern.test(text));
}
