type OpenString = string & Record<never, never>;

export const SplitSentences = {
  /** No splitting; the whole input is one sentence. */
  None: '0',
  /** Split on punctuation and on newlines. */
  Default: '1',
  /** Split on punctuation only, ignoring newlines. */
  NoNewlines: 'nonewlines',
} as const;

export type SplitSentences = (typeof SplitSentences)[keyof typeof SplitSentences] | OpenString;

/**
 * Request value for `split_sentences`. Unknown modes fall back to the default (`"1"`).
 */
export function splitSentencesValue(split: SplitSentences): string {
  switch (split) {
    case SplitSentences.None:
    case SplitSentences.Default:
    case SplitSentences.NoNewlines:
      return split;
    default:
      return SplitSentences.Default;
  }
}

export const Formality = {
  Default: 'default',
  /** Less formal, more informal language. */
  Less: 'less',
  More: 'more',
} as const;

export type Formality = (typeof Formality)[keyof typeof Formality] | OpenString;

export function formalityValue(formality: Formality): string {
  return formality;
}

export const TagHandling = {
  /** Tags are not taken into account. */
  Default: 'default',
  /** Text is extracted from the XML structure, translated sentence by sentence, and put back. */
  Xml: 'xml',
  Html: 'html',
} as const;

export type TagHandling = (typeof TagHandling)[keyof typeof TagHandling] | OpenString;

/**
 * Request value for `tag_handling`. The default strategy has no wire value and
 * maps to an empty string.
 */
export function tagHandlingValue(strategy: TagHandling): string {
  return strategy === TagHandling.Default ? '' : strategy;
}
