import {
  type Formality,
  formalityValue,
  type SplitSentences,
  splitSentencesValue,
  type TagHandling,
  tagHandlingValue,
} from './deepl-enums.js';
import type { Language } from './deepl-language.js';
import type { ParameterBag } from './deepl-params.js';

/**
 * A single change to a translation request. Options are applied in the order
 * they are passed; a later option for the same parameter wins.
 */
export interface TranslateOption {
  readonly name: string;
  apply(params: ParameterBag): void;
}

function setParam(name: string, param: string, value: string): TranslateOption {
  return {
    name,
    apply(params) {
      params.set(param, value);
    },
  };
}

function boolParam(value: boolean): string {
  return value ? '1' : '0';
}

/**
 * Language of the input text. Without it DeepL detects the source language.
 */
export function sourceLang(lang: Language): TranslateOption {
  return setParam('sourceLang', 'source_lang', lang);
}

/**
 * Ask DeepL to report billed characters per translation.
 */
export function showBilledCharacters(show: boolean): TranslateOption {
  return setParam('showBilledCharacters', 'show_billed_characters', boolParam(show));
}

export function splitSentences(split: SplitSentences): TranslateOption {
  return setParam('splitSentences', 'split_sentences', splitSentencesValue(split));
}

export function preserveFormatting(preserve: boolean): TranslateOption {
  return setParam('preserveFormatting', 'preserve_formatting', boolParam(preserve));
}

export function formality(level: Formality): TranslateOption {
  return setParam('formality', 'formality', formalityValue(level));
}

/**
 * Sets `tag_handling`. The default strategy removes the parameter.
 */
export function tagHandling(strategy: TagHandling): TranslateOption {
  const value = tagHandlingValue(strategy);
  return {
    name: 'tagHandling',
    apply(params) {
      if (value === '') {
        params.delete('tag_handling');
      } else {
        params.set('tag_handling', value);
      }
    },
  };
}

/**
 * Tags whose content is not translated. Replaces any earlier list.
 */
export function ignoreTags(...tags: string[]): TranslateOption {
  return setParam('ignoreTags', 'ignore_tags', tags.join(','));
}

export function glossaryId(id: string): TranslateOption {
  return setParam('glossaryId', 'glossary_id', id);
}

/**
 * Extra text that informs the translation but is not translated or billed.
 */
export function context(text: string): TranslateOption {
  return setParam('context', 'context', text);
}
