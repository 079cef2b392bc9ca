import type { Language } from './deepl-language.js';

/**
 * One translated text, in the position of its input text.
 */
export interface Translation {
  /** Source language DeepL detected, or the one passed with `sourceLang`. */
  detectedSourceLanguage: Language;
  text: string;
  /** Only present when requested with `showBilledCharacters(true)`. */
  billedCharacters?: number;
}

export interface TranslateResult {
  text: string;
  detectedSourceLanguage: Language;
}

/**
 * A glossary stored on the DeepL side.
 */
export interface Glossary {
  glossaryId: string;
  name: string;
  /** Whether the glossary can be used in translations yet. */
  ready: boolean;
  sourceLang: Language;
  targetLang: Language;
  creationTime: Date;
  entryCount: number;
}

export interface GlossaryEntry {
  source: string;
  target: string;
}

/** Raw wire shapes. */
export interface TranslationPayload {
  detected_source_language: string;
  text: string;
  billed_characters?: number;
}

export interface GlossaryPayload {
  glossary_id: string;
  name: string;
  ready: boolean;
  source_lang: string;
  target_lang: string;
  creation_time: string;
  entry_count: number;
}
