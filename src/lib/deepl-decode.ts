import { DeepLDecodeError } from './deepl-errors.js';
import type { Glossary, GlossaryPayload, Translation, TranslationPayload } from './deepl-types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTranslationPayload(value: unknown): value is TranslationPayload {
  return (
    isRecord(value) &&
    typeof value.text === 'string' &&
    typeof value.detected_source_language === 'string' &&
    (value.billed_characters === undefined || Number.isInteger(value.billed_characters))
  );
}

function isGlossaryPayload(value: unknown): value is GlossaryPayload {
  return (
    isRecord(value) &&
    typeof value.glossary_id === 'string' &&
    typeof value.name === 'string' &&
    typeof value.ready === 'boolean' &&
    typeof value.source_lang === 'string' &&
    typeof value.target_lang === 'string' &&
    typeof value.creation_time === 'string' &&
    Number.isInteger(value.entry_count)
  );
}

/**
 * Reads the list under `key`. A missing key is an empty list.
 */
function listField(raw: unknown, key: string): unknown[] {
  if (!isRecord(raw)) {
    throw new DeepLDecodeError('decode deepl response: expected a JSON object');
  }
  const list = raw[key];
  if (list === undefined || list === null) {
    return [];
  }
  if (!Array.isArray(list)) {
    throw new DeepLDecodeError(`decode deepl response: "${key}" is not a list`);
  }
  return list;
}

export function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new DeepLDecodeError(
      `decode deepl response: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

export function decodeTranslations(raw: unknown): Translation[] {
  return listField(raw, 'translations').map((item, index) => {
    if (!isTranslationPayload(item)) {
      throw new DeepLDecodeError(`decode deepl response: malformed translation at index ${index}`);
    }
    const translation: Translation = {
      detectedSourceLanguage: item.detected_source_language,
      text: item.text,
    };
    if (item.billed_characters !== undefined) {
      translation.billedCharacters = item.billed_characters;
    }
    return translation;
  });
}

export function decodeGlossary(raw: unknown): Glossary {
  if (!isGlossaryPayload(raw)) {
    throw new DeepLDecodeError('decode deepl response: malformed glossary');
  }
  const creationTime = new Date(raw.creation_time);
  if (Number.isNaN(creationTime.getTime())) {
    throw new DeepLDecodeError(`decode deepl response: invalid creation_time "${raw.creation_time}"`);
  }
  return {
    glossaryId: raw.glossary_id,
    name: raw.name,
    ready: raw.ready,
    sourceLang: raw.source_lang,
    targetLang: raw.target_lang,
    creationTime,
    entryCount: raw.entry_count,
  };
}

export function decodeGlossaryList(raw: unknown): Glossary[] {
  return listField(raw, 'glossaries').map(decodeGlossary);
}
