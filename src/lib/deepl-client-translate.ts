import type { AbstractConstructor, DeepLClientBase, Mixin } from './deepl-client-base.js';
import { decodeTranslations, parseJson } from './deepl-decode.js';
import { DeepLApiError, DeepLEmptyResultError } from './deepl-errors.js';
import type { Language } from './deepl-language.js';
import type { TranslateOption } from './deepl-options.js';
import { ParameterBag } from './deepl-params.js';
import type { TranslateResult, Translation } from './deepl-types.js';

export interface DeepLClientTranslateMethods {
  translate(text: string, targetLang: Language, ...options: TranslateOption[]): Promise<TranslateResult>;
  translateMany(texts: readonly string[], targetLang: Language, ...options: TranslateOption[]): Promise<Translation[]>;
}

export function withTranslation<TBase extends AbstractConstructor<DeepLClientBase>>(
  Base: TBase,
): Mixin<TBase, DeepLClientTranslateMethods> {
  abstract class DeepLClientTranslate extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Translate a single text. Resolves with the translated text and the
     * detected source language.
     *
     * Rejects with a {@link DeepLApiError} when DeepL answers with an error
     * status, and with a {@link DeepLEmptyResultError} when it answers with no
     * translation at all.
     */
    async translate(text: string, targetLang: Language, ...options: TranslateOption[]): Promise<TranslateResult> {
      const translations = await this.translateMany([text], targetLang, ...options);
      const [first] = translations;
      if (!first) {
        throw new DeepLEmptyResultError();
      }
      return { text: first.text, detectedSourceLanguage: first.detectedSourceLanguage };
    }

    /**
     * Translate several texts in one request. Translations come back in the
     * order DeepL returns them, which is the order of `texts`.
     */
    async translateMany(
      texts: readonly string[],
      targetLang: Language,
      ...options: TranslateOption[]
    ): Promise<Translation[]> {
      const params = new ParameterBag();
      params.set('auth_key', this.authKey);
      params.set('target_lang', targetLang);
      for (const text of texts) {
        params.appendText(text);
      }
      for (const option of options) {
        option.apply(params);
      }

      const response = await this.send({
        url: this.translateUrl,
        method: 'POST',
        headers: this.formHeaders(),
        body: params.toString(),
      });

      // The body is read to release the connection, but not kept for translate errors.
      if (response.status !== 200) {
        await this.readBody(response);
        throw new DeepLApiError(response.status);
      }

      return decodeTranslations(parseJson(await this.readBody(response)));
    }
  }

  return DeepLClientTranslate;
}
