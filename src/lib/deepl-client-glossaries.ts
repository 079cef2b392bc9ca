import type { AbstractConstructor, DeepLClientBase, Mixin } from './deepl-client-base.js';
import { decodeGlossary, decodeGlossaryList, parseJson } from './deepl-decode.js';
import { DeepLRequestError } from './deepl-errors.js';
import type { Language } from './deepl-language.js';
import { ParameterBag } from './deepl-params.js';
import type { Glossary, GlossaryEntry } from './deepl-types.js';
import {
  decodeGlossaryEntries,
  encodeGlossaryEntries,
  GLOSSARY_ENTRIES_FORMAT,
  TSV_MEDIA_TYPE,
} from './glossary-tsv.js';

export interface DeepLClientGlossaryMethods {
  createGlossary(
    name: string,
    sourceLang: Language,
    targetLang: Language,
    entries: readonly GlossaryEntry[],
  ): Promise<Glossary>;
  listGlossaries(): Promise<Glossary[]>;
  getGlossary(glossaryId: string): Promise<Glossary>;
  listGlossaryEntries(glossaryId: string): Promise<GlossaryEntry[]>;
  deleteGlossary(glossaryId: string): Promise<void>;
}

export function withGlossaries<TBase extends AbstractConstructor<DeepLClientBase>>(
  Base: TBase,
): Mixin<TBase, DeepLClientGlossaryMethods> {
  abstract class DeepLClientGlossaries extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    private glossaryPath(glossaryId: string, suffix = ''): string {
      // encodeURIComponent keeps dots, and fetch would resolve "." or ".." against the base.
      if (/^\.*$/.test(glossaryId)) {
        throw new DeepLRequestError(`build request: invalid glossary id ${JSON.stringify(glossaryId)}`);
      }
      return `${this.glossaryUrl}/${encodeURIComponent(glossaryId)}${suffix}`;
    }

    /**
     * Create a glossary from source→target entries. New glossaries may not be
     * `ready` right away.
     */
    async createGlossary(
      name: string,
      sourceLang: Language,
      targetLang: Language,
      entries: readonly GlossaryEntry[],
    ): Promise<Glossary> {
      const params = new ParameterBag();
      params.set('name', name);
      params.set('source_lang', sourceLang);
      params.set('target_lang', targetLang);
      params.set('entries_format', GLOSSARY_ENTRIES_FORMAT);
      params.set('entries', encodeGlossaryEntries(entries));

      const response = await this.send({
        url: this.glossaryUrl,
        method: 'POST',
        headers: this.formHeaders(),
        body: params.toString(),
      });

      if (response.status !== 201) {
        throw await this.apiErrorWithBody(response);
      }

      return decodeGlossary(parseJson(await this.readBody(response)));
    }

    async listGlossaries(): Promise<Glossary[]> {
      const response = await this.send({ url: this.glossaryUrl, method: 'GET', headers: this.authHeaders() });

      if (response.status !== 200) {
        throw await this.apiErrorWithBody(response);
      }

      return decodeGlossaryList(parseJson(await this.readBody(response)));
    }

    async getGlossary(glossaryId: string): Promise<Glossary> {
      const response = await this.send({
        url: this.glossaryPath(glossaryId),
        method: 'GET',
        headers: this.authHeaders(),
      });

      if (response.status !== 200) {
        throw await this.apiErrorWithBody(response);
      }

      return decodeGlossary(parseJson(await this.readBody(response)));
    }

    /**
     * Entries of a glossary, fetched as TSV. A malformed line fails the whole call.
     */
    async listGlossaryEntries(glossaryId: string): Promise<GlossaryEntry[]> {
      const response = await this.send({
        url: this.glossaryPath(glossaryId, '/entries'),
        method: 'GET',
        headers: this.authHeaders({ Accept: TSV_MEDIA_TYPE }),
      });

      if (response.status !== 200) {
        throw await this.apiErrorWithBody(response);
      }

      return decodeGlossaryEntries(await this.readBody(response));
    }

    async deleteGlossary(glossaryId: string): Promise<void> {
      const response = await this.send({
        url: this.glossaryPath(glossaryId),
        method: 'DELETE',
        headers: this.authHeaders(),
      });

      if (response.status !== 204) {
        throw await this.apiErrorWithBody(response);
      }
    }
  }

  return DeepLClientGlossaries;
}
