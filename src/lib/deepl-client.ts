import { DeepLClientBase } from './deepl-client-base.js';
import { withGlossaries } from './deepl-client-glossaries.js';
import { withTranslation } from './deepl-client-translate.js';
import type { ClientOption } from './deepl-config.js';

/**
 * DeepL API client.
 *
 * @example
 * ```ts
 * const client = new DeepLClient(process.env.DEEPL_AUTH_KEY ?? '', baseUrl(DEEPL_FREE_API_BASE));
 * const { text } = await client.translate('Hello.', Languages.Japanese, formality('more'));
 * ```
 */
export class DeepLClient extends withGlossaries(withTranslation(DeepLClientBase)) {
  // biome-ignore lint/complexity/noUselessConstructor: narrows the mixin constructor signature.
  constructor(authKey: string, ...options: ClientOption[]) {
    super(authKey, ...options);
  }
}
