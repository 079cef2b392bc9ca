export { DeepLClient } from './lib/deepl-client.js';
export type { DeepLClientGlossaryMethods } from './lib/deepl-client-glossaries.js';
export type { DeepLClientTranslateMethods } from './lib/deepl-client-translate.js';
export {
  baseUrl,
  type ClientConfig,
  type ClientOption,
  DEEPL_API_BASE,
  DEEPL_FREE_API_BASE,
  defaultBaseUrlForKey,
  transport,
} from './lib/deepl-config.js';
export {
  Formality,
  formalityValue,
  SplitSentences,
  splitSentencesValue,
  TagHandling,
  tagHandlingValue,
} from './lib/deepl-enums.js';
export {
  DeepLApiError,
  type DeepLClientError,
  DeepLDecodeError,
  DeepLEmptyResultError,
  DeepLError,
  type DeepLErrorKind,
  DeepLRequestError,
  DeepLTransportError,
  isDeepLError,
  QUOTA_EXCEEDED_STATUS,
  renderApiError,
} from './lib/deepl-errors.js';
export { type Language, Languages } from './lib/deepl-language.js';
export {
  context,
  formality,
  glossaryId,
  ignoreTags,
  preserveFormatting,
  showBilledCharacters,
  sourceLang,
  splitSentences,
  tagHandling,
  type TranslateOption,
} from './lib/deepl-options.js';
export { ParameterBag } from './lib/deepl-params.js';
export {
  type FetchTransportOptions,
  fetchTransport,
  type HttpMethod,
  type Transport,
  type TransportRequest,
  type TransportResponse,
} from './lib/deepl-transport.js';
export type { Glossary, GlossaryEntry, TranslateResult, Translation } from './lib/deepl-types.js';
export { decodeGlossaryEntries, encodeGlossaryEntries } from './lib/glossary-tsv.js';
