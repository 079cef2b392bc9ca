import { fetchTransport, type Transport } from './deepl-transport.js';

/** Base URL of the DeepL API v2. */
export const DEEPL_API_BASE = 'https://api.deepl.com/v2';
/** Base URL for DeepL API Free accounts. */
export const DEEPL_FREE_API_BASE = 'https://api-free.deepl.com/v2';

export interface ClientConfig {
  baseUrl: string;
  translateUrl: string;
  glossaryUrl: string;
  transport: Transport;
}

/**
 * Configures a client at construction time. Options run in order, so a later
 * option overrides an earlier one for the same field.
 */
export interface ClientOption {
  readonly name: string;
  apply(config: ClientConfig): void;
}

export function defaultClientConfig(): ClientConfig {
  return { ...endpointsFor(DEEPL_API_BASE), transport: fetchTransport() };
}

export function endpointsFor(base: string): Pick<ClientConfig, 'baseUrl' | 'translateUrl' | 'glossaryUrl'> {
  const baseUrl = base.replace(/\/+$/, '');
  return {
    baseUrl,
    translateUrl: `${baseUrl}/translate`,
    glossaryUrl: `${baseUrl}/glossaries`,
  };
}

/**
 * Base URL for all requests; also derives the translate and glossary endpoints.
 */
export function baseUrl(url: string): ClientOption {
  return {
    name: 'baseUrl',
    apply(config) {
      Object.assign(config, endpointsFor(url));
    },
  };
}

/**
 * Replaces the transport used to send requests.
 */
export function transport(send: Transport): ClientOption {
  return {
    name: 'transport',
    apply(config) {
      config.transport = send;
    },
  };
}

/**
 * Free-plan keys end in `:fx` and are only accepted by the free endpoint.
 */
export function defaultBaseUrlForKey(authKey: string): string {
  return authKey.endsWith(':fx') ? DEEPL_FREE_API_BASE : DEEPL_API_BASE;
}
