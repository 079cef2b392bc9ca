import { type ClientConfig, type ClientOption, defaultClientConfig } from './deepl-config.js';
import { DeepLApiError, DeepLRequestError, DeepLTransportError } from './deepl-errors.js';
import type { Transport, TransportRequest, TransportResponse } from './deepl-transport.js';

// biome-ignore lint/suspicious/noExplicitAny: TS mixin constructor requirement.
export type AbstractConstructor<T = object> = abstract new (...args: any[]) => T;

export type Mixin<TBase extends AbstractConstructor<DeepLClientBase>, TMethods> = TBase &
  AbstractConstructor<TMethods>;

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Configuration and request plumbing shared by the client mixins.
 * The configuration is frozen once the constructor returns.
 */
export class DeepLClientBase {
  readonly authKey: string;
  private readonly config: Readonly<ClientConfig>;

  constructor(authKey: string, ...options: ClientOption[]) {
    const config = defaultClientConfig();
    for (const option of options) {
      option.apply(config);
    }
    this.authKey = authKey;
    this.config = Object.freeze(config);
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get translateUrl(): string {
    return this.config.translateUrl;
  }

  get glossaryUrl(): string {
    return this.config.glossaryUrl;
  }

  get transport(): Transport {
    return this.config.transport;
  }

  protected authHeaders(extra: Record<string, string> = {}): Record<string, string> {
    return { Authorization: `DeepL-Auth-Key ${this.authKey}`, ...extra };
  }

  protected formHeaders(): Record<string, string> {
    return this.authHeaders({ 'Content-Type': FORM_CONTENT_TYPE });
  }

  protected async send(request: TransportRequest): Promise<TransportResponse> {
    if (!URL.canParse(request.url)) {
      throw new DeepLRequestError(`build request: invalid URL ${JSON.stringify(request.url)}`);
    }

    try {
      return await this.config.transport(request);
    } catch (error) {
      throw new DeepLTransportError(
        `do request: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  protected async readBody(response: TransportResponse): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new DeepLTransportError(
        `read response body: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Error for an unexpected status, with the response body attached.
   */
  protected async apiErrorWithBody(response: TransportResponse): Promise<DeepLApiError> {
    return new DeepLApiError(response.status, await this.readBody(response));
  }
}
