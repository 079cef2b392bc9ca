import type { Command } from 'commander';
import { DeepLClient } from '../lib/deepl-client.js';
import { baseUrl, defaultBaseUrlForKey, transport } from '../lib/deepl-config.js';
import { isDeepLError, QUOTA_EXCEEDED_STATUS } from '../lib/deepl-errors.js';
import { fetchTransport } from '../lib/deepl-transport.js';

export type GlobalOptions = {
  authKey?: string;
  baseUrl?: string;
  timeout?: string;
  plain?: boolean;
};

export type PrefixKind = 'err' | 'warn' | 'info' | 'ok';

export interface ResolvedClientConfig {
  authKey: string;
  baseUrl: string;
  timeoutMs?: number;
}

export type ClientConfigResult = ({ ok: true } & ResolvedClientConfig) | { ok: false; error: string };

export interface CliContext {
  /** Prefix for a stderr line. */
  p(kind: PrefixKind): string;
  resolveClientConfig(opts: GlobalOptions): ClientConfigResult;
  /** Builds a client from the global flags, or reports why it cannot and returns undefined. */
  createClientFromOptions(opts: GlobalOptions): DeepLClient | undefined;
  reportError(action: string, error: unknown): void;
}

const EMOJI_PREFIXES: Record<PrefixKind, string> = {
  err: '❌ ',
  warn: '⚠️  ',
  info: 'ℹ️  ',
  ok: '✅ ',
};

export type TimeoutResult = { ok: true; timeoutMs?: number } | { ok: false; error: string };

export function parseTimeoutMs(raw: string | undefined): TimeoutResult {
  if (raw === undefined || raw === '') {
    return { ok: true };
  }
  const timeoutMs = Number.parseInt(raw, 10);
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || String(timeoutMs) !== raw.trim()) {
    return { ok: false, error: 'Invalid --timeout. Expected a positive integer (ms).' };
  }
  return { ok: true, timeoutMs };
}

/**
 * Flags win over the environment. Without an explicit base URL the key picks
 * the free or the pro endpoint.
 */
export function resolveClientConfig(opts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): ClientConfigResult {
  const authKey = opts.authKey ?? env.DEEPL_AUTH_KEY;
  if (!authKey) {
    return { ok: false, error: 'Missing DeepL auth key. Pass --auth-key or set DEEPL_AUTH_KEY.' };
  }

  const timeout = parseTimeoutMs(opts.timeout ?? env.DEEPL_TIMEOUT_MS);
  if (!timeout.ok) {
    return timeout;
  }

  return {
    ok: true,
    authKey,
    baseUrl: opts.baseUrl ?? env.DEEPL_API_ENDPOINT ?? defaultBaseUrlForKey(authKey),
    timeoutMs: timeout.timeoutMs,
  };
}

export function describeError(error: unknown): string {
  if (!isDeepLError(error)) {
    return error instanceof Error ? error.message : String(error);
  }

  switch (error.kind) {
    case 'api':
      if (error.code === QUOTA_EXCEEDED_STATUS) {
        return `${error.message} Check your usage in the DeepL account settings.`;
      }
      if (error.code === 401 || error.code === 403) {
        return `${error.message}. Check the DeepL auth key.`;
      }
      return error.message;
    case 'transport':
      return `Could not reach DeepL: ${error.message}`;
    case 'request':
    case 'decode':
    case 'empty-result':
      return error.message;
  }
}

export function createCliContext(program: Command, env: NodeJS.ProcessEnv = process.env): CliContext {
  const p = (kind: PrefixKind): string => {
    if (program.opts<GlobalOptions>().plain) {
      return `[${kind}] `;
    }
    return EMOJI_PREFIXES[kind];
  };

  return {
    p,
    resolveClientConfig: (opts) => resolveClientConfig(opts, env),
    createClientFromOptions(opts) {
      const config = resolveClientConfig(opts, env);
      if (!config.ok) {
        console.error(`${p('err')}${config.error}`);
        process.exitCode = 1;
        return undefined;
      }
      return new DeepLClient(
        config.authKey,
        baseUrl(config.baseUrl),
        transport(fetchTransport({ timeoutMs: config.timeoutMs })),
      );
    },
    reportError(action, error) {
      console.error(`${p('err')}${action}: ${describeError(error)}`);
      process.exitCode = 1;
    },
  };
}
