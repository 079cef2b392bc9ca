import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { createProgram } from '../src/cli/program.js';
import { describeError, parseTimeoutMs, resolveClientConfig } from '../src/cli/shared.js';
import { buildTranslateOptions } from '../src/commands/translate.js';
import { DEEPL_API_BASE, DEEPL_FREE_API_BASE } from '../src/lib/deepl-config.js';
import { DeepLApiError, DeepLEmptyResultError, DeepLTransportError } from '../src/lib/deepl-errors.js';
import { ParameterBag } from '../src/lib/deepl-params.js';
import { glossaryPayload } from './deepl-fixtures.js';

const env = { DEEPL_AUTH_KEY: 'test-key', DEEPL_API_ENDPOINT: 'http://deepl.test/v2' };

describe('resolveClientConfig', () => {
  it('prefers flags over the environment', () => {
    expect(resolveClientConfig({ authKey: 'flag-key', baseUrl: 'http://flag.test', timeout: '2500' }, env)).toEqual({
      ok: true,
      authKey: 'flag-key',
      baseUrl: 'http://flag.test',
      timeoutMs: 2500,
    });
  });

  it('falls back to the environment', () => {
    expect(resolveClientConfig({}, { ...env, DEEPL_TIMEOUT_MS: '1000' })).toEqual({
      ok: true,
      authKey: 'test-key',
      baseUrl: 'http://deepl.test/v2',
      timeoutMs: 1000,
    });
  });

  it('picks the endpoint from the key when no base URL is given', () => {
    expect(resolveClientConfig({ authKey: 'test-key:fx' }, {})).toMatchObject({ ok: true, baseUrl: DEEPL_FREE_API_BASE });
    expect(resolveClientConfig({ authKey: 'test-key' }, {})).toMatchObject({ ok: true, baseUrl: DEEPL_API_BASE });
  });

  it('requires an auth key', () => {
    expect(resolveClientConfig({}, {})).toEqual({
      ok: false,
      error: 'Missing DeepL auth key. Pass --auth-key or set DEEPL_AUTH_KEY.',
    });
  });

  it('rejects an invalid timeout', () => {
    expect(resolveClientConfig({ timeout: 'soon' }, env)).toEqual({
      ok: false,
      error: 'Invalid --timeout. Expected a positive integer (ms).',
    });
  });
});

describe('parseTimeoutMs', () => {
  it('accepts positive integers and nothing', () => {
    expect(parseTimeoutMs('1500')).toEqual({ ok: true, timeoutMs: 1500 });
    expect(parseTimeoutMs(undefined)).toEqual({ ok: true });
  });

  it.each(['0', '-5', '12ms', '1.5'])('rejects %j', (raw) => {
    expect(parseTimeoutMs(raw).ok).toBe(false);
  });
});

describe('buildTranslateOptions', () => {
  it('maps flags to request parameters', () => {
    const params = new ParameterBag();
    for (const option of buildTranslateOptions({
      from: 'en',
      formality: 'less',
      splitSentences: '0',
      preserveFormatting: true,
      tagHandling: 'xml',
      ignoreTags: 'code, pre,,',
      glossary: 'g1',
      context: 'shop UI',
      showBilledCharacters: true,
    })) {
      option.apply(params);
    }

    expect(Object.fromEntries(params.toURLSearchParams())).toEqual({
      source_lang: 'EN',
      formality: 'less',
      split_sentences: '0',
      preserve_formatting: '1',
      tag_handling: 'xml',
      ignore_tags: 'code,pre',
      glossary_id: 'g1',
      context: 'shop UI',
      show_billed_characters: '1',
    });
  });

  it('adds nothing without flags', () => {
    expect(buildTranslateOptions({})).toEqual([]);
  });
});

describe('describeError', () => {
  it('adds hints for quota and auth failures', () => {
    expect(describeError(new DeepLApiError(456))).toBe(
      'Quota exceeded. The character limit has been reached. Check your usage in the DeepL account settings.',
    );
    expect(describeError(new DeepLApiError(403))).toBe('unexpected HTTP status Forbidden. Check the DeepL auth key.');
  });

  it('describes other errors by message', () => {
    expect(describeError(new DeepLTransportError('do request: ECONNREFUSED'))).toBe(
      'Could not reach DeepL: do request: ECONNREFUSED',
    );
    expect(describeError(new DeepLEmptyResultError())).toBe('deepl responded with no translations');
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('text')).toBe('text');
  });
});

describe('deepl-lite CLI', () => {
  let mockFetch: ReturnType<typeof vi.fn>;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  async function run(args: string[], runEnv: NodeJS.ProcessEnv = env): Promise<void> {
    await createProgram(runEnv).parseAsync(['--plain', ...args], { from: 'user' });
  }

  it('translates each argument and prints the results', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          translations: [
            { detected_source_language: 'EN', text: 'Hallo' },
            { detected_source_language: 'EN', text: 'Welt' },
          ],
        }),
        { status: 200 },
      ),
    );

    await run(['translate', 'Hello', 'World', '--to', 'de', '--formality', 'more']);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://deepl.test/v2/translate');
    const form = new URLSearchParams(init.body);
    expect(form.get('target_lang')).toBe('DE');
    expect(form.get('formality')).toBe('more');
    expect(form.getAll('text')).toEqual(['Hello', 'World']);
    expect(logSpy.mock.calls).toEqual([['Hallo'], ['Welt']]);
    expect(errorSpy).toHaveBeenCalledWith('[info] Detected EN');
    expect(process.exitCode).toBeUndefined();
  });

  it('prints JSON output', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ translations: [{ detected_source_language: 'FR', text: 'Hello' }] }), {
        status: 200,
      }),
    );

    await run(['translate', 'Bonjour', '--to', 'EN-GB', '--json']);

    expect(logSpy).toHaveBeenCalledWith(
      JSON.stringify([{ detectedSourceLanguage: 'FR', text: 'Hello' }], null, 2),
    );
  });

  it('reports quota errors and sets the exit code', async () => {
    mockFetch.mockResolvedValueOnce(new Response('', { status: 456 }));

    await run(['translate', 'Hello', '--to', 'DE']);

    expect(errorSpy).toHaveBeenCalledWith(
      '[err] Translation failed: Quota exceeded. The character limit has been reached. Check your usage in the DeepL account settings.',
    );
    expect(process.exitCode).toBe(1);
  });

  it('refuses to run without an auth key', async () => {
    await run(['translate', 'Hello', '--to', 'DE'], {});

    expect(mockFetch).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('[err] Missing DeepL auth key. Pass --auth-key or set DEEPL_AUTH_KEY.');
    expect(process.exitCode).toBe(1);
  });

  it('lists glossaries', async () => {
    mockFetch.mockResolvedValueOnce(new Response(JSON.stringify({ glossaries: [glossaryPayload] }), { status: 200 }));

    await run(['glossary', 'list']);

    expect(mockFetch.mock.calls[0][0]).toBe('http://deepl.test/v2/glossaries');
    expect(logSpy).toHaveBeenCalledWith(
      'def3a26b-3e84-45b3-84ae-0c0aaf3525f7  Product terms  en→de  2 entries  ready  2024-03-01T09:30:00.000Z',
    );
  });

  it('prints glossary entries as TSV', async () => {
    mockFetch.mockResolvedValueOnce(new Response('checkout\tKasse\ncart\tWarenkorb\n', { status: 200 }));

    await run(['glossary', 'entries', 'g1']);

    expect(mockFetch.mock.calls[0][1].headers).toEqual({
      Authorization: 'DeepL-Auth-Key test-key',
      Accept: 'text/tab-separated-values',
    });
    expect(logSpy).toHaveBeenCalledWith('checkout\tKasse\ncart\tWarenkorb');
  });

  it('creates a glossary from a TSV file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'deepl-lite-'));
    const file = join(dir, 'terms.tsv');
    await writeFile(file, 'checkout\tKasse\ncart\tWarenkorb\n', 'utf8');
    mockFetch.mockResolvedValueOnce(new Response(JSON.stringify(glossaryPayload), { status: 201 }));

    try {
      await run(['glossary', 'create', 'Product terms', '--from', 'en', '--to', 'de', '--entries', file]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }

    const form = new URLSearchParams(mockFetch.mock.calls[0][1].body);
    expect(form.get('name')).toBe('Product terms');
    expect(form.get('source_lang')).toBe('EN');
    expect(form.get('target_lang')).toBe('DE');
    expect(form.get('entries')).toBe('checkout\tKasse\ncart\tWarenkorb');
    expect(logSpy).toHaveBeenCalledWith('def3a26b-3e84-45b3-84ae-0c0aaf3525f7');
    expect(errorSpy).toHaveBeenCalledWith('[ok] Created glossary "Product terms" with 2 entries.');
  });

  it('reports a failed delete with the response body', async () => {
    mockFetch.mockResolvedValueOnce(new Response('{"message":"Glossary not found"}', { status: 404 }));

    await run(['glossary', 'delete', 'missing']);

    expect(mockFetch.mock.calls[0][1].method).toBe('DELETE');
    expect(errorSpy).toHaveBeenCalledWith(
      '[err] Failed to delete glossary: unexpected HTTP status Not Found ({"message":"Glossary not found"})',
    );
    expect(process.exitCode).toBe(1);
  });
});
