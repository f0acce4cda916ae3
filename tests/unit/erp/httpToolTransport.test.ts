import { describe, it, expect, vi } from 'vitest';
import { ToolProtocolError, ToolTimeoutError, ToolUnavailableError } from '../../../src/services/erp/errors';
import { HttpErpToolTransport } from '../../../src/services/erp/httpToolTransport';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('HttpErpToolTransport', () => {
  it('posts the arguments and unwraps the result envelope', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ result: { status: 'match' } }));
    const transport = new HttpErpToolTransport({
      baseUrl: 'http://erp.test/',
      timeoutMs: 1000,
      apiKey: 'test-secret',
      fetchImpl,
    });

    const result = await transport.call('check_tax_id', { taxId: 'FR1' }, { idempotencyKey: 'invoice-run-1' });

    expect(result).toEqual({ status: 'match' });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('http://erp.test/tools/check_tax_id');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"arguments":{"taxId":"FR1"}}');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
      'Idempotency-Key': 'invoice-run-1',
    });
  });

  it('classifies 5xx and 429 as unavailable', async () => {
    for (const status of [500, 503, 429]) {
      const transport = new HttpErpToolTransport({
        baseUrl: 'http://erp.test',
        timeoutMs: 1000,
        fetchImpl: async () => new Response('busy', { status }),
      });
      await expect(transport.call('lookup_supplier', {})).rejects.toBeInstanceOf(ToolUnavailableError);
    }
  });

  it('classifies 504 as a timeout', async () => {
    const transport = new HttpErpToolTransport({
      baseUrl: 'http://erp.test',
      timeoutMs: 1000,
      fetchImpl: async () => new Response('', { status: 504 }),
    });

    await expect(transport.call('lookup_supplier', {})).rejects.toBeInstanceOf(ToolTimeoutError);
  });

  it('classifies other non-2xx answers as protocol errors', async () => {
    const transport = new HttpErpToolTransport({
      baseUrl: 'http://erp.test',
      timeoutMs: 1000,
      fetchImpl: async () => new Response('no such tool', { status: 404 }),
    });

    const err = await transport.call('lookup_supplier', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolProtocolError);
    expect(err).toMatchObject({ message: 'lookup_supplier returned HTTP 404', issues: ['no such tool'] });
  });

  it('rejects a body that is not JSON or lacks the envelope', async () => {
    const notJson = new HttpErpToolTransport({
      baseUrl: 'http://erp.test',
      timeoutMs: 1000,
      fetchImpl: async () => new Response('<html>', { status: 200 }),
    });
    const wrongEnvelope = new HttpErpToolTransport({
      baseUrl: 'http://erp.test',
      timeoutMs: 1000,
      fetchImpl: async () => jsonResponse({ result: {}, extra: true }),
    });

    await expect(notJson.call('lookup_supplier', {})).rejects.toThrow('lookup_supplier returned a non-JSON body');
    await expect(wrongEnvelope.call('lookup_supplier', {})).rejects.toThrow('lookup_supplier response envelope is malformed');
  });

  it('maps a network failure to unavailable', async () => {
    const transport = new HttpErpToolTransport({
      baseUrl: 'http://erp.test',
      timeoutMs: 1000,
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(transport.call('lookup_supplier', {})).rejects.toThrow('lookup_supplier unreachable: fetch failed');
  });

  it('aborts a call that outlives its timeout', async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const transport = new HttpErpToolTransport({ baseUrl: 'http://erp.test', timeoutMs: 20, fetchImpl: hanging });

    await expect(transport.call('check_bank_account', {})).rejects.toThrow('check_bank_account did not respond within 20ms');
  });

  it('rethrows a caller abort as-is', async () => {
    const controller = new AbortController();
    const callerAbort = new Error('caller gave up');
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(callerAbort));
      });
    const transport = new HttpErpToolTransport({ baseUrl: 'http://erp.test', timeoutMs: 5000, fetchImpl: hanging });

    const pending = transport.call('check_bank_account', {}, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBe(callerAbort);
  });
});
