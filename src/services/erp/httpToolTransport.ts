import { ToolEnvelope, type ErpToolName } from './toolSchemas';
import { ToolProtocolError, ToolTimeoutError, ToolUnavailableError } from './errors';

export type ToolCallOptions = {
  signal?: AbortSignal;
  idempotencyKey?: string;
};

/**
 * Moves one tool call to the reference-data server and back.
 * Implementations throw ToolUnavailableError, ToolTimeoutError or ToolProtocolError;
 * an abort requested by the caller is rethrown untouched.
 */
export interface ErpToolTransport {
  call(tool: ErpToolName, args: Record<string, unknown>, options?: ToolCallOptions): Promise<unknown>;
}

export type HttpErpToolTransportOptions = {
  baseUrl: string;
  timeoutMs: number;
  apiKey?: string;
  fetchImpl?: typeof fetch;
};

export class HttpErpToolTransport implements ErpToolTransport {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: HttpErpToolTransportOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async call(tool: ErpToolName, args: Record<string, unknown>, options: ToolCallOptions = {}): Promise<unknown> {
    const url = `${this.opts.baseUrl.replace(/\/+$/, '')}/tools/${tool}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.opts.apiKey) headers.Authorization = `Bearer ${this.opts.apiKey}`;
    if (options.idempotencyKey) headers['Idempotency-Key'] = options.idempotencyKey;

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.opts.timeoutMs);
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    let status: number;
    let text: string;
    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ arguments: args }),
        signal: controller.signal,
      });
      status = res.status;
      text = await res.text();
    } catch (err) {
      if (timedOut) throw new ToolTimeoutError(tool, this.opts.timeoutMs, { cause: err });
      if (options.signal?.aborted) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ToolUnavailableError(tool, `${tool} unreachable: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    if (status === 408 || status === 504) {
      throw new ToolTimeoutError(tool, this.opts.timeoutMs);
    }
    if (status === 429 || status >= 500) {
      throw new ToolUnavailableError(tool, `${tool} returned HTTP ${status}`);
    }
    if (status < 200 || status >= 300) {
      throw new ToolProtocolError(tool, `${tool} returned HTTP ${status}`, [text.slice(0, 200)]);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new ToolProtocolError(tool, `${tool} returned a non-JSON body`, [], { cause: err });
    }

    const envelope = ToolEnvelope.safeParse(body);
    if (!envelope.success) {
      throw new ToolProtocolError(
        tool,
        `${tool} response envelope is malformed`,
        envelope.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      );
    }
    return envelope.data.result;
  }
}
