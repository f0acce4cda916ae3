import type { ToolErrorKind } from '../pipeline/types';

export abstract class ErpToolError extends Error {
  abstract readonly kind: ToolErrorKind;

  constructor(
    readonly tool: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Network or transport failure, or a 5xx from the tool server. */
export class ToolUnavailableError extends ErpToolError {
  readonly kind = 'unavailable' as const;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super(tool, message, options);
    this.name = 'ToolUnavailableError';
  }
}

export class ToolTimeoutError extends ErpToolError {
  readonly kind = 'timeout' as const;

  constructor(tool: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(tool, `${tool} did not respond within ${timeoutMs}ms`, options);
    this.name = 'ToolTimeoutError';
  }
}

/** The tool answered, but not with something that matches its contract. */
export class ToolProtocolError extends ErpToolError {
  readonly kind = 'protocol' as const;

  constructor(
    tool: string,
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(tool, message, options);
    this.name = 'ToolProtocolError';
  }
}

export function isTransientToolError(err: unknown): err is ToolUnavailableError | ToolTimeoutError {
  return err instanceof ToolUnavailableError || err instanceof ToolTimeoutError;
}
