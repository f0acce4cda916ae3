import { config } from './env';

/**
 * Score an invoice must strictly exceed to be routed to record creation.
 * Scores are fractions in [0, 1].
 */
export const DEFAULT_ROUTING_THRESHOLD = 0.8;

/** Per-field confidence a checked field needs to count as passed. */
export const DEFAULT_FIELD_THRESHOLD = 0.8;

/** ToolError outcomes tolerated before manual review is forced. 0 means any. */
export const DEFAULT_MAX_TOOL_ERRORS = 0;

export const DEFAULT_TOOL_MAX_RETRIES = 2;
export const DEFAULT_TOOL_RETRY_BASE_MS = 250;

export type DecisionPolicy = {
  routingThreshold: number;
  fieldThreshold: number;
  maxToolErrors: number;
};

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
};

export type PipelineSettings = {
  policy: DecisionPolicy;
  toolRetry: RetryPolicy;
  supplierLookupFallback: boolean;
};

export const DEFAULT_DECISION_POLICY: DecisionPolicy = {
  routingThreshold: DEFAULT_ROUTING_THRESHOLD,
  fieldThreshold: DEFAULT_FIELD_THRESHOLD,
  maxToolErrors: DEFAULT_MAX_TOOL_ERRORS,
};

export function getPipelineSettings(): PipelineSettings {
  return {
    policy: {
      routingThreshold: config.PIPELINE_ROUTING_THRESHOLD,
      fieldThreshold: config.PIPELINE_FIELD_THRESHOLD,
      maxToolErrors: config.PIPELINE_MAX_TOOL_ERRORS,
    },
    toolRetry: {
      maxRetries: config.ERP_TOOL_MAX_RETRIES,
      baseDelayMs: config.ERP_TOOL_RETRY_BASE_MS,
    },
    supplierLookupFallback: config.PIPELINE_SUPPLIER_LOOKUP_FALLBACK === 'true',
  };
}
