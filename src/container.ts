import { config } from './config/env';
import { getPipelineSettings } from './config/pipeline';
import { logger } from './infrastructure/logger';
import { pipelineRunRepository } from './repositories/pipelineRunRepository';
import { ErpToolClient } from './services/erp/ErpToolClient';
import { HttpErpToolTransport } from './services/erp/httpToolTransport';
import { InvoicePipelineService } from './services/InvoicePipelineService';
import { notificationService } from './services/notificationService';
import { pipelineQueue } from './services/PipelineQueueService';
import { PipelineOrchestrator } from './services/pipeline/PipelineOrchestrator';

/** Production wiring. Tests build their own graph from in-process stand-ins. */
export function createContainer() {
  const tools = new ErpToolClient(
    new HttpErpToolTransport({
      baseUrl: config.ERP_TOOLS_URL,
      timeoutMs: config.ERP_TOOL_TIMEOUT_MS,
      apiKey: config.ERP_TOOLS_API_KEY,
    }),
  );

  const orchestrator = new PipelineOrchestrator({
    store: pipelineRunRepository,
    tools,
    notifier: notificationService,
    settings: getPipelineSettings(),
    logger,
  });

  const pipeline = new InvoicePipelineService({
    orchestrator,
    dispatcher: pipelineQueue,
    store: pipelineRunRepository,
    logger,
  });

  return { orchestrator, pipeline, notifications: notificationService };
}
