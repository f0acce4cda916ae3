import { query } from '../infrastructure/db';
import type {
  AggregatedConfidence,
  ExtractedInvoice,
  PipelineRun,
  RoutingDecision,
  RunStatus,
  StateTransition,
  SupplierCandidate,
  TerminalResult,
  VerificationOutcome,
} from '../services/pipeline/types';

export type SaveGuard = {
  /** Revision the row must still hold; the write is dropped otherwise. */
  expectedRevision: number;
  /** Also drop the write when a cancel request has landed. */
  unlessCancelRequested?: boolean;
};

export type ListRunsParams = {
  offset: number;
  limit: number;
  status?: RunStatus;
};

/**
 * Durable home of pipeline runs. Only the orchestrator writes run state;
 * the API may only raise the cancel flag.
 */
export interface PipelineRunStore {
  create(run: PipelineRun): Promise<void>;
  /**
   * Persists everything except `cancelRequested`, which only `requestCancel` sets.
   * Returns false, writing nothing, when the guard no longer holds.
   */
  save(run: PipelineRun, guard: SaveGuard): Promise<boolean>;
  findById(id: string): Promise<PipelineRun | null>;
  isCancelRequested(id: string): Promise<boolean>;
  /** Raises the flag when the run is still in `cancellableStatuses`; null otherwise. */
  requestCancel(id: string, cancellableStatuses: readonly RunStatus[]): Promise<PipelineRun | null>;
  list(params: ListRunsParams): Promise<{ runs: PipelineRun[]; total: number }>;
  /** Runs not archived whose last update is older than `olderThan`. */
  findStale(params: { olderThan: Date; limit: number }): Promise<PipelineRun[]>;
}

type PipelineRunRow = {
  id: string;
  status: RunStatus;
  document_ref: string | null;
  invoice: ExtractedInvoice;
  outcomes: VerificationOutcome[];
  supplier_candidates: SupplierCandidate[];
  aggregate: AggregatedConfidence | null;
  decision: RoutingDecision | null;
  result: TerminalResult | null;
  idempotency_key: string;
  cancel_requested: boolean;
  revision: number;
  history: StateTransition[];
  notified_at: Date | null;
  archived_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const toIso = (d: Date | null) => (d ? d.toISOString() : null);

function toRun(row: PipelineRunRow): PipelineRun {
  return {
    id: row.id,
    status: row.status,
    documentRef: row.document_ref,
    invoice: row.invoice,
    outcomes: row.outcomes,
    supplierCandidates: row.supplier_candidates,
    aggregate: row.aggregate,
    decision: row.decision,
    result: row.result,
    idempotencyKey: row.idempotency_key,
    cancelRequested: row.cancel_requested,
    revision: row.revision,
    history: row.history,
    notifiedAt: toIso(row.notified_at),
    archivedAt: toIso(row.archived_at),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

// JSONB parameters go over the wire as text; node-postgres would send JS arrays as Postgres arrays.
const json = (value: unknown) => (value === null ? null : JSON.stringify(value));

export const pipelineRunRepository: PipelineRunStore = {
  async create(run) {
    await query(
      `INSERT INTO pipeline_runs (
         id, status, document_ref, invoice, outcomes, supplier_candidates, aggregate, decision, result,
         idempotency_key, cancel_requested, revision, history, notified_at, archived_at, created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)`,
      [
        run.id,
        run.status,
        run.documentRef,
        json(run.invoice),
        json(run.outcomes),
        json(run.supplierCandidates),
        json(run.aggregate),
        json(run.decision),
        json(run.result),
        run.idempotencyKey,
        run.cancelRequested,
        run.revision,
        json(run.history),
        run.notifiedAt,
        run.archivedAt,
        run.createdAt,
        run.updatedAt,
      ],
    );
  },

  async save(run, guard) {
    const cancelClause = guard.unlessCancelRequested ? ' AND cancel_requested = FALSE' : '';
    const { rowCount } = await query(
      `UPDATE pipeline_runs SET
         status = $2, outcomes = $3, supplier_candidates = $4, aggregate = $5, decision = $6,
         result = $7, history = $8, notified_at = $9, archived_at = $10, updated_at = $11, revision = $12
       WHERE id = $1 AND revision = $13${cancelClause}`,
      [
        run.id,
        run.status,
        json(run.outcomes),
        json(run.supplierCandidates),
        json(run.aggregate),
        json(run.decision),
        json(run.result),
        json(run.history),
        run.notifiedAt,
        run.archivedAt,
        run.updatedAt,
        run.revision,
        guard.expectedRevision,
      ],
    );
    return rowCount === 1;
  },

  async findById(id) {
    const { rows } = await query<PipelineRunRow>('SELECT * FROM pipeline_runs WHERE id = $1', [id]);
    return rows[0] ? toRun(rows[0]) : null;
  },

  async isCancelRequested(id) {
    const { rows } = await query<{ cancel_requested: boolean }>(
      'SELECT cancel_requested FROM pipeline_runs WHERE id = $1',
      [id],
    );
    return rows[0]?.cancel_requested ?? false;
  },

  async requestCancel(id, cancellableStatuses) {
    const { rows } = await query<PipelineRunRow>(
      `UPDATE pipeline_runs SET cancel_requested = TRUE, updated_at = NOW()
       WHERE id = $1 AND status = ANY($2::text[])
       RETURNING *`,
      [id, [...cancellableStatuses]],
    );
    return rows[0] ? toRun(rows[0]) : null;
  },

  async list({ offset, limit, status }) {
    const where = status ? 'WHERE status = $1' : '';
    const filterParams = status ? [status] : [];

    const [page, count] = await Promise.all([
      query<PipelineRunRow>(
        `SELECT * FROM pipeline_runs ${where}
         ORDER BY created_at DESC, id
         LIMIT $${filterParams.length + 1} OFFSET $${filterParams.length + 2}`,
        [...filterParams, limit, offset],
      ),
      query<{ total: string }>(`SELECT COUNT(*) AS total FROM pipeline_runs ${where}`, filterParams),
    ]);

    return { runs: page.rows.map(toRun), total: Number(count.rows[0]?.total ?? 0) };
  },

  async findStale({ olderThan, limit }) {
    const { rows } = await query<PipelineRunRow>(
      `SELECT * FROM pipeline_runs
       WHERE archived_at IS NULL AND updated_at < $1
       ORDER BY updated_at ASC
       LIMIT $2`,
      [olderThan.toISOString(), limit],
    );
    return rows.map(toRun);
  },
};
