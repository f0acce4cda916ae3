import { randomUUID } from 'crypto';
import { query } from '../infrastructure/db';

export type ReviewNotification = {
  runId: string;
  outcome: 'Reject' | 'ManualReview';
  invoiceNumber: string | null;
  supplierName: string | null;
  message: string;
  reasons: string[];
  requiresManualReview: boolean;
};

export type StoredNotification = ReviewNotification & {
  id: string;
  createdAt: string;
};

export interface NotificationStore {
  /** At most one notification per run; a second insert returns the first with `created: false`. */
  insertOnce(notification: ReviewNotification): Promise<{ notification: StoredNotification; created: boolean }>;
  list(params: { offset: number; limit: number }): Promise<{ notifications: StoredNotification[]; total: number }>;
}

type NotificationRow = {
  id: string;
  run_id: string;
  outcome: ReviewNotification['outcome'];
  invoice_number: string | null;
  supplier_name: string | null;
  message: string;
  reasons: string[];
  requires_manual_review: boolean;
  created_at: Date;
};

function toNotification(row: NotificationRow): StoredNotification {
  return {
    id: row.id,
    runId: row.run_id,
    outcome: row.outcome,
    invoiceNumber: row.invoice_number,
    supplierName: row.supplier_name,
    message: row.message,
    reasons: row.reasons,
    requiresManualReview: row.requires_manual_review,
    createdAt: row.created_at.toISOString(),
  };
}

export const notificationRepository: NotificationStore = {
  async insertOnce(n) {
    const inserted = await query<NotificationRow>(
      `INSERT INTO user_notifications
         (id, run_id, outcome, invoice_number, supplier_name, message, reasons, requires_manual_review)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (run_id) DO NOTHING
       RETURNING *`,
      [
        randomUUID(),
        n.runId,
        n.outcome,
        n.invoiceNumber,
        n.supplierName,
        n.message,
        JSON.stringify(n.reasons),
        n.requiresManualReview,
      ],
    );
    if (inserted.rows[0]) {
      return { notification: toNotification(inserted.rows[0]), created: true };
    }

    const existing = await query<NotificationRow>('SELECT * FROM user_notifications WHERE run_id = $1', [n.runId]);
    if (!existing.rows[0]) {
      throw new Error(`Notification for run ${n.runId} conflicted but could not be read back`);
    }
    return { notification: toNotification(existing.rows[0]), created: false };
  },

  async list({ offset, limit }) {
    const [page, count] = await Promise.all([
      query<NotificationRow>(
        'SELECT * FROM user_notifications ORDER BY created_at DESC, id LIMIT $1 OFFSET $2',
        [limit, offset],
      ),
      query<{ total: string }>('SELECT COUNT(*) AS total FROM user_notifications'),
    ]);
    return { notifications: page.rows.map(toNotification), total: Number(count.rows[0]?.total ?? 0) };
  },
};
