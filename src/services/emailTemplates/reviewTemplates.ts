import type { ReviewNotification } from '../../repositories/notificationRepository';

const escapeHtml = (text: string): string => {
  const map: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#039;',
  };
  return text.replace(/[&<>"']/g, (m) => map[m] ?? m);
};

const OUTCOME_LABEL: Record<ReviewNotification['outcome'], string> = {
  Reject: 'Rejected',
  ManualReview: 'Manual review required',
};

export const buildReviewEmail = (notification: ReviewNotification) => {
  const label = OUTCOME_LABEL[notification.outcome];
  const invoiceLabel = notification.invoiceNumber ?? 'unknown invoice';
  const supplierLabel = notification.supplierName ?? 'unknown supplier';
  const subject = `${label}: invoice ${invoiceLabel} (${supplierLabel})`;

  const reasonItems = notification.reasons
    .map((r) => `<li style="margin: 0 0 6px 0;">${escapeHtml(r)}</li>`)
    .join('');

  const html = `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(subject)}</title>
</head>
<body style="margin: 0; padding: 24px; background-color: #f2f2f5; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Helvetica, Arial, sans-serif;">
  <table width="600" border="0" cellpadding="0" cellspacing="0" style="background-color: #ffffff; border-radius: 16px; max-width: 600px; width: 100%;">
    <tr>
      <td style="padding: 32px;">
        <h1 style="font-size: 20px; margin: 0 0 12px 0; color: #1c1c1e;">${escapeHtml(label)}</h1>
        <p style="font-size: 15px; color: #3a3a3c; margin: 0 0 16px 0;">${escapeHtml(notification.message)}</p>
        <p style="font-size: 13px; color: #8e8e93; margin: 0 0 8px 0;">Invoice ${escapeHtml(invoiceLabel)} from ${escapeHtml(supplierLabel)}</p>
        <ul style="font-size: 14px; color: #3a3a3c; padding-left: 20px;">${reasonItems}</ul>
        <p style="font-size: 12px; color: #8e8e93; margin: 24px 0 0 0;">Run ${escapeHtml(notification.runId)}</p>
      </td>
    </tr>
  </table>
</body>
</html>`;

  const text = [
    label,
    '',
    notification.message,
    `Invoice ${invoiceLabel} from ${supplierLabel}`,
    '',
    ...notification.reasons.map((r) => `- ${r}`),
    '',
    `Run ${notification.runId}`,
  ].join('\n');

  return { subject, html, text };
};
