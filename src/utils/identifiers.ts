// Reference-data identifiers are compared in a canonical spelling:
// no internal whitespace, upper case.

export function normalizeTaxId(value: string): string {
  return value.replace(/[\s.-]+/g, '').toUpperCase();
}

export function normalizeAccountNumber(value: string): string {
  return value.replace(/\s+/g, '').toUpperCase();
}

export function normalizeRoutingCode(value: string): string {
  return value.trim().toUpperCase();
}

/** Keeps the last four characters of an account number for reports and logs. */
export function maskAccountNumber(value: string): string {
  const compact = normalizeAccountNumber(value);
  if (compact.length <= 4) return '****';
  return `${'*'.repeat(compact.length - 4)}${compact.slice(-4)}`;
}
