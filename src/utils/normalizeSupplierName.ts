const LEGAL_FORM_SUFFIXES = [
  ' sas',
  ' sasu',
  ' sarl',
  ' eurl',
  ' sa',
  ' snc',
  ' gmbh',
  ' ag',
  ' bv',
  ' nv',
  ' ltd',
  ' limited',
  ' plc',
  ' inc',
  ' llc',
  ' industries',
  ' group',
];

/**
 * Lower-cases, strips punctuation and accents, and drops one trailing legal form
 * so "Fournitures Dupont S.A.R.L." and "fournitures dupont" compare equal.
 */
export function normalizeSupplierName(name: string): string {
  if (!name) return '';

  let normalized = name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();

  normalized = normalized.replace(/[.,']/g, '');
  normalized = normalized.replace(/\s+/g, ' ').trim();

  if (normalized.startsWith('the ')) {
    normalized = normalized.slice(4).trim();
  }

  for (const suffix of LEGAL_FORM_SUFFIXES) {
    if (normalized.endsWith(suffix)) {
      normalized = normalized.slice(0, -suffix.length).trim();
      break;
    }
  }

  return normalized;
}
