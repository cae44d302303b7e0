/**
 * Object key helpers.
 */

const CONTENT_TYPES: Record<string, string> = {
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  xls: 'application/vnd.ms-excel',
  csv: 'text/csv',
  json: 'application/json',
  txt: 'text/plain',
  html: 'text/html',
  pdf: 'application/pdf',
  png: 'image/png',
  zip: 'application/zip',
  gz: 'application/gzip',
};

/**
 * Infer content type from the key's extension.
 * Falls back to application/octet-stream for unknown types.
 */
export function inferContentType(key: string): string {
  const base = key.split('/').pop() ?? key;
  if (!base.includes('.')) return 'application/octet-stream';
  const ext = base.split('.').pop()?.toLowerCase();
  const type = ext ? CONTENT_TYPES[ext] : undefined;
  return type ?? 'application/octet-stream';
}

/**
 * Build an object key from a prefix and a file name.
 * Normalizes path separators and strips leading and repeated slashes.
 *
 * @example
 * ```ts
 * buildDestination('reports/', '/2024\\report.xlsx'); // 'reports/2024/report.xlsx'
 * ```
 */
export function buildDestination(prefix: string, fileName: string): string {
  const normalize = (part: string): string =>
    part.replace(/\\/g, '/').replace(/\/{2,}/g, '/').replace(/^\/+/, '').replace(/\/+$/, '');

  const name = normalize(fileName);
  if (!name) {
    throw new Error('fileName must not be empty');
  }
  const base = normalize(prefix);
  return base ? `${base}/${name}` : name;
}
