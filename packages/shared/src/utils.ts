// Text utilities

/**
 * Trim and collapse internal runs of whitespace to a single space.
 */
export const collapseWhitespace = (value: string): string => {
  return value.replace(/\s+/g, ' ').trim();
};

/**
 * Case-folded, whitespace-normalized form used for grouping and dedup keys.
 */
export const foldText = (value: string | null | undefined): string => {
  if (value === null || value === undefined) return '';
  return collapseWhitespace(value.normalize('NFKC')).toLowerCase();
};

// Ordinal comparison, independent of the host locale
export const compareKeys = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

// File size utilities
export const formatFileSize = (bytes: number): string => {
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  if (bytes === 0) return '0 Bytes';
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)));
  return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
};
