/**
 * Safe number formatting utilities
 * Metrics can be null (undefined AUC, untestable association) or non-finite; print 'N/A' for those
 */

/**
 * Safely format a number to fixed decimal places
 */
export function safeToFixed(value: number | null | undefined, decimals: number = 3): string {
  if (value === null || value === undefined || !isFinite(value)) {
    return 'N/A';
  }
  return value.toFixed(decimals);
}

/**
 * p-values below 0.001 print as "<0.001"
 */
export function safeFormatPValue(value: number | null | undefined): string {
  if (value === null || value === undefined || !isFinite(value)) {
    return 'N/A';
  }
  return value < 0.001 ? '<0.001' : value.toFixed(3);
}

export function padRight(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}
