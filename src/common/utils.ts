/**
 * Delay utility for async operations
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(resolve, ms);
    timer.unref(); // Prevent Jest hanging
  });
}

/**
 * Round to two decimal digits
 */
export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Zero-padded ordinal used in node identifiers and hostnames (1 -> "001")
 */
export function formatOrdinal(ordinal: number): string {
  return String(ordinal).padStart(3, '0');
}
