import type { AuditPass, Discrepancy } from "./types.js";

/**
 * First line of a failed pass's report.
 */
export function failureHeader(count: number): string {
  return count === 1 ? "There was 1 failure:" : `There were ${count} failures:`;
}

/**
 * Format a pass's discrepancies as one report, one line per discrepancy.
 */
export function formatFailures(discrepancies: readonly Discrepancy[]): string {
  return [failureHeader(discrepancies.length), ...discrepancies.map(d => d.message)].join("\n");
}

/**
 * Raised when a pass reports at least one discrepancy.
 */
export class CoverageCheckError extends Error {
  constructor(
    readonly pass: AuditPass,
    readonly discrepancies: readonly Discrepancy[]
  ) {
    super(formatFailures(discrepancies));
    this.name = "CoverageCheckError";
  }
}

/**
 * Succeed silently when the pass is clean, otherwise throw the itemized report.
 */
export function assertNoFailures(pass: AuditPass, discrepancies: readonly Discrepancy[]): void {
  if (discrepancies.length > 0) {
    throw new CoverageCheckError(pass, discrepancies);
  }
}
