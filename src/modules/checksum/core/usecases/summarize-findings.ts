import type { ChecksumFinding, FindingsSummary } from '../types.js';

export const summarizeFindings = (findings: readonly ChecksumFinding[]): FindingsSummary => {
  const summary: FindingsSummary = { consistent: 0, discrepancy: 0, unverifiable: 0, total: 0 };
  for (const finding of findings) {
    summary[finding.status] += 1;
    summary.total += 1;
  }
  return summary;
};
