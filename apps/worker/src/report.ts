import type { VerificationReport } from "@sku-lookup/catalog";

export function formatReport(report: VerificationReport): string {
  const lines: string[] = [];

  for (const comparison of report.comparisons) {
    if (!comparison.hasMismatches) {
      continue;
    }
    lines.push(`SKU ${comparison.sku}`);
    for (const mismatch of comparison.mismatches) {
      const reason = mismatch.reason ? ` (${mismatch.reason})` : "";
      lines.push(`  ${mismatch.field}: expected "${mismatch.expected}", got "${mismatch.actual}"${reason}`);
    }
  }

  lines.push(`${report.matched}/${report.checked} records match`);
  return lines.join("\n");
}
