import { PersonDiffReport } from "../types/report";

export function formatReport(reports: PersonDiffReport[]): string {
  if (reports.length === 0) return "No profile changes.";

  const lines: string[] = [];
  for (const report of reports) {
    lines.push(report.personName);
    for (const diff of report.diffs) {
      lines.push(`  ${diff.fieldName}:`);
      for (const value of diff.removed) lines.push(`    - ${value}`);
      for (const value of diff.added) lines.push(`    + ${value}`);
    }
  }
  return lines.join("\n");
}
