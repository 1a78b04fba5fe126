import type { MatchClassCounts, RunIssue } from "./model.ts";

export interface RunSummary {
  runId: string;
  mode: string;
  sop: string;
  startedAt: string;
  completedAt: string;
  inputs: Record<string, string>;
  rowsWritten: number;
  matchCounts?: MatchClassCounts;
  changeCount?: number;
  suggestedCount?: number;
  unmatchedCount?: number;
  unusedCount?: number;
  mappedCount?: number;
  issues: RunIssue[];
  outputs: string[];
}

function formatIssue(issue: RunIssue): string {
  const rowKey = issue.rowKey.length > 0 ? ` [${issue.rowKey}]` : "";
  return `  - ${issue.code}${rowKey}: ${issue.detail}`;
}

export function formatRunSummaryReport(summary: RunSummary): string {
  const lines: string[] = [
    "[Run Summary]",
    `Run ID: ${summary.runId}`,
    `Mode: ${summary.mode}`,
    `SOP: ${summary.sop}`,
    `Started At: ${summary.startedAt}`,
    `Completed At: ${summary.completedAt}`
  ];

  const inputNames = Object.keys(summary.inputs).sort((left, right) => left.localeCompare(right));
  if (inputNames.length === 0) {
    lines.push("Inputs: none");
  } else {
    lines.push("Inputs:");
    for (const name of inputNames) {
      lines.push(`  ${name}: ${summary.inputs[name] ?? ""}`);
    }
  }

  lines.push(`Rows Written: ${summary.rowsWritten}`);

  if (summary.matchCounts) {
    const counts = summary.matchCounts;
    lines.push(`Match Classes: M=${counts.M} NON_M=${counts.NON_M} NONE=${counts.NONE}`);
  }
  if (summary.changeCount !== undefined) {
    lines.push(`Changes: ${summary.changeCount}`);
  }
  if (summary.suggestedCount !== undefined) {
    lines.push(`Steps With Suggestions: ${summary.suggestedCount}`);
  }
  if (summary.unmatchedCount !== undefined) {
    lines.push(`Steps Without Suggestions: ${summary.unmatchedCount}`);
  }
  if (summary.unusedCount !== undefined) {
    lines.push(`Unused Narration Entries: ${summary.unusedCount}`);
  }
  if (summary.mappedCount !== undefined) {
    lines.push(`Steps Mapped: ${summary.mappedCount}`);
  }

  if (summary.issues.length === 0) {
    lines.push("Issues: none");
  } else {
    lines.push(`Issues (${summary.issues.length}):`);
    lines.push(...summary.issues.map((issue) => formatIssue(issue)));
  }

  lines.push("Outputs:");
  lines.push(...summary.outputs.map((output) => `  - ${output}`));

  return `${lines.join("\n")}\n`;
}
