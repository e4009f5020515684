import path from "node:path";
import pc from "picocolors";
import type { MoveReport } from "../core/move.js";
import type { FileOutcome, RunReport } from "../core/rename.js";

const RULE =
  "------------------------------------------------------------------";

export function describeOutcome(o: FileOutcome): string {
  switch (o.status) {
    case "renamed": {
      const to = path.basename(o.to);
      return o.dryRun
        ? `  [DRY RUN] Would rename to: '${to}'`
        : `  Renamed '${o.file}' to '${to}'`;
    }
    case "already-correct":
      return `  '${o.file}' already has the desired name. No change needed.`;
    case "no-name":
      return `  Could not determine a new name for '${o.file}'. Skipping.`;
    case "invalid-name":
      return `  Generated name '${o.name}' for '${o.file}' contains unsupported characters. Skipping.`;
    case "unreadable":
      return `  Skipping '${o.file}' due to extraction error (${o.kind}).`;
    case "failed":
      return `  [ERROR] ${o.message}`;
  }
}

function colorFor(o: FileOutcome): (s: string) => string {
  if (o.status === "renamed") return pc.green;
  if (o.status === "failed") return pc.red;
  if (o.status === "already-correct") return pc.dim;
  return pc.yellow;
}

export function printHeader(folder: string, dryRun: boolean) {
  console.log(
    `\n${dryRun ? "[DRY RUN] " : ""}Processing PDFs in: '${folder}'`,
  );
  console.log(RULE);
}

export function printStart(file: string) {
  console.log(`\nProcessing '${file}'...`);
}

export function printOutcome(o: FileOutcome) {
  const line = describeOutcome(o);
  if (o.status === "failed") console.error(colorFor(o)(line));
  else console.log(colorFor(o)(line));
}

export function printSummary({ summary, dryRun }: RunReport) {
  const tag = dryRun ? "[DRY RUN] " : "";
  console.log(`\n${RULE}`);
  console.log("Summary:");
  console.log(`  Total PDFs found: ${summary.found}`);
  console.log(
    `  ${tag}Files ${dryRun ? "would be " : ""}renamed: ${summary.renamed}`,
  );
  console.log(`  Files skipped/errors: ${summary.skipped + summary.failed}`);
  if (dryRun) {
    console.log("\nThis was a DRY RUN. No files were actually renamed.");
  }
}

export function printMoveReport(report: MoveReport) {
  console.log(
    pc.green(
      `Moved ${report.moved.length} PDF file(s) to '${report.destination}'.`,
    ),
  );
  if (report.failed.length) {
    console.error(pc.red(`  ${report.failed.length} file(s) could not be moved.`));
  }
}
