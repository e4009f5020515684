import { moveFiles } from "../core/move.js";
import { renameFolder, type RunReport } from "../core/rename.js";
import type { TextExtractor } from "../core/extract.js";
import type { NameStrategy } from "../core/strategies.js";
import { errorMessage } from "../core/errors.js";
import {
  printHeader,
  printMoveReport,
  printOutcome,
  printStart,
  printSummary,
} from "./report.js";

export interface Prompter {
  ask(question: string): Promise<string>;
}

export type SessionDeps = {
  strategy: NameStrategy;
  extract: TextExtractor;
};

async function confirm(
  prompter: Prompter,
  question: string,
  fallback: boolean,
): Promise<boolean> {
  const answer = (await prompter.ask(question)).trim().toLowerCase();
  if (answer === "y") return true;
  if (answer === "n") return false;
  return fallback;
}

async function run(
  folder: string,
  dryRun: boolean,
  deps: SessionDeps,
): Promise<RunReport | null> {
  printHeader(folder, dryRun);
  try {
    const report = await renameFolder(folder, {
      strategy: deps.strategy,
      extract: deps.extract,
      dryRun,
      onStart: printStart,
      onOutcome: printOutcome,
    });
    printSummary(report);
    return report;
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * The interactive flow: pick a folder, optionally preview, rename, then
 * optionally move the results elsewhere.
 */
export async function runSession(
  prompter: Prompter,
  deps: SessionDeps,
): Promise<void> {
  const folder = (
    await prompter.ask("Enter the folder path containing the PDF files: ")
  ).trim();

  const dryRun = await confirm(
    prompter,
    "Perform a dry run first? (y/n, default 'y'): ",
    true,
  );

  const first = await run(folder, dryRun, deps);
  if (!first) return;

  if (dryRun) {
    const proceed = await confirm(
      prompter,
      "\nReview the dry run output. Do you want to proceed with actual renaming? (y/n): ",
      false,
    );
    if (!proceed) {
      console.log("Operation cancelled. No files were renamed.");
      return;
    }
    console.log("\nStarting actual renaming...");
    if (!(await run(folder, false, deps))) return;
  }

  const move = await confirm(
    prompter,
    "\nMove the renamed files to a different folder? (y/n, default 'n'): ",
    false,
  );
  if (!move) return;

  const destination = (
    await prompter.ask("Enter the destination folder path: ")
  ).trim();
  try {
    printMoveReport(await moveFiles(folder, destination));
  } catch (err) {
    console.error(`  [ERROR] ${errorMessage(err)}`);
  }
}
