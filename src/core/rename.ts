import fs from "node:fs/promises";
import path from "node:path";
import {
  ExtractionError,
  FolderNotFoundError,
  errorMessage,
  type ExtractionFailure,
} from "./errors.js";
import { createExtractor, type TextExtractor } from "./extract.js";
import {
  listPdfFiles,
  pathExists,
  renameFile,
  resolveCollision,
  type IsTaken,
} from "./files.js";
import type { NameStrategy } from "./strategies.js";
import { isValidFilename } from "./utils.js";

export type FileOutcome =
  | { status: "renamed"; file: string; from: string; to: string; dryRun: boolean }
  | { status: "already-correct"; file: string; path: string }
  | { status: "no-name"; file: string }
  | { status: "invalid-name"; file: string; name: string }
  | { status: "unreadable"; file: string; kind: ExtractionFailure; message: string }
  | { status: "failed"; file: string; target: string; message: string };

export type RunSummary = {
  found: number;
  renamed: number;
  skipped: number;
  failed: number;
};

export type RunReport = {
  folder: string;
  dryRun: boolean;
  outcomes: FileOutcome[];
  summary: RunSummary;
};

export type RenameOptions = {
  strategy: NameStrategy;
  dryRun: boolean;
  /** Defaults to the pdf.js extractor reading the first 6 pages. */
  extract?: TextExtractor;
  /** Called with the file name before it is read. */
  onStart?: (file: string) => void;
  onOutcome?: (outcome: FileOutcome) => void;
};

/**
 * Where `originalPath` should go given a candidate base name. The original's
 * extension is kept; the file's own current path never counts as a collision,
 * so a result equal to `originalPath` means no rename is needed.
 */
export function planRename(
  originalPath: string,
  candidateBase: string,
  isTaken: IsTaken = pathExists,
): Promise<string> {
  const original = path.resolve(originalPath);
  return resolveCollision(
    path.dirname(original),
    candidateBase,
    path.extname(original),
    async (p) => p !== original && (await isTaken(p)),
  );
}

/**
 * Paths claimed or vacated by earlier renames in the same run. Consulted before
 * the disk so a dry run predicts the suffixes a live run would produce.
 */
export class RunLedger {
  private readonly claimed = new Set<string>();
  private readonly vacated = new Set<string>();

  readonly isTaken: IsTaken = async (p) => {
    if (this.claimed.has(p)) return true;
    if (this.vacated.has(p)) return false;
    return pathExists(p);
  };

  claim(p: string) {
    this.claimed.add(p);
    this.vacated.delete(p);
  }

  move(from: string, to: string) {
    this.claimed.delete(from);
    this.vacated.add(from);
    this.claim(to);
  }
}

export function summarize(outcomes: FileOutcome[]): RunSummary {
  const summary: RunSummary = {
    found: outcomes.length,
    renamed: 0,
    skipped: 0,
    failed: 0,
  };
  for (const o of outcomes) {
    if (o.status === "renamed") summary.renamed++;
    else if (o.status === "failed") summary.failed++;
    else summary.skipped++;
  }
  return summary;
}

async function processFile(
  filePath: string,
  options: RenameOptions & { extract: TextExtractor },
  ledger: RunLedger,
): Promise<FileOutcome> {
  const file = path.basename(filePath);

  let text: string;
  try {
    text = await options.extract(filePath);
  } catch (err) {
    return {
      status: "unreadable",
      file,
      kind: err instanceof ExtractionError ? err.kind : "unreadable",
      message: errorMessage(err),
    };
  }

  let name: string | null;
  try {
    name = await options.strategy.deriveName(text);
  } catch (err) {
    console.error(`  [ERROR] Naming '${file}' failed: ${errorMessage(err)}`);
    name = null;
  }
  if (!name) return { status: "no-name", file };
  if (options.strategy.strictCharset && !isValidFilename(name)) {
    return { status: "invalid-name", file, name };
  }

  const target = await planRename(filePath, name, ledger.isTaken);
  if (target === filePath) {
    ledger.claim(filePath);
    return { status: "already-correct", file, path: filePath };
  }

  if (!options.dryRun) {
    try {
      await renameFile(filePath, target);
    } catch (err) {
      return { status: "failed", file, target, message: errorMessage(err) };
    }
  }

  ledger.move(filePath, target);
  return {
    status: "renamed",
    file,
    from: filePath,
    to: target,
    dryRun: options.dryRun,
  };
}

/**
 * Derive a name for every PDF in `folder` and rename it, or in dry-run mode
 * only report what would happen. One file's failure never stops the run.
 */
export async function renameFolder(
  folder: string,
  options: RenameOptions,
): Promise<RunReport> {
  const dir = path.resolve(folder);
  const stat = await fs.stat(dir).catch(() => null);
  if (!stat?.isDirectory()) throw new FolderNotFoundError(folder);

  const extract = options.extract ?? createExtractor({ maxPages: 6 });
  const ledger = new RunLedger();
  const outcomes: FileOutcome[] = [];

  for (const name of await listPdfFiles(dir)) {
    options.onStart?.(name);
    const outcome = await processFile(
      path.join(dir, name),
      { ...options, extract },
      ledger,
    );
    outcomes.push(outcome);
    options.onOutcome?.(outcome);
  }

  return {
    folder: dir,
    dryRun: options.dryRun,
    outcomes,
    summary: summarize(outcomes),
  };
}
