import fs from "node:fs/promises";
import path from "node:path";
import { MoveError, errorMessage } from "./errors.js";
import {
  listPdfFiles,
  pathExists,
  renameFile,
  resolveCollision,
} from "./files.js";

export type MoveReport = {
  destination: string;
  moved: Array<{ from: string; to: string }>;
  failed: Array<{ file: string; message: string }>;
};

/**
 * Move every PDF in `source` into `destination`, creating it if needed. Names
 * already taken in the destination get a `_1`, `_2`, … suffix. Individual
 * failures are collected and the rest still move.
 */
export async function moveFiles(
  source: string,
  destination: string,
): Promise<MoveReport> {
  const src = path.resolve(source);
  const dest = path.resolve(destination);
  if (src === dest) {
    throw new MoveError(`Source and destination are the same folder: '${dest}'`);
  }

  if (!(await pathExists(dest))) {
    try {
      await fs.mkdir(dest, { recursive: true });
      console.log(`Created destination folder: '${dest}'`);
    } catch (err) {
      throw new MoveError(
        `Failed to create destination folder '${dest}': ${errorMessage(err)}`,
      );
    }
  }

  const report: MoveReport = { destination: dest, moved: [], failed: [] };

  for (const file of await listPdfFiles(src)) {
    const from = path.join(src, file);
    const ext = path.extname(file);
    try {
      const to = await resolveCollision(
        dest,
        path.basename(file, ext),
        ext,
        pathExists,
      );
      await renameFile(from, to);
      report.moved.push({ from, to });
    } catch (err) {
      console.error(`  [ERROR] Failed to move '${file}': ${errorMessage(err)}`);
      report.failed.push({ file, message: errorMessage(err) });
    }
  }

  return report;
}
