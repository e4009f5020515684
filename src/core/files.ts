import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { RenameError, errorMessage } from "./errors.js";
import { isPdfName } from "./utils.js";

export type IsTaken = (candidatePath: string) => Promise<boolean>;

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/** PDFs directly inside `folder` (case-insensitive extension), sorted by name. */
export async function listPdfFiles(folder: string): Promise<string[]> {
  const entries = await fs.readdir(folder, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && isPdfName(e.name))
    .map((e) => e.name)
    .sort();
}

/** `dir/base.ext`, or the first of `dir/base_1.ext`, `dir/base_2.ext`, … that is free. */
export async function resolveCollision(
  dir: string,
  base: string,
  ext: string,
  isTaken: IsTaken,
): Promise<string> {
  let candidate = path.join(dir, `${base}${ext}`);
  let counter = 1;
  while (await isTaken(candidate)) {
    candidate = path.join(dir, `${base}_${counter}${ext}`);
    counter++;
  }
  return candidate;
}

function isCrossDevice(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EXDEV";
}

/**
 * Rename `from` to `to`. Across filesystems this becomes copy-then-unlink, and
 * the copy refuses to replace an existing file.
 */
export async function renameFile(from: string, to: string): Promise<void> {
  const fail = (err: unknown) =>
    new RenameError(
      `Failed to rename '${path.basename(from)}' to '${path.basename(to)}': ${errorMessage(err)}`,
      from,
      to,
    );

  try {
    await fs.rename(from, to);
  } catch (err) {
    if (!isCrossDevice(err)) throw fail(err);
    try {
      await fs.copyFile(from, to, constants.COPYFILE_EXCL);
      await fs.unlink(from);
    } catch (copyErr) {
      throw fail(copyErr);
    }
  }
}
