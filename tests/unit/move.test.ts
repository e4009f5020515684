import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MoveError } from "../../src/core/errors.js";
import { moveFiles } from "../../src/core/move.js";
import { listNames, makeTempDir } from "../helpers/pdf.js";

let root: string;
let source: string;

beforeEach(async () => {
  root = await makeTempDir();
  source = path.join(root, "inbox");
  await fs.mkdir(source);
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

async function touch(dir: string, ...names: string[]) {
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), name);
  }
}

describe("moveFiles", () => {
  it("creates the destination and moves only PDFs", async () => {
    await touch(source, "a.pdf", "B.PDF", "keep.txt");
    const destination = path.join(root, "done", "2024");

    const report = await moveFiles(source, destination);

    expect(await listNames(destination)).toEqual(["B.PDF", "a.pdf"]);
    expect(await listNames(source)).toEqual(["keep.txt"]);
    expect(report.destination).toBe(destination);
    expect(report.moved).toHaveLength(2);
    expect(report.failed).toEqual([]);
  });

  it("suffixes names already present in the destination", async () => {
    const destination = path.join(root, "done");
    await fs.mkdir(destination);
    await touch(destination, "Report.pdf", "Report_1.pdf");
    await touch(source, "Report.pdf");

    const report = await moveFiles(source, destination);

    expect(report.moved).toEqual([
      {
        from: path.join(source, "Report.pdf"),
        to: path.join(destination, "Report_2.pdf"),
      },
    ]);
    expect(await fs.readFile(path.join(destination, "Report.pdf"), "utf8")).toBe(
      "Report.pdf",
    );
    expect(await listNames(destination)).toEqual([
      "Report.pdf",
      "Report_1.pdf",
      "Report_2.pdf",
    ]);
  });

  it("records per-file failures and moves the rest", async () => {
    await touch(source, "a.pdf", "b.pdf");
    const destination = path.join(root, "done");
    vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("EPERM"));

    const report = await moveFiles(source, destination);

    expect(report.failed).toEqual([
      { file: "a.pdf", message: "Failed to rename 'a.pdf' to 'a.pdf': EPERM" },
    ]);
    expect(report.moved).toHaveLength(1);
    expect(await listNames(destination)).toEqual(["b.pdf"]);
  });

  it("refuses to move a folder into itself", async () => {
    await expect(moveFiles(source, source)).rejects.toBeInstanceOf(MoveError);
  });

  it("fails when the destination cannot be created", async () => {
    await touch(root, "blocker");
    await expect(
      moveFiles(source, path.join(root, "blocker", "sub")),
    ).rejects.toThrow(/Failed to create destination folder/);
  });
});
