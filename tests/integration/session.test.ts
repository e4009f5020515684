import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { runSession, type Prompter } from "../../src/cli/session.js";
import { LastLineStrategy } from "../../src/core/strategies.js";
import { listNames, makeTempDir } from "../helpers/pdf.js";

/** Answers prompts in order and remembers what was asked. */
class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.asked.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`Unexpected prompt: ${question}`);
    return answer;
  }
}

let root: string;
let folder: string;

const deps = {
  strategy: new LastLineStrategy(),
  extract: async (filePath: string) =>
    `Title page\n${path.basename(filePath, ".pdf").toUpperCase()}`,
};

beforeEach(async () => {
  root = await makeTempDir();
  folder = path.join(root, "inbox");
  await fs.mkdir(folder);
  await fs.writeFile(path.join(folder, "alpha.pdf"), "stub");
  await fs.writeFile(path.join(folder, "beta.pdf"), "stub");
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

describe("runSession", () => {
  it("previews, then renames and moves when confirmed", async () => {
    const destination = path.join(root, "done");
    const prompter = new ScriptedPrompter([folder, "", "y", "y", destination]);

    await runSession(prompter, deps);

    expect(prompter.asked).toHaveLength(5);
    expect(await listNames(folder)).toEqual([]);
    expect(await listNames(destination)).toEqual(["ALPHA.pdf", "BETA.pdf"]);
  });

  it("leaves everything in place when the preview is not confirmed", async () => {
    const prompter = new ScriptedPrompter([folder, "y", "n"]);

    await runSession(prompter, deps);

    expect(prompter.asked).toHaveLength(3);
    expect(await listNames(folder)).toEqual(["alpha.pdf", "beta.pdf"]);
  });

  it("renames straight away without a dry run and skips the move by default", async () => {
    const prompter = new ScriptedPrompter([folder, "n", ""]);

    await runSession(prompter, deps);

    expect(await listNames(folder)).toEqual(["ALPHA.pdf", "BETA.pdf"]);
  });

  it("stops after reporting a missing folder", async () => {
    const prompter = new ScriptedPrompter([path.join(root, "missing"), "y"]);

    await runSession(prompter, deps);

    expect(prompter.asked).toHaveLength(2);
    expect(console.error).toHaveBeenCalledWith(
      `Error: Folder not found at '${path.join(root, "missing")}'`,
    );
  });
});
