import fs from "node:fs/promises";
import path from "node:path";
import { getDocument, VerbosityLevel } from "pdfjs-dist/legacy/build/pdf.mjs";
import {
  ExtractionError,
  errorMessage,
  type ExtractionFailure,
} from "./errors.js";

export type ExtractOptions = {
  /** Only read this many leading pages; 0 reads them all. */
  maxPages?: number;
};

export type TextExtractor = (filePath: string) => Promise<string>;

function classify(err: unknown): ExtractionFailure {
  if (err instanceof Error) {
    if (err.name === "PasswordException") return "encrypted";
    if (err.name === "InvalidPDFException") return "corrupt";
  }
  return "unreadable";
}

// pdf.js hands back positioned fragments; start a new line whenever the
// baseline moves or the fragment says it ends one.
function joinItems(items: Array<object>): string {
  let out = "";
  let lastY: number | null = null;

  for (const item of items) {
    if (!("str" in item) || typeof item.str !== "string") continue;
    const transform: unknown = "transform" in item ? item.transform : null;
    const y =
      Array.isArray(transform) && typeof transform[5] === "number"
        ? transform[5]
        : null;

    if (lastY !== null && y !== null && y !== lastY && !out.endsWith("\n")) {
      out += "\n";
    }
    out += item.str;
    if ("hasEOL" in item && item.hasEOL === true) out += "\n";
    if (y !== null) lastY = y;
  }

  return out;
}

/**
 * Pull the text out of PDF bytes, page by page.
 * `label` names the document in diagnostics and errors.
 */
export async function extractTextFromData(
  data: Uint8Array,
  label: string,
  options: ExtractOptions = {},
): Promise<string> {
  const loadingTask = getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: VerbosityLevel.ERRORS,
  });

  try {
    const doc = await loadingTask.promise;
    const limit =
      options.maxPages && options.maxPages > 0
        ? Math.min(options.maxPages, doc.numPages)
        : doc.numPages;

    const pages: string[] = [];
    for (let i = 1; i <= limit; i++) {
      const page = await doc.getPage(i);
      const content = await page.getTextContent();
      pages.push(joinItems(content.items));
      page.cleanup();
    }
    return pages.join("\n");
  } catch (err) {
    const kind = classify(err);
    console.error(
      `  [ERROR] Could not read '${label}'. It might be corrupted or encrypted.`,
    );
    throw new ExtractionError(
      `Could not extract text from '${label}' (${kind}): ${errorMessage(err)}`,
      kind,
      label,
    );
  } finally {
    await loadingTask.destroy();
  }
}

export async function extractText(
  filePath: string,
  options: ExtractOptions = {},
): Promise<string> {
  const label = path.basename(filePath);
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (err) {
    console.error(`  [ERROR] Could not open '${label}': ${errorMessage(err)}`);
    throw new ExtractionError(
      `Could not open '${label}': ${errorMessage(err)}`,
      "unreadable",
      label,
    );
  }
  // pdf.js wants a plain Uint8Array, not a Buffer
  return extractTextFromData(new Uint8Array(buffer), label, options);
}

export function createExtractor(options: ExtractOptions = {}): TextExtractor {
  return (filePath) => extractText(filePath, options);
}
