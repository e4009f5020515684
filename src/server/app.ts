import express, {
  type ErrorRequestHandler,
  type Express,
  type Response,
} from "express";
import type { Server } from "node:http";
import path from "node:path";
import multer from "multer";
import { z } from "zod";
import { loadConfig, type AppConfig } from "../core/config.js";
import {
  ConfigurationError,
  ExtractionError,
  FolderNotFoundError,
  MoveError,
  errorMessage,
} from "../core/errors.js";
import { createExtractor, extractTextFromData } from "../core/extract.js";
import { moveFiles } from "../core/move.js";
import { renameFolder } from "../core/rename.js";
import { createStrategy, type NameStrategy } from "../core/strategies.js";
import { isValidFilename } from "../core/utils.js";

export type AppOptions = {
  strategy: NameStrategy;
  /** 0 reads every page */
  maxPages: number;
};

type Suggestion = {
  originalName: string;
  suggestedName: string | null;
  status: "named" | "no-name" | "invalid-name" | "unreadable";
  error?: string;
};

const PlanBody = z.object({ folder: z.string().trim().min(1) });
// Same-folder moves are rejected before any rename
const ConfirmBody = PlanBody.extend({
  destination: z.string().trim().min(1).optional(),
}).refine(
  (b) =>
    !b.destination || path.resolve(b.folder) !== path.resolve(b.destination),
  { message: "Source and destination are the same folder" },
);

function issuesMessage(error: z.ZodError): string {
  return error.issues.map((i) => i.message).join("; ");
}

function isJsonParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

// Turns body-parser and multer failures into JSON like every other response
const handleError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: err.message });
  } else if (isJsonParseError(err)) {
    res.status(400).json({ error: "Malformed JSON body" });
  } else {
    console.error(err);
    res.status(500).json({ error: "Request failed" });
  }
};

function sendError(res: Response, err: unknown, fallback: string) {
  if (err instanceof FolderNotFoundError) {
    res.status(404).json({ error: err.message });
  } else if (err instanceof MoveError) {
    res.status(400).json({ error: err.message });
  } else {
    console.error(err);
    res.status(500).json({ error: fallback });
  }
}

export function createApp({ strategy, maxPages }: AppOptions): Express {
  const app = express();
  const extract = createExtractor({ maxPages });
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 50 * 1024 * 1024 },
  });

  app.use(express.json());

  // Suggest names for uploaded PDFs without touching anything on disk
  app.post("/api/suggest", upload.array("files", 50), async (req, res) => {
    const files = Array.isArray(req.files) ? req.files : [];
    if (!files.length) {
      res.status(400).json({ error: "No files uploaded" });
      return;
    }

    console.log(`\nSuggesting names for ${files.length} file(s)...`);
    const results: Suggestion[] = [];

    for (const file of files) {
      const originalName = file.originalname;
      try {
        const text = await extractTextFromData(
          new Uint8Array(file.buffer),
          originalName,
          { maxPages },
        );
        const name = await strategy.deriveName(text);
        if (!name) {
          results.push({ originalName, suggestedName: null, status: "no-name" });
        } else if (strategy.strictCharset && !isValidFilename(name)) {
          results.push({
            originalName,
            suggestedName: null,
            status: "invalid-name",
            error: `Unsupported characters in '${name}'`,
          });
        } else {
          results.push({ originalName, suggestedName: name, status: "named" });
        }
        console.log(`  Done: ${originalName} → ${name ?? "(no name)"}`);
      } catch (err) {
        if (!(err instanceof ExtractionError)) console.error(err);
        results.push({
          originalName,
          suggestedName: null,
          status: "unreadable",
          error: errorMessage(err),
        });
      }
    }

    res.json({ results });
  });

  // Dry run over a folder on the server's filesystem
  app.post("/api/plan", async (req, res) => {
    const body = PlanBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Expected { folder: string }" });
      return;
    }
    try {
      const report = await renameFolder(body.data.folder, {
        strategy,
        dryRun: true,
        extract,
      });
      console.log(
        `  Planned: ${report.folder} → ${report.summary.renamed} of ${report.summary.found} would be renamed`,
      );
      res.json(report);
    } catch (err) {
      sendError(res, err, "Plan failed");
    }
  });

  app.post("/api/confirm", async (req, res) => {
    const body = ConfirmBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: issuesMessage(body.error) });
      return;
    }
    try {
      const { folder, destination } = body.data;
      const report = await renameFolder(folder, {
        strategy,
        dryRun: false,
        extract,
      });
      const move = destination ? await moveFiles(folder, destination) : null;
      console.log(
        `  Renamed: ${report.summary.renamed}, skipped: ${report.summary.skipped}, failed: ${report.summary.failed}` +
          (move ? `, moved: ${move.moved.length}` : ""),
      );
      res.json({ report, move });
    } catch (err) {
      sendError(res, err, "Confirm failed");
    }
  });

  app.use(handleError);

  return app;
}

/**
 * Load config, build the app and listen on HOST:PORT (loopback by default).
 * A configuration problem is reported once and yields null.
 */
export async function startServer(
  env: Record<string, string | undefined> = process.env,
): Promise<Server | null> {
  let config: AppConfig;
  let strategy: NameStrategy;
  try {
    config = loadConfig(env);
    strategy = createStrategy(config);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`  [ERROR] ${err.message}`);
      return null;
    }
    throw err;
  }

  const app = createApp({ strategy, maxPages: config.maxPages });
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      console.log(
        `\nPDF renamer running at http://${config.host}:${config.port} (strategy: ${config.strategy})\n`,
      );
      resolve(server);
    });
    server.once("error", reject);
  });
}
