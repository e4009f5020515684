import { patternName } from "./analyze.js";
import type { AppConfig, StrategyName } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import {
  OpenAICompletionClient,
  type CompletionClient,
} from "./llm-analyze.js";
import { nonEmptyLines, sanitizeFilename } from "./utils.js";

/** Turns extracted document text into a candidate base name, or null. */
export interface NameStrategy {
  readonly name: StrategyName;
  /** Names must also pass `isValidFilename` before they are used. */
  readonly strictCharset: boolean;
  deriveName(text: string): Promise<string | null>;
}

export class PatternStrategy implements NameStrategy {
  readonly name = "pattern";
  readonly strictCharset = false;

  async deriveName(text: string): Promise<string | null> {
    return patternName(text);
  }
}

export class LastLineStrategy implements NameStrategy {
  readonly name = "last-line";
  readonly strictCharset = false;

  async deriveName(text: string): Promise<string | null> {
    const lines = nonEmptyLines(text);
    if (!lines.length) return null;
    return sanitizeFilename(lines[lines.length - 1]) || null;
  }
}

export const PROMPT_CHAR_LIMIT = 4000;
export const MAX_TITLE_LENGTH = 100;

const SYSTEM_PROMPT =
  "You generate short and descriptive filenames. Filenames start with the client name, then the project name. " +
  "Filenames may contain letters, numbers and spaces, but no other punctuation.";

export class ServiceStrategy implements NameStrategy {
  readonly name = "service";
  readonly strictCharset = true;

  constructor(private readonly client: CompletionClient) {}

  async deriveName(text: string): Promise<string | null> {
    if (!text.trim()) return null;

    let title: string;
    try {
      title = await this.client.complete({
        system: SYSTEM_PROMPT,
        user: `Provide a short filename for this document:\n${text.slice(0, PROMPT_CHAR_LIMIT)}`,
        maxTokens: 10,
        temperature: 0.2,
      });
    } catch (err) {
      console.error(`  [ERROR] Title generation failed: ${errorMessage(err)}`);
      return null;
    }

    return sanitizeFilename(title.trim().slice(0, MAX_TITLE_LENGTH)) || null;
  }
}

export type StrategyDeps = {
  /** Overrides the OpenAI client built from config. */
  client?: CompletionClient;
};

/**
 * Build the strategy named in config. Throws `ConfigurationError` when the
 * service strategy is chosen without credentials.
 */
export function createStrategy(
  config: Pick<AppConfig, "strategy" | "openai">,
  deps: StrategyDeps = {},
): NameStrategy {
  switch (config.strategy) {
    case "pattern":
      return new PatternStrategy();
    case "last-line":
      return new LastLineStrategy();
    case "service": {
      if (deps.client) return new ServiceStrategy(deps.client);
      const { apiKey, model, timeoutMs } = config.openai;
      if (!apiKey) {
        throw new ConfigurationError(
          "OPENAI_API_KEY environment variable not set.",
        );
      }
      return new ServiceStrategy(
        new OpenAICompletionClient({ apiKey, model, timeoutMs }),
      );
    }
  }
}
