import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const STRATEGY_NAMES = ["pattern", "last-line", "service"] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

const EnvSchema = z.object({
  NAME_STRATEGY: z.enum(STRATEGY_NAMES).default("pattern"),
  MAX_PAGES: z.coerce.number().int().nonnegative().default(6),
  OPENAI_API_KEY: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined)),
  OPENAI_MODEL: z.string().min(1).default("gpt-3.5-turbo"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().trim().min(1).default("127.0.0.1"),
});

export type AppConfig = {
  strategy: StrategyName;
  /** 0 reads every page */
  maxPages: number;
  openai: { apiKey?: string; model: string; timeoutMs: number };
  port: number;
  /** Interface the server binds to; loopback unless overridden */
  host: string;
};

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  // Blank entries in .env mean "use the default"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const cfg = parsed.data;
  return {
    strategy: cfg.NAME_STRATEGY,
    maxPages: cfg.MAX_PAGES,
    openai: {
      apiKey: cfg.OPENAI_API_KEY,
      model: cfg.OPENAI_MODEL,
      timeoutMs: cfg.OPENAI_TIMEOUT_MS,
    },
    port: cfg.PORT,
    host: cfg.HOST,
  };
}
