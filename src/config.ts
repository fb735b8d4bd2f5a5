import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({ path: [".env.local", ".env"] });

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const flag = z
  .enum(["0", "1", "true", "false", ""])
  .optional()
  .transform((val) => val === "1" || val === "true");

const envSchema = z.object({
  PAA_SEARCH_URL: z.string().url().default("https://www.google.com/search"),
  PAA_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  PAA_LOCALE: z.string().min(1).default("us"),
  PAA_LANGUAGE: z.string().min(1).optional(),
  PAA_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PAA_DEBUG: flag,
});

export interface Config {
  searchUrl: string;
  userAgent: string;
  locale: string;
  language?: string;
  timeoutMs: number;
  debug: boolean;
}

/**
 * Build the configuration from an environment record
 * @throws ZodError when a variable holds an invalid value
 */
export const loadConfig = (
  env: Record<string, string | undefined>
): Readonly<Config> => {
  const parsed = envSchema.parse(env);

  return Object.freeze({
    searchUrl: parsed.PAA_SEARCH_URL,
    userAgent: parsed.PAA_USER_AGENT,
    locale: parsed.PAA_LOCALE,
    language: parsed.PAA_LANGUAGE,
    timeoutMs: parsed.PAA_TIMEOUT_MS,
    debug: parsed.PAA_DEBUG,
  });
};

export const config = loadConfig(process.env);

export const debug = (...args: unknown[]): void => {
  if (config.debug) {
    console.debug("[paa]", ...args);
  }
};
