import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

/**
 * Configuration schema validation
 *
 * Vendor keys are optional here: a missing key only fails the provider
 * that needs it, at call time.
 */
const ConfigSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  FIRECRAWL_API_KEY: z.string().optional(),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LEDGER_PATH: z.string().min(1).default('applications.xlsx'),
  COVER_LETTER_DIR: z.string().min(1).default('cover-letters'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validated configuration object
 */
export const config: Config = ConfigSchema.parse({
  ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  FIRECRAWL_API_KEY: process.env.FIRECRAWL_API_KEY,
  PROVIDER_TIMEOUT_MS: process.env.PROVIDER_TIMEOUT_MS || undefined,
  LEDGER_PATH: process.env.LEDGER_PATH || undefined,
  COVER_LETTER_DIR: process.env.COVER_LETTER_DIR || undefined,
});
