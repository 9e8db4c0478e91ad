import { z } from 'zod';
import { ConfigurationError, MissingApiKeyError } from '../core/errors';

const EnvironmentSchema = z.object({
  // Credential is optional here: it can also come from the --api-key flag
  OPENROUTER_API_KEY: z.string().min(1).optional(),
  OPENROUTER_BASE_URL: z
    .string()
    .url('Valid OpenRouter base URL is required')
    .default('https://openrouter.ai/api/v1'),

  TEXT_MODEL: z.string().min(1).default('anthropic/claude-3.5-sonnet'),
  VISION_MODEL: z.string().min(1).default('anthropic/claude-3.5-sonnet'),
  ANALYSIS_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
  ANALYSIS_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),

  // Web enrichment
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SCRAPE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  MAX_SCRAPE_URLS: z.coerce.number().int().min(0).max(50).default(10),

  // No cap unless set
  MAX_ANALYSIS_IMAGES: z.coerce.number().int().positive().optional(),

  OUTPUT_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnvironment: Environment | null = null;

/**
 * Validate an environment snapshot without touching the cache.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  try {
    return EnvironmentSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  cachedEnvironment = parseEnvironment(process.env);
  return cachedEnvironment;
}

/**
 * Resolve the bearer credential for the analysis API.
 * An explicit override wins over the environment snapshot.
 */
export function resolveApiKey(override: string | undefined, env: Pick<Environment, 'OPENROUTER_API_KEY'>): string {
  const fromOverride = override?.trim();
  if (fromOverride) {
    return fromOverride;
  }

  const fromEnv = env.OPENROUTER_API_KEY?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  throw new MissingApiKeyError();
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
