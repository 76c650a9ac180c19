import { Result, ok, err } from 'neverthrow';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// --- Zod Schemas ---

/** Accepts numbers and the strings commander hands over for numeric flags. */
const integerOption = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .nonnegative(`${name} must not be negative`);

const settingsSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  count: integerOption('count').positive('count must be at least 1'),
  seed: integerOption('seed').optional(),
  maxRepetitions: integerOption('maxRepetitions'),
  maxDepth: integerOption('maxDepth'),
  maxVariableDepth: integerOption('maxVariableDepth'),
});

export type Settings = z.infer<typeof settingsSchema>;

// --- Defaults ---

export const DEFAULT_SETTINGS: Settings = {
  logLevel: 'info',
  count: 1,
  maxRepetitions: 10_000,
  maxDepth: 256,
  maxVariableDepth: 64,
};

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/** Raw CLI flags as commander delivers them. */
export type CliFlags = {
  verbose?: boolean;
  quiet?: boolean;
  count?: string | number;
  seed?: string | number;
  maxRepetitions?: string | number;
  maxDepth?: string | number;
  maxVariableDepth?: string | number;
};

function logLevelFrom(flags: CliFlags, env: NodeJS.ProcessEnv): string {
  if (flags.quiet) return 'error';
  if (flags.verbose) return 'debug';
  return env['RANDTEXT_LOG_LEVEL'] ?? DEFAULT_SETTINGS.logLevel;
}

// --- Main ---

/**
 * Merge CLI flags and environment over the defaults and validate them.
 * `--quiet` wins over `--verbose`, and both win over RANDTEXT_LOG_LEVEL.
 */
export function resolveSettings(
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env,
): Result<Settings, ConfigError> {
  const candidate = {
    logLevel: logLevelFrom(flags, env),
    count: flags.count ?? DEFAULT_SETTINGS.count,
    seed: flags.seed,
    maxRepetitions: flags.maxRepetitions ?? DEFAULT_SETTINGS.maxRepetitions,
    maxDepth: flags.maxDepth ?? DEFAULT_SETTINGS.maxDepth,
    maxVariableDepth: flags.maxVariableDepth ?? DEFAULT_SETTINGS.maxVariableDepth,
  };

  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    return err(new ConfigError(`Invalid options: ${formatZodErrors(parsed.error)}`));
  }
  return ok(parsed.data);
}
