import { parseArgs } from 'util';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';

export type FlagSpec = Record<string, { env: string; default?: string }>;

function parseFlags(argv: string[], options: Record<string, { type: 'string' }>): Record<string, unknown> {
  try {
    return parseArgs({ args: argv, options, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new ConfigError([describeError(err)]);
  }
}

/**
 * Merge `--flag value` arguments over environment variables over defaults, then
 * validate the record with `schema`. Flags are always strings at this point;
 * the schema coerces them.
 */
export function loadConfig<S extends z.ZodTypeAny>(
  schema: S,
  flags: FlagSpec,
  argv: string[],
  env: NodeJS.ProcessEnv
): z.infer<S> {
  const options: Record<string, { type: 'string' }> = {};
  for (const name of Object.keys(flags)) {
    options[name] = { type: 'string' };
  }

  const values = parseFlags(argv, options);
  const raw: Record<string, string | undefined> = {};
  for (const [name, spec] of Object.entries(flags)) {
    const fromArgv = values[name];
    raw[name] = typeof fromArgv === 'string' ? fromArgv : env[spec.env] ?? spec.default;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}
