import { RunConfigSchema, type RunConfig } from '@govbid/core';
import { ConfigurationError } from './errors';
import { deepFreeze } from './freeze';

/**
 * Reads the run configuration once. Anything missing or malformed is a
 * ConfigurationError, which aborts the run before it starts.
 */
export function resolveRunConfig(env: Record<string, string | undefined> = process.env): RunConfig {
  const parsed = RunConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid run configuration: ${problems}`);
  }
  return deepFreeze(parsed.data);
}
