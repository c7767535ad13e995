import { z } from 'zod';
import { StubConfigError } from './errors.js';

const booleanFlag = z
  .union([z.boolean(), z.enum(['1', '0', 'true', 'false'])])
  .transform((value) => value === true || value === '1' || value === 'true');

export const stubConfigSchema = z.object({
  /** Nested unstub attempts allowed in flight before the loop is treated as infinite */
  maxUnstubDepth: z.number().int().positive().default(2),
  /** Language code the content-language stub builds */
  languageCode: z.string().trim().min(1).default('en'),
  /** Send debug traces to the console */
  debug: booleanFlag.default(false),
});

export type StubConfig = z.output<typeof stubConfigSchema>;
export type StubConfigInput = z.input<typeof stubConfigSchema>;

export const ENV_PREFIX = 'LAZY_GLOBALS_';

/** Raw values from the environment; the schema decides what is valid */
function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  const depth = env[`${ENV_PREFIX}MAX_UNSTUB_DEPTH`];
  const languageCode = env[`${ENV_PREFIX}LANGUAGE_CODE`];
  const debug = env[`${ENV_PREFIX}DEBUG`];

  if (depth !== undefined && depth !== '') input.maxUnstubDepth = Number(depth);
  if (languageCode !== undefined && languageCode !== '') input.languageCode = languageCode;
  if (debug !== undefined && debug !== '') input.debug = debug;

  return input;
}

/**
 * Resolve configuration from environment variables, with `overrides` taking precedence.
 *
 * @throws StubConfigError when a value does not validate
 */
export function loadStubConfig(env: NodeJS.ProcessEnv = process.env, overrides: StubConfigInput = {}): StubConfig {
  const result = stubConfigSchema.safeParse({ ...fromEnv(env), ...overrides });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new StubConfigError('Invalid lazy-globals configuration', issues, { cause: result.error });
  }
  return result.data;
}
