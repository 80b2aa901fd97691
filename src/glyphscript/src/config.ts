import { z } from 'zod';
import { LOG_LEVELS } from './logging.js';

export const DEFAULT_MAX_SOURCE_LENGTH = 100_000;

const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  maxSourceLength: z.coerce.number().int().positive().default(DEFAULT_MAX_SOURCE_LENGTH),
});

export type Config = z.infer<typeof ConfigSchema>;

const MAX_SOURCE_FLAG = '--max-source-length';

export function parseConfig(argv: readonly string[], env: Record<string, string | undefined>) {
  const flag = argv.indexOf(MAX_SOURCE_FLAG);
  // A flag with no value must fail validation rather than fall back to the default.
  const maxSource = flag >= 0 ? (argv[flag + 1] ?? '') : env.GLYPHSCRIPT_MAX_SOURCE;
  return ConfigSchema.safeParse({ logLevel: env.GLYPHSCRIPT_LOG, maxSourceLength: maxSource });
}

export function loadConfig(argv: readonly string[] = process.argv.slice(2), env = process.env): Config {
  const parsed = parseConfig(argv, env);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`Invalid configuration (${issue.path.join('.')}): ${issue.message}`);
    }
    process.exit(1);
  }
  return parsed.data;
}
