import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./esnl-errors";
import { DEFAULT_RETRY_POLICY } from "./retry";

export const DEFAULT_ARCHIVE_LOCATION =
  "ftp://ftp.ebi.ac.uk/pub/databases/ena/assembly";

const configSchema = z.object({
  // where the assembly directories live e.g. "ftp://host/path", "s3://bucket/prefix" or "/mirror"
  archiveLocation: z.string().min(1).default(DEFAULT_ARCHIVE_LOCATION),

  // local folder that downloaded reports are written to (and deleted from)
  downloadDir: z.string().min(1).default(join(tmpdir(), "esnl")),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(DEFAULT_RETRY_POLICY.maxAttempts),
      initialDelayMs: z
        .number()
        .int()
        .min(0)
        .default(DEFAULT_RETRY_POLICY.initialDelayMs),
      multiplier: z.number().min(1).default(DEFAULT_RETRY_POLICY.multiplier),
    })
    .default({}),

  // whether archive sequences the target assembly does not have are added to it
  appendUnmatchedSequences: z.boolean().default(false),

  ftp: z
    .object({
      timeoutMs: z.number().int().min(0).default(30000),
    })
    .default({}),
});

export type EsnlConfig = z.infer<typeof configSchema>;

export type EsnlConfigInput = z.input<typeof configSchema>;

/**
 * Validate a (possibly partial) configuration and fill in the defaults.
 *
 * @param input
 */
export function createConfig(input: EsnlConfigInput = {}): EsnlConfig {
  const parsed = configSchema.safeParse(input);

  if (!parsed.success)
    throw new ConfigurationError(
      "Invalid configuration",
      parsed.error.issues.map((i) => ({
        message: `${i.path.join(".")}: ${i.message}`,
      })),
    );

  return parsed.data;
}

function numberFromEnv(
  env: NodeJS.ProcessEnv,
  name: string,
): number | undefined {
  const v = env[name];

  if (v === undefined || v.trim().length === 0) return undefined;

  const n = Number(v);

  if (Number.isNaN(n))
    throw new ConfigurationError(`Environment variable ${name} must be numeric`, [
      { message: `${name} is '${v}' which is not a number` },
    ]);

  return n;
}

/**
 * Build configuration from ESNL_* environment variables, with anything set in
 * overrides taking precedence.
 *
 * @param env
 * @param overrides
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EsnlConfigInput = {},
): EsnlConfig {
  const appendUnmatched = env.ESNL_APPEND_UNMATCHED;

  return createConfig({
    archiveLocation: overrides.archiveLocation ?? (env.ESNL_ARCHIVE || undefined),
    downloadDir: overrides.downloadDir ?? (env.ESNL_DOWNLOAD_DIR || undefined),
    appendUnmatchedSequences:
      overrides.appendUnmatchedSequences ??
      (appendUnmatched === undefined
        ? undefined
        : ["1", "true", "yes"].includes(appendUnmatched.toLowerCase())),
    retry: {
      maxAttempts:
        overrides.retry?.maxAttempts ?? numberFromEnv(env, "ESNL_MAX_ATTEMPTS"),
      initialDelayMs:
        overrides.retry?.initialDelayMs ??
        numberFromEnv(env, "ESNL_INITIAL_DELAY_MS"),
      multiplier:
        overrides.retry?.multiplier ??
        numberFromEnv(env, "ESNL_BACKOFF_MULTIPLIER"),
    },
    ftp: {
      timeoutMs:
        overrides.ftp?.timeoutMs ?? numberFromEnv(env, "ESNL_FTP_TIMEOUT_MS"),
    },
  });
}
