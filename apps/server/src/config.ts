import os from "node:os";
import path from "node:path";
import { z } from "zod";

function expandHome(raw: string): string {
  return raw.startsWith("~") ? raw.replace("~", os.homedir()) : raw;
}

const pathSchema = z.string().trim().min(1).transform(expandHome);

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1).default("voicelens.db"),
  VAULT_EXTERNAL_DIR: pathSchema.optional(),
  VAULT_PRIVATE_DIR: pathSchema.default("~/.voicelens/audio_analysis"),
  RECORDING_TMP_DIR: pathSchema.optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface AppConfig {
  databaseUrl: string;
  /** Vault base candidates, most preferred first. */
  vaultDirCandidates: readonly string[];
  /** Staging area for capture temp files and uploads. */
  recordingTmpDir: string;
  port: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
}

/**
 * Reads and validates the process environment. Throws with every offending
 * variable listed when something is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  const vaultDirCandidates = [values.VAULT_EXTERNAL_DIR, values.VAULT_PRIVATE_DIR]
    .filter((dir): dir is string => dir !== undefined)
    .map((dir) => path.resolve(dir));

  return Object.freeze({
    databaseUrl: values.DATABASE_URL,
    vaultDirCandidates,
    recordingTmpDir: path.resolve(values.RECORDING_TMP_DIR ?? os.tmpdir()),
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
  });
}
