import { constants } from "node:fs";
import { access, copyFile, mkdir, readdir, rm, stat } from "node:fs/promises";
import path from "node:path";
import { VAULT_DIR_PREFIX, VAULT_FILE_BASENAME } from "@voicelens/shared";
import { FileSystemError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";

/**
 * Owns the on-disk layout of audio artifacts:
 *
 *   <base>/recording_<id>/recording.<ext>
 *
 * The base directory is the first writable candidate (external/shared storage
 * first, app-private storage last). It is resolved once and then fixed for the
 * lifetime of the vault so lookups never split across two bases.
 */
export class FileVault {
  private baseDirPromise: Promise<string> | null = null;

  constructor(
    private readonly baseDirCandidates: readonly string[],
    private readonly logger: Logger,
  ) {
    if (baseDirCandidates.length === 0) {
      throw new Error("FileVault needs at least one base directory candidate");
    }
  }

  baseDir(): Promise<string> {
    if (!this.baseDirPromise) {
      this.baseDirPromise = this.resolveBaseDir().catch((err: unknown) => {
        // Nothing was chosen, so a later call may try again.
        this.baseDirPromise = null;
        throw err;
      });
    }
    return this.baseDirPromise;
  }

  async directoryFor(id: number): Promise<string> {
    return path.join(await this.baseDir(), `${VAULT_DIR_PREFIX}${id}`);
  }

  /**
   * Whether `filePath` is the artifact location for `id` (ignoring extension)
   * and a file is actually there.
   */
  async isVaultPathFor(id: number, filePath: string): Promise<boolean> {
    const directory = await this.directoryFor(id);
    if (path.dirname(path.resolve(filePath)) !== directory || !isArtifactName(path.basename(filePath))) {
      return false;
    }

    try {
      return (await stat(filePath)).isFile();
    } catch (cause) {
      if (isNotFound(cause)) {
        return false;
      }
      throw new FileSystemError(`Failed to inspect artifact for analysis ${id}`, id, { cause });
    }
  }

  /**
   * Copies `sourcePath` into the directory for `id` and returns the permanent
   * path. The source is left in place: it may still be referenced elsewhere.
   */
  async store(sourcePath: string, id: number): Promise<string> {
    const directory = await this.directoryFor(id);
    const extension = path.extname(sourcePath).slice(1);
    const targetName = extension ? `${VAULT_FILE_BASENAME}.${extension}` : VAULT_FILE_BASENAME;
    const targetPath = path.join(directory, targetName);

    try {
      await mkdir(directory, { recursive: true });
      await copyFile(sourcePath, targetPath);

      // Exactly one artifact per directory: drop leftovers from an earlier attempt.
      for (const entry of await readdir(directory)) {
        if (entry !== targetName) {
          await rm(path.join(directory, entry), { recursive: true, force: true });
        }
      }
    } catch (cause) {
      throw new FileSystemError(
        `Failed to store "${sourcePath}" for analysis ${id}: ${describeError(cause)}`,
        id,
        { cause },
      );
    }

    this.logger.debug({ analysisId: id, targetPath }, "audio stored in vault");
    return targetPath;
  }

  /** Path of the artifact stored for `id`, or null when there is none. */
  async findArtifact(id: number): Promise<string | null> {
    const directory = await this.directoryFor(id);
    let entries: string[];
    try {
      entries = await readdir(directory);
    } catch (cause) {
      if (isNotFound(cause)) {
        return null;
      }
      throw new FileSystemError(`Failed to read vault directory for analysis ${id}`, id, { cause });
    }

    const artifact = entries.find(isArtifactName);
    return artifact === undefined ? null : path.join(directory, artifact);
  }

  /**
   * Removes the whole directory for `id`. Resolves false when there was
   * nothing to remove; never fails for a missing directory.
   */
  async delete(id: number): Promise<boolean> {
    const directory = await this.directoryFor(id);

    try {
      await stat(directory);
    } catch (cause) {
      if (isNotFound(cause)) {
        return false;
      }
      throw new FileSystemError(`Failed to inspect vault directory for analysis ${id}`, id, { cause });
    }

    try {
      await rm(directory, { recursive: true, force: true });
    } catch (cause) {
      throw new FileSystemError(
        `Failed to delete vault directory for analysis ${id}: ${describeError(cause)}`,
        id,
        { cause },
      );
    }
    return true;
  }

  private async resolveBaseDir(): Promise<string> {
    const failures: string[] = [];

    for (const candidate of this.baseDirCandidates) {
      const resolved = path.resolve(candidate);
      try {
        await mkdir(resolved, { recursive: true });
        await access(resolved, constants.W_OK);
        this.logger.info({ baseDir: resolved }, "vault base directory selected");
        return resolved;
      } catch (err) {
        failures.push(`${resolved}: ${describeError(err)}`);
        this.logger.warn({ candidate: resolved, err }, "vault base directory unavailable, trying next");
      }
    }

    throw new FileSystemError(`No usable vault base directory (${failures.join("; ")})`);
  }
}

function isArtifactName(name: string): boolean {
  return name === VAULT_FILE_BASENAME || name.startsWith(`${VAULT_FILE_BASENAME}.`);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
