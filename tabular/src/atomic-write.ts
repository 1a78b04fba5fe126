import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, renameSync, rmSync } from "node:fs";
import { basename, dirname, join } from "node:path";

import { TabularSourceError } from "./row-set.ts";

function createTempSiblingPath(path: string, suffix: string): string {
  return join(dirname(path), `.${basename(path)}.${process.pid}.${randomUUID().slice(0, 8)}.${suffix}`);
}

function toWriteFailure(error: unknown, path: string): TabularSourceError {
  if (error instanceof TabularSourceError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);
  return new TabularSourceError(`Cannot write ${path}: ${detail}`, "WRITE_FAILED", path);
}

interface StagedFile {
  path: string;
  tempPath: string;
}

interface CommittedFile {
  path: string;
  backupPath?: string;
}

/**
 * Collects the files of one artifact as temp siblings and renames them into place together.
 * Nothing reaches a target name until `commit`, and a failed commit puts back every file it had
 * already replaced.
 */
export class StagedWrites {
  private readonly staged: StagedFile[] = [];

  get paths(): string[] {
    return this.staged.map((file) => file.path);
  }

  async stage(path: string, write: (tempPath: string) => Promise<void> | void): Promise<void> {
    const tempPath = createTempSiblingPath(path, "tmp");

    try {
      mkdirSync(dirname(path), { recursive: true });
      await write(tempPath);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw toWriteFailure(error, path);
    }

    this.staged.push({ path, tempPath });
  }

  commit(): string[] {
    const committed: CommittedFile[] = [];
    let current = "";

    try {
      for (const file of this.staged) {
        current = file.path;
        const backupPath = existsSync(file.path) ? createTempSiblingPath(file.path, "bak") : undefined;
        if (backupPath !== undefined) {
          renameSync(file.path, backupPath);
        }
        committed.push({ path: file.path, backupPath });
        renameSync(file.tempPath, file.path);
      }
    } catch (error) {
      for (const file of committed.reverse()) {
        rmSync(file.path, { force: true });
        if (file.backupPath !== undefined) {
          renameSync(file.backupPath, file.path);
        }
      }
      this.discard();
      throw toWriteFailure(error, current);
    }

    for (const file of committed) {
      if (file.backupPath !== undefined) {
        rmSync(file.backupPath, { force: true });
      }
    }

    const paths = this.paths;
    this.staged.length = 0;
    return paths;
  }

  /** Drops every staged temp file; target names are left as they were. */
  discard(): void {
    for (const file of this.staged) {
      rmSync(file.tempPath, { force: true });
    }
    this.staged.length = 0;
  }
}

/**
 * Runs `write` against a temp file beside `path` and renames it into place, so the target name
 * only ever holds a complete file.
 */
export async function writeFileAtomically(
  path: string,
  write: (tempPath: string) => Promise<void> | void
): Promise<void> {
  const batch = new StagedWrites();
  await batch.stage(path, write);
  batch.commit();
}
