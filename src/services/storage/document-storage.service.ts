import { promises as fs } from 'fs';
import path from 'path';

const STAGING_DIR = '.staging';

/**
 * A document written to the staging area, waiting for its database row to commit.
 */
export interface StagedDocument {
  folder: string;
  name: string;
  stagedPath: string;
  finalPath: string;
  /** Value stored in the `file_path` column, e.g. `uploads/po_documents/PO_x.pdf`. */
  storedPath: string;
}

// fs errors may come from another realm, where `instanceof Error` is false; test the shape instead
const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * Local document storage with two-phase writes.
 *
 * Files are first written below `<root>/.staging`; they are moved into place only
 * after the transaction referencing them has committed, and removed if it fails.
 * Anything left in staging by a crash is reclaimed by `sweepStaging`.
 */
export class DocumentStorage {
  constructor(
    private readonly rootDir: string,
    private readonly publicPrefix = 'uploads'
  ) {}

  async stage(folder: string, name: string, bytes: Buffer): Promise<StagedDocument> {
    if (path.basename(folder) !== folder || path.basename(name) !== name) {
      throw new Error(`Refusing to stage document outside the upload root: ${folder}/${name}`);
    }

    const stagedPath = path.join(this.rootDir, STAGING_DIR, folder, name);
    await fs.mkdir(path.dirname(stagedPath), { recursive: true });
    await fs.writeFile(stagedPath, bytes);

    return {
      folder,
      name,
      stagedPath,
      finalPath: path.join(this.rootDir, folder, name),
      storedPath: `${this.publicPrefix}/${folder}/${name}`,
    };
  }

  async finalize(documents: StagedDocument[]): Promise<void> {
    for (const doc of documents) {
      await fs.mkdir(path.dirname(doc.finalPath), { recursive: true });
      await fs.rename(doc.stagedPath, doc.finalPath);
    }
  }

  async discard(documents: StagedDocument[]): Promise<void> {
    for (const doc of documents) {
      try {
        await fs.unlink(doc.stagedPath);
      } catch (error) {
        if (!isMissingFileError(error)) {
          console.error(`Error discarding staged document ${doc.stagedPath}:`, error);
        }
      }
    }
  }

  /**
   * Runs `persist` and then finalizes the staged documents, or discards them when it throws.
   */
  async commitWithDocuments<T>(staged: StagedDocument[], persist: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await persist();
    } catch (error) {
      await this.discard(staged);
      throw error;
    }

    try {
      await this.finalize(staged);
    } catch (error) {
      console.error('Error moving committed documents out of staging:', error);
      throw error;
    }
    return result;
  }

  /**
   * Deletes staged files older than `maxAgeMs`. Returns how many were removed.
   */
  async sweepStaging(maxAgeMs: number, now: number = Date.now()): Promise<number> {
    const stagingRoot = path.join(this.rootDir, STAGING_DIR);
    let folders: string[];
    try {
      folders = await fs.readdir(stagingRoot);
    } catch (error) {
      if (isMissingFileError(error)) return 0;
      throw error;
    }

    let removed = 0;
    for (const folder of folders) {
      const folderPath = path.join(stagingRoot, folder);
      const names = await this.listStagedFolder(folderPath);

      for (const name of names) {
        if (await this.removeIfExpired(path.join(folderPath, name), maxAgeMs, now)) {
          removed += 1;
        }
      }
    }

    if (removed > 0) {
      console.log(`🧹 Removed ${removed} orphaned staged document(s)`);
    }
    return removed;
  }

  // Entries can be finalized or discarded by a request while the sweep walks the tree

  private async listStagedFolder(folderPath: string): Promise<string[]> {
    try {
      const folderStat = await fs.stat(folderPath);
      return folderStat.isDirectory() ? await fs.readdir(folderPath) : [];
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw error;
    }
  }

  private async removeIfExpired(filePath: string, maxAgeMs: number, now: number): Promise<boolean> {
    try {
      const fileStat = await fs.stat(filePath);
      if (!fileStat.isFile() || now - fileStat.mtimeMs <= maxAgeMs) return false;
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }
}

/**
 * Public URL of a stored document, or null when there is none.
 */
export const buildFileUrl = (hostUrl: string, filePath: string | null): string | null =>
  filePath ? `${hostUrl}/${filePath}` : null;
