import { Inject, Injectable, Logger } from '@nestjs/common';
import { Dirent } from 'fs';
import { copyFile, mkdir, readdir, rename, stat, unlink } from 'fs/promises';
import { basename, join } from 'path';
import { NOT_USED_PREFIX } from '@libs/common';
import { intakeConfig, IntakeConfig } from '../../config';

export interface ArchiveOptions {
  // false for batches that were not merged into the store
  used: boolean;
}

interface ArchivedFile {
  path: string;
  size: number;
  modifiedAt: number;
}

@Injectable()
export class ArchiveService {
  private readonly logger = new Logger(ArchiveService.name);

  public constructor(
    @Inject(intakeConfig.KEY)
    private readonly config: IntakeConfig,
  ) {}

  /** Moves a processed page into the archive; returns its new path. */
  public async archive(filePath: string, options: ArchiveOptions): Promise<string> {
    await mkdir(this.config.archiveDir, { recursive: true });
    const target = join(this.config.archiveDir, `${options.used ? '' : NOT_USED_PREFIX}${basename(filePath)}`);

    try {
      await rename(filePath, target);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'EXDEV')) {
        throw error;
      }
      // archive on another device
      await copyFile(filePath, target);
      await unlink(filePath);
    }

    this.logger.debug(`Archived ${basename(filePath)} as ${basename(target)}`);
    return target;
  }

  /**
   * Deletes the oldest archived files until the archive fits the configured size.
   * Returns the deleted paths.
   */
  public async enforceSizeLimit(): Promise<string[]> {
    const limit = this.config.maxArchiveSizeMb * 1024 * 1024;
    const files = await this.listArchivedFiles();
    let total = files.reduce((sum, file) => sum + file.size, 0);

    const removed: string[] = [];
    for (const file of files) {
      if (total <= limit) {
        break;
      }
      await unlink(file.path);
      total -= file.size;
      removed.push(file.path);
    }

    if (removed.length > 0) {
      this.logger.log(`Removed ${removed.length} archived files to stay under ${this.config.maxArchiveSizeMb} MB`);
    }
    return removed;
  }

  /** Oldest first. */
  private async listArchivedFiles(): Promise<ArchivedFile[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.config.archiveDir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const files: ArchivedFile[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const path = join(this.config.archiveDir, entry.name);
      const stats = await stat(path);
      files.push({ path, size: stats.size, modifiedAt: stats.mtimeMs });
    }

    return files.sort((a, b) => a.modifiedAt - b.modifiedAt || a.path.localeCompare(b.path));
  }
}
