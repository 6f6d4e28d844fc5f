// src/core/archive/archiver.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { ArchiveWriteError, errorMessage } from '../errors.js';
import type { ArchiveRecord, Post } from '../types/index.js';

export interface ArchiverOptions {
  now?: () => Date;
}

export function sanitizeFileName(postId: string): string {
  return postId.replace(/[^A-Za-z0-9._-]/g, '_');
}

export function buildArchiveRecord(post: Post, archivedAt: Date): ArchiveRecord {
  return {
    id: post.id,
    platform: post.platform,
    createdAt: post.createdAt.toISOString(),
    text: post.text,
    url: post.url ?? null,
    attachments: [...post.attachments],
    metadata: post.metadata ? { ...post.metadata } : null,
    archivedAt: archivedAt.toISOString(),
  };
}

export class Archiver {
  private readonly now: () => Date;

  constructor(
    private readonly archiveDir: string,
    options: ArchiverOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  pathFor(post: Post): string {
    return path.join(this.archiveDir, post.platform, `${sanitizeFileName(post.id)}.json`);
  }

  /**
   * Writes the post to `<archiveDir>/<platform>/<id>.json` via a temp file
   * and a rename, so a reader never sees a partial document.
   */
  async archive(post: Post): Promise<string> {
    const filePath = this.pathFor(post);
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    const record = buildArchiveRecord(post, this.now());

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(record, null, 2) + '\n', 'utf-8');
      await fs.rename(tempPath, filePath);
      return filePath;
    } catch (error) {
      const leftover = await fs.rm(tempPath, { force: true }).then(
        () => '',
        (cleanupError: unknown) => ` (temp file left at ${tempPath}: ${errorMessage(cleanupError)})`
      );
      throw new ArchiveWriteError(
        post.id,
        filePath,
        `Failed to archive ${post.id} to ${filePath}: ${errorMessage(error)}${leftover}`
      );
    }
  }
}
