/**
 * Vault discovery.
 * Enumerates the documents of one vault for reindexing, reconciliation
 * and polling.
 */

import { stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import fg from 'fast-glob';
import type { VaultConfig } from '../config.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('VaultScanner');

// ============================================================================
// Types
// ============================================================================

export interface ScannerOptions {
  /** Recognized extensions, with leading dot */
  extensions: string[];
  /** Directory names skipped anywhere in the tree */
  ignorePaths: string[];
  /** Skip files larger than this (bytes) */
  maxFileSize: number;
}

export interface ScannedDocument {
  vaultName: string;
  /** Forward-slash path relative to the vault root */
  relativePath: string;
  absolutePath: string;
  size: number;
  mtimeMs: number;
}

export interface ScanStats {
  totalFiles: number;
  skippedBySize: number;
  totalSize: number;
}

// ============================================================================
// VaultScanner Class
// ============================================================================

export class VaultScanner {
  readonly vaultName: string;
  readonly rootPath: string;
  private readonly extensions: Set<string>;
  private readonly ignorePaths: Set<string>;
  private readonly maxFileSize: number;
  private lastStats: ScanStats = { totalFiles: 0, skippedBySize: 0, totalSize: 0 };

  constructor(vault: VaultConfig, options: ScannerOptions) {
    this.vaultName = vault.name;
    this.rootPath = resolve(vault.path);
    this.extensions = new Set(options.extensions.map((e) => e.toLowerCase()));
    this.ignorePaths = new Set(options.ignorePaths);
    this.maxFileSize = options.maxFileSize;
  }

  /**
   * Whether a vault-relative path is a document this vault indexes.
   * Hidden segments and ignored directory names are excluded.
   */
  isRecognized(relativePath: string): boolean {
    if (!this.extensions.has(extname(relativePath).toLowerCase())) {
      return false;
    }
    const segments = relativePath.split('/');
    return segments.every(
      (segment) =>
        segment.length > 0 &&
        segment !== '..' &&
        !segment.startsWith('.') &&
        !this.ignorePaths.has(segment),
    );
  }

  /**
   * Vault-relative forward-slash path, or null when outside the vault.
   */
  toRelative(absolutePath: string): string | null {
    const rel = relative(this.rootPath, resolve(absolutePath));
    if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      return null;
    }
    return rel.split(sep).join('/');
  }

  /**
   * Absolute path of a vault-relative path. Throws on traversal outside
   * the vault root.
   */
  toAbsolute(relativePath: string): string {
    const absolutePath = resolve(this.rootPath, relativePath);
    if (this.toRelative(absolutePath) === null) {
      throw new Error(`Path escapes vault ${this.vaultName}: ${relativePath}`);
    }
    return absolutePath;
  }

  getLastStats(): ScanStats {
    return { ...this.lastStats };
  }

  /**
   * Discover all documents in the vault.
   */
  async scan(): Promise<ScannedDocument[]> {
    const stats: ScanStats = { totalFiles: 0, skippedBySize: 0, totalSize: 0 };
    const patterns = [...this.extensions].map((ext) => `**/*${ext}`);

    const entries = await fg(patterns, {
      cwd: this.rootPath,
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: false,
      caseSensitiveMatch: false,
      ignore: [...this.ignorePaths].map((name) => `**/${name}/**`),
    });

    const documents: ScannedDocument[] = [];
    for (const relativePath of entries.sort()) {
      if (!this.isRecognized(relativePath)) continue;

      const absolutePath = join(this.rootPath, relativePath);
      let fileStats: Stats;
      try {
        fileStats = await stat(absolutePath);
      } catch {
        // Removed between glob and stat
        continue;
      }

      stats.totalFiles++;
      if (fileStats.size > this.maxFileSize) {
        stats.skippedBySize++;
        log.debug('scan:skip-size', { relativePath, size: fileStats.size });
        continue;
      }
      stats.totalSize += fileStats.size;

      documents.push({
        vaultName: this.vaultName,
        relativePath,
        absolutePath,
        size: fileStats.size,
        mtimeMs: fileStats.mtimeMs,
      });
    }

    this.lastStats = stats;
    log.debug('scan:complete', { vault: this.vaultName, ...stats });
    return documents;
  }
}
