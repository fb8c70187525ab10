/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * Stable content fingerprint: lowercase hex SHA-256 of the document bytes.
 * Strings are hashed as UTF-8, so a file and its decoded text agree.
 */
export class ContentHasher {
  readonly algorithm = 'sha256';

  hash(content: string | Uint8Array): string {
    return createHash(this.algorithm).update(content).digest('hex');
  }

  async hashFile(filePath: string): Promise<string> {
    return this.hash(await readFile(filePath));
  }
}

export const contentHasher = new ContentHasher();

export function hashContent(content: string | Uint8Array): string {
  return contentHasher.hash(content);
}
