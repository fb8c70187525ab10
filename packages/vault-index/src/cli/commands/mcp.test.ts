/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import { mcpArgsSchema, mcpOverridesFromArgs } from './mcp.js';

describe('mcpOverridesFromArgs', () => {
  it('should map --no-watch and --no-reindex onto the config', () => {
    const args = mcpArgsSchema.parse({ watch: false, reindex: false });

    expect(mcpOverridesFromArgs(args)).toEqual({
      watcher: { enabled: false },
      indexing: { reindexOnStart: false },
    });
  });

  it('should enable watching when --watch is given', () => {
    expect(mcpOverridesFromArgs(mcpArgsSchema.parse({ watch: true }))).toEqual({
      watcher: { enabled: true },
    });
  });

  it('should leave the config alone without the switches', () => {
    expect(mcpOverridesFromArgs(mcpArgsSchema.parse({}))).toEqual({});
  });
});
