import { readFile } from 'node:fs/promises';
import { FixtureIOError } from '../errors.js';
import { atomicWriteFile } from '../util/fs.js';
import type { EditPlanEntry } from '../core/types.js';
import { applyEdits, type ApplyResult } from './apply-edits.js';

export interface PatchResult extends ApplyResult {
  /** Whether the file on disk was rewritten. */
  written: boolean;
}

/**
 * Read/modify/write access to one fixture file. Nothing else touches the file
 * while a reconciliation iteration is applying its plan.
 */
export class FixturePatcher {
  constructor(readonly path: string) {}

  async load(): Promise<string> {
    try {
      return await readFile(this.path, 'utf-8');
    } catch (err) {
      throw new FixtureIOError(`Failed to read fixture file: ${this.path}`, this.path, 'read', err);
    }
  }

  /**
   * Apply `edits` to `content` (as loaded at the start of the iteration) and, if
   * at least one applied, replace the file with the full result in a single
   * atomic write.
   */
  async apply(content: string, edits: readonly EditPlanEntry[]): Promise<PatchResult> {
    const result = applyEdits(content, edits);
    if (result.appliedCount === 0) {
      return { ...result, written: false };
    }

    try {
      await atomicWriteFile(this.path, result.content);
    } catch (err) {
      throw new FixtureIOError(`Failed to write fixture file: ${this.path}`, this.path, 'write', err);
    }
    return { ...result, written: true };
  }
}
