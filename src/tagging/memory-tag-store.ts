import * as path from 'path';
import { UNTAGGED, type CodePageTag, type TagStore } from './tag-store.js';

/**
 * Tag Store that keeps tags in a map keyed by absolute path.
 *
 * Used as the test double for the engine and on hosts without native file
 * tagging when callers still want tag round-trips to behave.
 */
export class MemoryTagStore implements TagStore {
  readonly name = 'memory';
  private readonly tags = new Map<string, CodePageTag>();

  constructor(initial: Record<string, CodePageTag> = {}) {
    for (const [file, tag] of Object.entries(initial)) {
      this.tags.set(path.resolve(file), { ...tag });
    }
  }

  async queryTag(file: string): Promise<CodePageTag> {
    const tag = this.tags.get(path.resolve(file));
    return tag ? { ...tag } : { ...UNTAGGED };
  }

  async setTag(file: string, tag: CodePageTag): Promise<void> {
    const key = path.resolve(file);
    if (tag.ccsid === 0) {
      this.tags.delete(key);
      return;
    }
    this.tags.set(key, { ...tag });
  }

  get size(): number {
    return this.tags.size;
  }

  clear(): void {
    this.tags.clear();
  }
}
