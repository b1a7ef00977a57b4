import { TagQueryError, TagSetError } from '../errors/conversion-errors.js';
import type { CodePageTag, TagStore } from './tag-store.js';

/**
 * Tag Store for platforms without file tagging. Every call rejects, which the
 * inspector reads as "untagged" and the orchestrator reports as a tag error.
 */
export class UnsupportedTagStore implements TagStore {
  readonly name = 'unsupported';

  constructor(private readonly platform: string = process.platform) {}

  async queryTag(file: string): Promise<CodePageTag> {
    throw new TagQueryError(file, `file tagging is not available on ${this.platform}`);
  }

  async setTag(file: string, _tag: CodePageTag): Promise<void> {
    throw new TagSetError(file, `file tagging is not available on ${this.platform}`);
  }
}
