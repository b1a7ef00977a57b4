import { asError, getErrorMessage } from '../errors/base-error.js';
import { TagSetError } from '../errors/conversion-errors.js';
import { logger } from '../utils/logger.js';
import { tagsEqual, type CodePageTag, type TagStore } from './tag-store.js';

const log = logger.child('tag-writer');

export interface TagWriterOptions {
  /** Re-query the tag after setting it. Default: true */
  verify?: boolean;
}

/**
 * Applies a tag to a regular-file output. Callers never pass pipes or
 * caller-owned streams here.
 */
export class TagWriter {
  private readonly verify: boolean;

  constructor(
    private readonly store: TagStore,
    options: TagWriterOptions = {}
  ) {
    this.verify = options.verify ?? true;
  }

  /**
   * @throws TagSetError when the store rejects the tag or verification reads back something else
   */
  async tag(file: string, tag: CodePageTag): Promise<void> {
    try {
      await this.store.setTag(file, tag);
    } catch (error) {
      if (error instanceof TagSetError) throw error;
      throw new TagSetError(
        file,
        getErrorMessage(error),
        asError(error)
      );
    }

    if (!this.verify) {
      log.debug(`Tagged ${file}`, { ccsid: tag.ccsid, isText: tag.isText });
      return;
    }

    let actual: CodePageTag;
    try {
      actual = await this.store.queryTag(file);
    } catch (error) {
      throw new TagSetError(
        file,
        `verification query failed: ${getErrorMessage(error)}`,
        asError(error)
      );
    }

    if (!tagsEqual(actual, tag)) {
      throw new TagSetError(
        file,
        `verification failed: expected CCSID ${tag.ccsid} (text=${tag.isText}), found CCSID ${actual.ccsid} (text=${actual.isText})`
      );
    }

    log.debug(`Tagged and verified ${file}`, { ccsid: tag.ccsid, isText: tag.isText });
  }
}
