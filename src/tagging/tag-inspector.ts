/**
 * Tag Inspector
 *
 * Best-effort tag lookup. A failed query is an expected outcome (permission
 * denied, a filesystem without tags, a platform without tagging) and comes
 * back as the untagged tag instead of an error.
 */

import type { EncodingName } from '../encoding/codec.js';
import type { EncodingRegistry } from '../encoding/registry.js';
import { getErrorMessage } from '../errors/base-error.js';
import { logger } from '../utils/logger.js';
import { UNTAGGED, type CodePageTag, type TagStore } from './tag-store.js';

const log = logger.child('tag-inspector');

export interface TagInfo extends CodePageTag {
  /** Canonical encoding name, "untagged", or "CCSID-<n>" for unregistered ids */
  encodingName: EncodingName | 'untagged';
}

export function describeTag(tag: CodePageTag, registry: EncodingRegistry): TagInfo {
  if (tag.ccsid === 0) {
    return { ...tag, encodingName: 'untagged' };
  }
  const codec = registry.byCcsid(tag.ccsid);
  return { ...tag, encodingName: codec ? codec.name : `CCSID-${tag.ccsid}` };
}

export class TagInspector {
  constructor(
    private readonly store: TagStore,
    private readonly registry: EncodingRegistry
  ) {}

  /**
   * Tag of a regular file, or UNTAGGED when the store cannot answer.
   */
  async inspect(file: string): Promise<CodePageTag> {
    try {
      const tag = await this.store.queryTag(file);
      if (!Number.isInteger(tag.ccsid) || tag.ccsid < 0) {
        log.debug(`Ignoring invalid CCSID from ${this.store.name} store`, { file, ccsid: tag.ccsid });
        return { ...UNTAGGED };
      }
      log.debug(`Tag query for ${file}`, { ccsid: tag.ccsid, isText: tag.isText });
      return { ccsid: tag.ccsid, isText: tag.isText };
    } catch (error) {
      log.debug(`Tag query failed for ${file}, treating as untagged`, {
        store: this.store.name,
        error: getErrorMessage(error),
      });
      return { ...UNTAGGED };
    }
  }

  async inspectInfo(file: string): Promise<TagInfo> {
    return describeTag(await this.inspect(file), this.registry);
  }
}
