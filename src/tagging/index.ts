/**
 * File tagging: Tag Store implementations, inspector and writer
 */

import type { EncodingRegistry } from '../encoding/registry.js';
import { createDefaultRegistry } from '../encoding/registry.js';
import { ChtagTagStore } from './chtag-tag-store.js';
import type { TagStore } from './tag-store.js';
import { UnsupportedTagStore } from './unsupported-tag-store.js';

export * from './tag-store.js';
export * from './memory-tag-store.js';
export * from './chtag-tag-store.js';
export * from './unsupported-tag-store.js';
export * from './tag-inspector.js';
export * from './tag-writer.js';

/**
 * `chtag` on z/OS (Node reports it as "os390"), an always-failing store elsewhere.
 */
export function createDefaultTagStore(
  platform: string = process.platform,
  registry: EncodingRegistry = createDefaultRegistry()
): TagStore {
  if (platform === 'os390') {
    return new ChtagTagStore(registry);
  }
  return new UnsupportedTagStore(platform);
}
