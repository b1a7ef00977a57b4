/**
 * Tag Store contract
 *
 * A Tag Store reads and writes the code page tag (CCSID plus text flag)
 * attached to a named regular file. Pipes and unnamed streams cannot carry
 * a tag and are never passed to a store.
 */

export interface CodePageTag {
  ccsid: number;
  isText: boolean;
}

export const UNTAGGED: Readonly<CodePageTag> = Object.freeze({ ccsid: 0, isText: false });

export interface TagStore {
  /** Short identifier used in log lines */
  readonly name: string;
  queryTag(path: string): Promise<CodePageTag>;
  setTag(path: string, tag: CodePageTag): Promise<void>;
}

export function isUntagged(tag: CodePageTag): boolean {
  return tag.ccsid === 0;
}

export function tagsEqual(a: CodePageTag, b: CodePageTag): boolean {
  return a.ccsid === b.ccsid && a.isText === b.isText;
}
