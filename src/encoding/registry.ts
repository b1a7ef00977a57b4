/**
 * Encoding registry
 *
 * Maps canonical encoding names, their aliases and CCSIDs to codecs.
 * Lookups are case-insensitive and ignore punctuation, so "iso-8859-1",
 * "ISO8859-1" and "latin1" all land on the same entry.
 */

import ibm1047Table from './tables/ibm-1047.json';
import iso88591Table from './tables/iso8859-1.json';
import { UnsupportedEncodingError } from '../errors/conversion-errors.js';
import type { Codec, EncodingName } from './codec.js';
import { SingleByteCodec } from './single-byte-codec.js';

export const CCSID_UNTAGGED = 0;
export const CCSID_ISO8859_1 = 819;
export const CCSID_IBM1047 = 1047;

export const ISO8859_1: EncodingName = 'ISO8859-1';
export const IBM_1047: EncodingName = 'IBM-1047';

/**
 * Reduce an encoding name to the key used for lookups.
 */
export function normalizeEncodingName(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

export class EncodingRegistry {
  private readonly byKey = new Map<string, Codec>();
  private readonly byCcsidMap = new Map<number, Codec>();
  private readonly ordered: Codec[] = [];

  /**
   * Add a codec. Its name, aliases and CCSID must not collide with an
   * existing entry.
   */
  register(codec: Codec): this {
    const keys = [codec.name, ...codec.aliases].map(normalizeEncodingName);

    for (const key of keys) {
      const existing = this.byKey.get(key);
      if (existing && existing !== codec) {
        throw new Error(`Encoding name "${key}" is already registered for ${existing.name}`);
      }
    }
    const existingCcsid = this.byCcsidMap.get(codec.ccsid);
    if (existingCcsid) {
      throw new Error(`CCSID ${codec.ccsid} is already registered for ${existingCcsid.name}`);
    }

    for (const key of keys) {
      this.byKey.set(key, codec);
    }
    this.byCcsidMap.set(codec.ccsid, codec);
    this.ordered.push(codec);
    return this;
  }

  lookup(name: string): Codec | undefined {
    return this.byKey.get(normalizeEncodingName(name));
  }

  /**
   * @throws UnsupportedEncodingError when nothing is registered under `name`
   */
  require(name: string): Codec {
    const codec = this.lookup(name);
    if (!codec) {
      throw new UnsupportedEncodingError(name);
    }
    return codec;
  }

  byCcsid(ccsid: number): Codec | undefined {
    return this.byCcsidMap.get(ccsid);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Canonical names in registration order */
  names(): EncodingName[] {
    return this.ordered.map((codec) => codec.name);
  }

  /**
   * True when both names resolve to the same registered encoding.
   */
  isSame(a: string, b: string): boolean {
    const left = this.lookup(a);
    return left !== undefined && left === this.lookup(b);
  }
}

/**
 * Registry holding ISO8859-1 (819) and IBM-1047 (1047).
 */
export function createDefaultRegistry(): EncodingRegistry {
  return new EncodingRegistry()
    .register(SingleByteCodec.fromTable(iso88591Table))
    .register(SingleByteCodec.fromTable(ibm1047Table));
}
