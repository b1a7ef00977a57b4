/**
 * Encoding Resolver
 *
 * Decides the effective source encoding of a request and whether its bytes
 * have to be transcoded. Precedence:
 *
 *   1. explicit source override
 *   2. the tag of a regular-file input (untagged: assume the target)
 *   3. nothing: pipes and special streams cannot be inspected
 */

import type { EncodingRegistry } from '../encoding/registry.js';
import { UnspecifiedEncodingError, UnsupportedEncodingError } from '../errors/conversion-errors.js';
import type { TagInspector } from '../tagging/tag-inspector.js';
import { logger } from '../utils/logger.js';
import type { ConversionRequest, Resolution } from './types.js';
import { describeLocator } from './types.js';

const log = logger.child('resolver');

export interface EncodingResolverOptions {
  /** Encoding assumed for untagged files; unset means "already the target" */
  untaggedSource?: string;
  unknownTagPolicy?: 'copy' | 'fail';
  /** Target used when a request names none */
  defaultTarget?: string;
}

export class EncodingResolver {
  private readonly untaggedSource?: string;
  private readonly unknownTagPolicy: 'copy' | 'fail';
  private readonly defaultTarget: string;

  constructor(
    private readonly registry: EncodingRegistry,
    private readonly inspector: TagInspector,
    options: EncodingResolverOptions = {}
  ) {
    this.untaggedSource = options.untaggedSource;
    this.unknownTagPolicy = options.unknownTagPolicy ?? 'copy';
    this.defaultTarget = options.defaultTarget ?? 'IBM-1047';
  }

  /**
   * @throws UnspecifiedEncodingError for a non-regular input without an override
   * @throws UnsupportedEncodingError for unregistered names, or unregistered tags under the "fail" policy
   */
  async resolve(request: ConversionRequest): Promise<Resolution> {
    const target = this.registry.require(request.target ?? this.defaultTarget);

    if (request.sourceOverride !== undefined) {
      const source = this.registry.require(request.sourceOverride);
      return this.finish({ source: source.name, target: target.name, resolvedBy: 'override' });
    }

    const { input } = request;
    switch (input.kind) {
      case 'regular-file': {
        const tag = await this.inspector.inspect(input.locator);

        if (tag.ccsid === 0) {
          const assumed = this.untaggedSource ? this.registry.require(this.untaggedSource) : target;
          return this.finish({
            source: assumed.name,
            target: target.name,
            resolvedBy: 'untagged-default',
            tag,
          });
        }

        const tagged = this.registry.byCcsid(tag.ccsid);
        if (tagged) {
          return this.finish({ source: tagged.name, target: target.name, resolvedBy: 'tag', tag });
        }

        if (this.unknownTagPolicy === 'fail') {
          throw new UnsupportedEncodingError(tag.ccsid);
        }
        log.debug(`Unregistered CCSID ${tag.ccsid} on ${input.locator}, copying verbatim`);
        return this.finish({
          source: target.name,
          target: target.name,
          resolvedBy: 'unrecognized-tag',
          tag,
        });
      }
      case 'named-pipe':
      case 'special-stream':
        throw new UnspecifiedEncodingError(describeLocator(input), input.kind);
    }
  }

  private finish(resolution: Omit<Resolution, 'needsConversion'>): Resolution {
    const needsConversion = !this.registry.isSame(resolution.source, resolution.target);
    log.debug('Resolved encoding', { ...resolution, needsConversion });
    return { ...resolution, needsConversion };
  }
}
