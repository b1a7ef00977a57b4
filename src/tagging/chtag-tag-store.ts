/**
 * Tag Store backed by the z/OS `chtag` command.
 *
 * Query:  chtag -p <file>            e.g. "t IBM-1047    T=on  data.txt"
 * Set:    chtag -tc <ccsid> <file>   text
 *         chtag -bc <ccsid> <file>   binary
 * Remove: chtag -r <file>
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { asError } from '../errors/base-error.js';
import { TagQueryError, TagSetError } from '../errors/conversion-errors.js';
import type { EncodingRegistry } from '../encoding/registry.js';
import { CCSID_UNTAGGED } from '../encoding/registry.js';
import type { CodePageTag, TagStore } from './tag-store.js';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandOutput>;

export const execFileRunner: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, args, { encoding: 'utf8' });
  return { stdout, stderr };
};

export interface ChtagTagStoreOptions {
  /** Defaults to "chtag" on PATH */
  command?: string;
  runner?: CommandRunner;
}

const LISTING_PATTERN = /^([-tbm])\s+(\S+)\s+T=(on|off)\b/;

export class ChtagTagStore implements TagStore {
  readonly name = 'chtag';
  private readonly command: string;
  private readonly runner: CommandRunner;

  constructor(
    private readonly registry: EncodingRegistry,
    options: ChtagTagStoreOptions = {}
  ) {
    this.command = options.command ?? 'chtag';
    this.runner = options.runner ?? execFileRunner;
  }

  async queryTag(file: string): Promise<CodePageTag> {
    let output: CommandOutput;
    try {
      output = await this.runner(this.command, ['-p', file]);
    } catch (error) {
      throw new TagQueryError(file, describeFailure(error), asError(error));
    }

    const line = output.stdout.split('\n').find((entry) => entry.trim().length > 0);
    const match = line ? LISTING_PATTERN.exec(line.trim()) : null;
    if (!match) {
      throw new TagQueryError(file, `unexpected ${this.command} output: ${output.stdout.trim()}`);
    }

    const [, type, codeset, textFlag] = match;
    if (type === '-' || codeset.toLowerCase() === 'untagged') {
      return { ccsid: CCSID_UNTAGGED, isText: textFlag === 'on' };
    }

    return { ccsid: this.codesetToCcsid(file, codeset), isText: textFlag === 'on' };
  }

  async setTag(file: string, tag: CodePageTag): Promise<void> {
    const args =
      tag.ccsid === CCSID_UNTAGGED
        ? ['-r', file]
        : [tag.isText ? '-tc' : '-bc', String(tag.ccsid), file];

    try {
      await this.runner(this.command, args);
    } catch (error) {
      throw new TagSetError(file, describeFailure(error), asError(error));
    }
  }

  private codesetToCcsid(file: string, codeset: string): number {
    const codec = this.registry.lookup(codeset);
    if (codec) return codec.ccsid;

    if (/^\d+$/.test(codeset)) return Number(codeset);

    throw new TagQueryError(file, `unrecognized coded character set "${codeset}"`);
  }
}

function describeFailure(error: unknown): string {
  const failure = asError(error);
  if (failure) {
    const stderr = 'stderr' in failure && typeof failure.stderr === 'string' ? failure.stderr.trim() : '';
    return stderr || failure.message;
  }
  return String(error);
}
