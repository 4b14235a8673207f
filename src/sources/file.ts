import { readFile } from 'node:fs/promises';
import { InfrastructureError, describeError } from '../errors.js';
import type { KeywordSource } from './types.js';

/** One keyword per line. Blank lines and lines starting with `//` are ignored. */
export class FileKeywordSource implements KeywordSource {
  readonly name = 'file';

  constructor(private readonly path: string) {}

  async fetchCandidates(limit?: number): Promise<string[]> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (err) {
      throw new InfrastructureError(`Cannot read keyword file ${this.path}: ${describeError(err)}`, { cause: err });
    }

    const lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '' && !line.startsWith('//'));
    return limit === undefined ? lines : lines.slice(0, limit);
  }
}
