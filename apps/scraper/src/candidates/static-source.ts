import { readFile } from 'node:fs/promises';
import type { CandidateSource } from './types.js';

export interface StaticCandidateSourceOptions {
  urls?: readonly string[];
  /** One URL per line; blank lines and `#` comments are ignored. */
  file?: string;
}

export function parseCandidateList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Fixed candidate list, independent of the query.
 */
export class StaticCandidateSource implements CandidateSource {
  readonly name = 'static';
  private readonly urls: readonly string[];
  private readonly file?: string;

  constructor(options: StaticCandidateSourceOptions) {
    this.urls = options.urls ?? [];
    this.file = options.file;
  }

  async collect(): Promise<string[]> {
    const fromFile = this.file ? parseCandidateList(await readFile(this.file, 'utf-8')) : [];
    return [...this.urls, ...fromFile];
  }
}
