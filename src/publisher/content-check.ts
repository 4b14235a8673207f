import { readdir, readFile } from 'node:fs/promises';
import { extname, join, relative } from 'node:path';

const CHECKED_EXTENSIONS = new Set(['.html', '.json', '.xml']);

export interface ForbiddenTermHit {
  file: string; // relative to the scanned root
  line: number;
  term: string;
}

/** Every line of a page or feed under `root` that mentions one of `terms`, ignoring case. */
export async function findForbiddenTerms(root: string, terms: readonly string[]): Promise<ForbiddenTermHit[]> {
  const needles = terms.map((t) => t.trim()).filter((t) => t !== '');
  const hits: ForbiddenTermHit[] = [];
  if (needles.length === 0) return hits;

  const visit = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await visit(path);
        continue;
      }
      if (!CHECKED_EXTENSIONS.has(extname(entry.name))) continue;

      const lines = (await readFile(path, 'utf-8')).split('\n');
      lines.forEach((text, i) => {
        const lower = text.toLocaleLowerCase('en-US');
        for (const term of needles) {
          if (lower.includes(term.toLocaleLowerCase('en-US'))) {
            hits.push({ file: relative(root, path), line: i + 1, term });
          }
        }
      });
    }
  };

  await visit(root);
  return hits;
}
