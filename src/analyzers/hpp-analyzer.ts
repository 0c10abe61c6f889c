/**
 * Structured-config (.hpp) analyzer
 *
 * Finds `class Name [: Parent] {` headers, delimits each body by brace depth
 * and collects quoted literals and `LIST_n("item")` macro arguments inside it.
 * Bodies are not exclusive: a nested class's items also count for every
 * enclosing class.
 */
import type { Extraction } from '../types.js';
import { readFileContent, resolveSamplePath } from '../utils/file-utils.js';
import { BaseAnalyzer, quotedStrings } from './base-analyzer.js';

const CLASS_HEADER = /(?<![\p{L}\p{N}_])class\s+([\p{L}\p{N}_]+)\s*(?::\s*[\p{L}\p{N}_]+)?\s*\{/gu;
const LIST_MACRO = /LIST_\d+\("([^"]+)"\)/g;

/**
 * End index (exclusive) of a body whose opening brace ends just before `start`.
 * Depth starts at 1; an unbalanced body runs to the end of the text.
 */
export function findBodyEnd(content: string, start: number): number {
  let depth = 1;
  for (let i = start; i < content.length; i++) {
    const ch = content[i];
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return content.length;
}

export function extractHpp(content: string): Extraction {
  const classes: string[] = [];
  const equipment = new Set<string>();

  for (const header of content.matchAll(CLASS_HEADER)) {
    classes.push(header[1]);

    const start = (header.index ?? 0) + header[0].length;
    const body = content.slice(start, findBodyEnd(content, start));

    for (const item of quotedStrings(body)) equipment.add(item);
    for (const m of body.matchAll(LIST_MACRO)) equipment.add(m[1]);
  }

  return { classes, equipment };
}

export class HppAnalyzer extends BaseAnalyzer {
  readonly dialect = 'hpp' as const;

  constructor(private readonly sampleDir?: string) {
    super();
  }

  override locate(filePath: string): string {
    return super.locate(resolveSamplePath(filePath, this.sampleDir));
  }

  protected extract(filePath: string): Extraction {
    return extractHpp(readFileContent(this.locate(filePath)));
  }
}
