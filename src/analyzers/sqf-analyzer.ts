/**
 * Scripted-command (.sqf) analyzer: every quoted literal is an equipment
 * reference. The dialect has no class syntax, so `classes` stays empty.
 */
import type { Extraction } from '../types.js';
import { readFileLines } from '../utils/file-utils.js';
import { BaseAnalyzer, quotedStrings } from './base-analyzer.js';

export function extractSqf(lines: readonly string[]): Extraction {
  const equipment = new Set<string>();
  for (const line of lines) {
    for (const item of quotedStrings(line)) equipment.add(item);
  }
  return { classes: [], equipment };
}

export class SqfAnalyzer extends BaseAnalyzer {
  readonly dialect = 'sqf' as const;

  protected extract(filePath: string): Extraction {
    return extractSqf(readFileLines(filePath));
  }
}
