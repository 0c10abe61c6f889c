/**
 * Mission-entry (.ext) analyzer, line by line.
 * Classes are `class Name` statements at line start; "equipment" here is the
 * list of #include targets.
 */
import type { Extraction } from '../types.js';
import { readFileLines } from '../utils/file-utils.js';
import { BaseAnalyzer } from './base-analyzer.js';

const CLASS_LINE = /^\s*class\s+([\p{L}\p{N}_]+)/u;
const INCLUDE = /#include\s+"([^"]+)"/;

export function extractExt(lines: readonly string[]): Extraction {
  const classes: string[] = [];
  const equipment = new Set<string>();

  for (const line of lines) {
    const classMatch = CLASS_LINE.exec(line);
    if (classMatch) classes.push(classMatch[1]);

    const includeMatch = INCLUDE.exec(line);
    if (includeMatch) equipment.add(includeMatch[1]);
  }

  return { classes, equipment };
}

export class ExtAnalyzer extends BaseAnalyzer {
  readonly dialect = 'ext' as const;

  protected extract(filePath: string): Extraction {
    return extractExt(readFileLines(filePath));
  }
}
