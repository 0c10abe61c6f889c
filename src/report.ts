/**
 * Report rendering (text / JSON), JSON read-back and scan summaries
 */
import { ResultRecords } from './schemas.js';
import type { AnalysisResult, ScanSummary } from './types.js';
import { getFileType } from './utils/file-utils.js';

const sorted = (items: Iterable<string>): string[] => [...items].sort();

export function renderText(results: readonly AnalysisResult[]): string {
  const lines: string[] = [];
  for (const result of results) {
    lines.push('', `File: ${result.file}`);
    if (result.error !== undefined) lines.push(`Error: ${result.error}`);
    lines.push('Classes:');
    for (const cls of result.classes) lines.push(`  - ${cls}`);
    lines.push('Equipment:');
    for (const item of sorted(result.equipment)) lines.push(`  - ${item}`);
  }
  return lines.join('\n');
}

export function renderJson(results: readonly AnalysisResult[]): string {
  const records = results.map(r => ({
    file: r.file,
    classes: r.classes,
    equipment: sorted(r.equipment),
    ...(r.error !== undefined ? { error: r.error } : {}),
  }));
  return JSON.stringify(records, null, 2);
}

/** Inverse of renderJson. Throws ZodError / SyntaxError on malformed input. */
export function parseJson(text: string): AnalysisResult[] {
  return ResultRecords.parse(JSON.parse(text)).map(({ equipment, error, ...rest }) => ({
    ...rest,
    equipment: new Set(equipment),
    ...(error !== undefined ? { error } : {}),
  }));
}

export function summarize(results: readonly AnalysisResult[]): ScanSummary {
  const byType: Record<string, number> = {};
  const classes = new Set<string>();
  const equipment = new Set<string>();
  let failed = 0;

  for (const r of results) {
    const type = getFileType(r.file) || '(none)';
    byType[type] = (byType[type] ?? 0) + 1;
    if (r.error !== undefined) {
      failed++;
      continue;
    }
    for (const cls of r.classes) classes.add(cls);
    for (const item of r.equipment) equipment.add(item);
  }

  return {
    files: results.length,
    failed,
    byType,
    distinctClasses: classes.size,
    distinctEquipment: equipment.size,
  };
}
