/**
 * Shared types for analyzers, the scanner and the report layer
 */

// ── Dialects ──────────────────────────────────────────────

/** sqf = scripted commands, hpp = structured config, ext = mission entry */
export type Dialect = 'sqf' | 'hpp' | 'ext';

// ── Results ───────────────────────────────────────────────

/** Per-file scan record. `error` is set only when analysis failed. */
export interface AnalysisResult {
  file: string;
  /** In order of appearance, duplicates kept */
  classes: string[];
  equipment: ReadonlySet<string>;
  error?: string;
}

export type AnalysisOutcome =
  | { success: true; data: AnalysisResult }
  | { success: false; file: string; error: string };

/** What a dialect analyzer extracts from one file */
export interface Extraction {
  classes: string[];
  equipment: Set<string>;
}

export interface ScanSummary {
  files: number;
  failed: number;
  byType: Record<string, number>;
  distinctClasses: number;
  distinctEquipment: number;
}

export function failedResult(file: string, error: string): AnalysisResult {
  return { file, classes: [], equipment: new Set(), error };
}
