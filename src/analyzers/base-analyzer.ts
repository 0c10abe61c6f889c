import { errorMessage } from '../errors.js';
import type { AnalysisOutcome, AnalysisResult, Dialect, Extraction } from '../types.js';
import { failedResult } from '../types.js';
import { validateFile } from '../utils/file-utils.js';
import logger from '../utils/logger.js';

/** Double-quoted literal, no escapes */
export const QUOTED_STRING = /"([^"]+)"/g;

export function quotedStrings(text: string): string[] {
  return Array.from(text.matchAll(QUOTED_STRING), m => m[1]);
}

/**
 * One analyzer per dialect. `run` and `analyze` never throw: any failure while
 * reading or matching becomes an error outcome for that file.
 */
export abstract class BaseAnalyzer {
  abstract readonly dialect: Dialect;

  /**
   * Path the analyzer will actually read. Throws FileNotFoundError / NotAFileError.
   */
  locate(filePath: string): string {
    validateFile(filePath);
    return filePath;
  }

  protected abstract extract(filePath: string): Extraction;

  run(filePath: string): AnalysisOutcome {
    try {
      const { classes, equipment } = this.extract(filePath);
      return { success: true, data: { file: filePath, classes, equipment } };
    } catch (e) {
      const error = errorMessage(e);
      logger.warn(`Analysis failed for ${filePath}: ${error}`, { module: this.dialect });
      return { success: false, file: filePath, error };
    }
  }

  analyze(filePath: string): AnalysisResult {
    const outcome = this.run(filePath);
    return outcome.success ? outcome.data : failedResult(outcome.file, outcome.error);
  }
}
