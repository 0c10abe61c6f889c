export { BaseAnalyzer } from './analyzers/base-analyzer.js';
export { ExtAnalyzer, extractExt } from './analyzers/ext-analyzer.js';
export { extractHpp, findBodyEnd, HppAnalyzer } from './analyzers/hpp-analyzer.js';
export { extractSqf, SqfAnalyzer } from './analyzers/sqf-analyzer.js';
export { FileNotFoundError, NotAFileError, UnsupportedFileTypeError } from './errors.js';
export { parseJson, renderJson, renderText, summarize } from './report.js';
export { Scanner, type ScannerOptions } from './scanner.js';
export type { AnalysisOutcome, AnalysisResult, Dialect, Extraction, ScanSummary } from './types.js';
export { getFileType, readFileContent, readFileLines, resolveSamplePath } from './utils/file-utils.js';
