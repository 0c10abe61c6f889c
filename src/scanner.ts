/**
 * Scanner — picks an analyzer by file extension and aggregates results
 * over file lists and directory trees.
 */
import { type Dirent, existsSync, readdirSync, statSync } from 'node:fs';
import path from 'node:path';
import type { BaseAnalyzer } from './analyzers/base-analyzer.js';
import { ExtAnalyzer } from './analyzers/ext-analyzer.js';
import { HppAnalyzer } from './analyzers/hpp-analyzer.js';
import { SqfAnalyzer } from './analyzers/sqf-analyzer.js';
import { errorMessage, FileNotFoundError, NotAFileError, UnsupportedFileTypeError } from './errors.js';
import type { AnalysisResult } from './types.js';
import { failedResult } from './types.js';
import { getFileType } from './utils/file-utils.js';
import logger from './utils/logger.js';

export interface ScannerOptions {
  /** Fallback directory for .hpp files that do not exist at the given path */
  sampleDataDir?: string;
}

export class Scanner {
  private readonly analyzers: ReadonlyMap<string, BaseAnalyzer>;

  constructor(options: ScannerOptions = {}) {
    this.analyzers = new Map<string, BaseAnalyzer>([
      ['sqf', new SqfAnalyzer()],
      ['hpp', new HppAnalyzer(options.sampleDataDir)],
      ['ext', new ExtAnalyzer()],
    ]);
  }

  get supportedExtensions(): string[] {
    return [...this.analyzers.keys()];
  }

  getAnalyzer(filePath: string): BaseAnalyzer | undefined {
    return this.analyzers.get(getFileType(filePath));
  }

  /**
   * Analyze one file. Unsupported extensions and missing / non-regular paths
   * throw; anything that goes wrong during analysis is in the record's `error`.
   */
  scan(filePath: string): AnalysisResult {
    const analyzer = this.getAnalyzer(filePath);
    if (!analyzer) throw new UnsupportedFileTypeError(filePath, getFileType(filePath));

    analyzer.locate(filePath);
    return analyzer.analyze(filePath);
  }

  /** One record per path, in input order. Never throws. */
  scanMany(filePaths: readonly string[]): AnalysisResult[] {
    return filePaths.map(filePath => {
      try {
        return this.scan(filePath);
      } catch (e) {
        const error = errorMessage(e);
        logger.warn(`Skipping ${filePath}: ${error}`, { module: 'scanner' });
        return failedResult(filePath, error);
      }
    });
  }

  scanDirectory(root: string): AnalysisResult[] {
    if (!existsSync(root)) throw new FileNotFoundError(root, `Directory not found: ${root}`);
    if (!statSync(root).isDirectory()) throw new NotAFileError(root, `Path is not a directory: ${root}`);

    const files = this.collectFiles(root);
    logger.info(`Found ${files.length} mission file(s) in ${root}`, { module: 'scanner' });
    return this.scanMany(files);
  }

  /**
   * Files with a registered extension, depth-first, entries in name order.
   * A directory that cannot be listed contributes nothing.
   */
  collectFiles(dir: string): string[] {
    const files: string[] = [];
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (e) {
      logger.warn(`Cannot read ${dir}: ${errorMessage(e)}`, { module: 'scanner' });
      return files;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...this.collectFiles(full));
      } else if (this.analyzers.has(getFileType(entry.name)) && (entry.isFile() || isSymlinkToFile(full))) {
        files.push(full);
      }
    }
    return files;
  }
}

function isSymlinkToFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    // dangling link
    return false;
  }
}
