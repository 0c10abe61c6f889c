import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

/** Temp directory with a `write(relPath, content)` helper; call `cleanup()` in afterEach */
export function createTempDir() {
  const root = mkdtempSync(path.join(tmpdir(), 'mission-scanner-'));
  return {
    root,
    write(relPath: string, content: string | Buffer): string {
      const full = path.join(root, relPath);
      mkdirSync(path.dirname(full), { recursive: true });
      writeFileSync(full, content);
      return full;
    },
    cleanup(): void {
      rmSync(root, { recursive: true, force: true });
    },
  };
}

export type TempDir = ReturnType<typeof createTempDir>;
