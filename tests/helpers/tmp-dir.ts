import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Creates a scratch directory per test and removes it afterwards
 */
export function useTmpDir(prefix = 'devloop-'): () => string {
  let dir = '';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  return () => dir;
}
