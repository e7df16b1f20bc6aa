import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Creates a scratch directory under the OS temp dir.
 */
export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `strata-${prefix}-`));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Writes `files` (relative path → content) under `root`, creating directories.
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}

/** Two versions of a small orders package */
export const ORDERS_PACKAGE: Record<string, string> = {
  'v1_initial/items.yaml': [
    'tables:',
    '  - name: ITEMS',
    '    changes:',
    '      - change: add',
    '    columns:',
    '      - name: Id',
    '        type: int',
  ].join('\n'),
  'v2/items.yaml': [
    'tables:',
    '  - name: ITEMS',
    '    columns:',
    '      - name: Id',
    '        type: int',
    '      - name: Qty',
    '        type: int',
    '        changes:',
    '          - change: add',
  ].join('\n'),
  'v2/price.yaml': [
    'table:',
    '  name: PRICE',
    '  after: ITEMS',
    '  changes:',
    '    - change: add',
    '  columns:',
    '    - name: Price',
    '      type: float',
    'changes:',
    '  - change: sql',
    '    after: PRICE',
    '    affects: PRICE',
    '    dialects:',
    '      - platforms: postgresql',
    '        sql: UPDATE PRICE SET Price = 0',
    '    sql: UPDATE PRICE SET Price = 1',
  ].join('\n'),
};
