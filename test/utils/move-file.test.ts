import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { rename, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { moveFile } from '../../src/utils/filesystem.js';

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    rename: vi.fn(actual.rename),
    unlink: vi.fn(actual.unlink),
  };
});

function errno(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe('moveFile across volumes', () => {
  let dir: string;
  let source: string;
  let target: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'autoprint-move-'));
    source = join(dir, 'invoice_42.pdf');
    target = join(dir, 'archived.pdf');
    writeFileSync(source, 'content');
    vi.mocked(rename).mockRejectedValueOnce(errno('EXDEV', 'cross-device link not permitted'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('copies then removes the source', async () => {
    await moveFile(source, target);

    expect(existsSync(source)).toBe(false);
    expect(readFileSync(target, 'utf-8')).toBe('content');
  });

  it('removes the copy when the source cannot be deleted', async () => {
    vi.mocked(unlink).mockRejectedValueOnce(errno('EPERM', 'operation not permitted'));

    await expect(moveFile(source, target)).rejects.toThrow('operation not permitted');

    expect(existsSync(source)).toBe(true);
    expect(existsSync(target)).toBe(false);
  });

  it('can be retried after a failed delete', async () => {
    vi.mocked(unlink).mockRejectedValueOnce(errno('EPERM', 'operation not permitted'));
    await expect(moveFile(source, target)).rejects.toThrow('operation not permitted');

    vi.mocked(rename).mockRejectedValueOnce(errno('EXDEV', 'cross-device link not permitted'));
    await moveFile(source, target);

    expect(existsSync(source)).toBe(false);
    expect(readFileSync(target, 'utf-8')).toBe('content');
  });
});
