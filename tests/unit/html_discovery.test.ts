import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { findHtmlFiles } from '../../src/fs/htmlDiscovery';
import { atomicWriteFile } from '../../src/fs/atomicWriter';

describe('Unit: export folder access', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'export-folder-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('finds html files recursively in a stable order and skips earlier output', async () => {
    await mkdir(join(root, 'space', 'nested'), { recursive: true });
    await writeFile(join(root, 'space', 'b.html'), '');
    await writeFile(join(root, 'space', 'a.HTML'), '');
    await writeFile(join(root, 'space', 'notes.txt'), '');
    await writeFile(join(root, 'space', 'CONVERTED - a.html'), '');
    await writeFile(join(root, 'space', 'nested', 'c.html'), '');

    expect(await findHtmlFiles(root)).toEqual([
      join(root, 'space', 'a.HTML'),
      join(root, 'space', 'b.html'),
      join(root, 'space', 'nested', 'c.html'),
    ]);
  });

  it('honours a custom output prefix', async () => {
    await writeFile(join(root, 'new_a.html'), '');
    await writeFile(join(root, 'CONVERTED - a.html'), '');

    expect(await findHtmlFiles(root, { outputPrefix: 'new_' })).toEqual([join(root, 'CONVERTED - a.html')]);
  });

  it('writes through a temporary file and leaves no temp file behind', async () => {
    const target = join(root, 'out', 'page.html');

    await atomicWriteFile(target, '<p>ok</p>', { ensureDir: true });

    expect(await readFile(target, 'utf-8')).toBe('<p>ok</p>');
    expect(await readdir(join(root, 'out'))).toEqual(['page.html']);
  });
});
