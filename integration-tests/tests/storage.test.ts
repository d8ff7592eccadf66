/**
 * Storage Tests
 *
 * LocalFileStore against a temporary directory.
 */

import fs from 'fs';
import path from 'path';
import { LocalFileStore, defaultOutputPath } from '@docmeta/shared';
import { makeTempDir, removeDir } from './helpers';

describe('LocalFileStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('reads documents relative to its base directory', async () => {
    fs.writeFileSync(path.join(dir, 'essay.txt'), 'A short essay.', 'utf-8');

    await expect(new LocalFileStore(dir).fetch('essay.txt')).resolves.toBe('A short essay.');
  });

  it('creates parent directories and leaves no temporary files', async () => {
    const store = new LocalFileStore(dir);

    const ack = await store.store('out/nested/record.json', Buffer.from('{"ok":true}', 'utf-8'));

    expect(ack).toEqual({ identifier: path.join(dir, 'out/nested/record.json'), bytes: 11 });
    expect(fs.readFileSync(path.join(dir, 'out/nested/record.json'), 'utf-8')).toBe('{"ok":true}');
    expect(fs.readdirSync(path.join(dir, 'out/nested'))).toEqual(['record.json']);
  });

  it('replaces an existing file', async () => {
    const store = new LocalFileStore(dir);

    await store.store('record.json', Buffer.from('first', 'utf-8'));
    await store.store('record.json', Buffer.from('second', 'utf-8'));

    await expect(store.fetch('record.json')).resolves.toBe('second');
  });

  it('rejects a missing document', async () => {
    await expect(new LocalFileStore(dir).fetch('missing.txt')).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('defaultOutputPath', () => {
  it('replaces the extension with .metadata.json', () => {
    expect(defaultOutputPath('docs/essay.txt', 'output')).toBe(path.join('output', 'essay.metadata.json'));
  });

  it('keeps a name without an extension', () => {
    expect(defaultOutputPath('notes', '/tmp/out')).toBe(path.join('/tmp/out', 'notes.metadata.json'));
  });
});
