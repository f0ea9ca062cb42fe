import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LocalArtifactStorage } from './local-artifact-storage.provider';
import { FileNotFoundError, StorageError } from '../errors';

describe('LocalArtifactStorage', () => {
  let dir: string;
  let storage: LocalArtifactStorage;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'local-artifacts-'));
    storage = new LocalArtifactStorage(join(dir, 'store'));
    await storage.ensureAvailable();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes and reads objects under nested keys', async () => {
    await storage.putObject('artifacts/ab/bundle.json', Buffer.from('{"ok":true}'), 'application/json');

    await expect(storage.objectExists('artifacts/ab/bundle.json')).resolves.toBe(true);
    const body = await storage.getObjectAsBuffer('artifacts/ab/bundle.json');
    expect(body.toString('utf8')).toBe('{"ok":true}');
    await expect(readdir(join(dir, 'store', 'artifacts', 'ab'))).resolves.toEqual(['bundle.json']);
  });

  it('raises FileNotFoundError for missing objects', async () => {
    await expect(storage.getObjectAsBuffer('artifacts/zz/missing.json')).rejects.toThrow(
      new FileNotFoundError('artifacts/zz/missing.json'),
    );
    await expect(storage.getObjectAsBuffer('artifacts/zz/missing.json')).rejects.toBeInstanceOf(
      FileNotFoundError,
    );
  });

  it('reports whether a delete removed anything', async () => {
    await storage.putObject('a.json', Buffer.from('1'), 'application/json');

    await expect(storage.deleteObject('a.json')).resolves.toBe(true);
    await expect(storage.deleteObject('a.json')).resolves.toBe(false);
    await expect(storage.objectExists('a.json')).resolves.toBe(false);
  });

  it('refuses keys outside the storage directory', async () => {
    await expect(storage.putObject('../escape.json', Buffer.from('x'), 'application/json')).rejects.toThrow(
      StorageError,
    );
    await expect(storage.objectExists('../escape.json')).rejects.toThrow(
      'Artifact key escapes storage directory: ../escape.json',
    );
  });
});
