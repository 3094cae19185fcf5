import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileStorageBackend, InMemoryStorageBackend } from './storage.backend';

describe('FileStorageBackend', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'memory-backend-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('creates its directory on open', async () => {
    const directory = path.join(root, 'nested', 'memory');
    const backend = new FileStorageBackend(directory);

    await backend.open();

    expect(fs.statSync(directory).isDirectory()).toBe(true);
    expect(backend.describe()).toBe(path.resolve(directory));
  });

  it('reads a document that does not exist as undefined', async () => {
    const backend = new FileStorageBackend(root);
    await backend.open();

    await expect(backend.read('conversations.json')).resolves.toBeUndefined();
  });

  it('writes and reads back a document', async () => {
    const backend = new FileStorageBackend(root);
    await backend.open();

    await backend.write('user_summaries.json', '{}');

    await expect(backend.read('user_summaries.json')).resolves.toBe('{}');
    expect(fs.readFileSync(path.join(root, 'user_summaries.json'), 'utf-8')).toBe('{}');
  });

  it('surfaces read errors other than a missing file', async () => {
    fs.mkdirSync(path.join(root, 'conversations.json'));
    const backend = new FileStorageBackend(root);

    await expect(backend.read('conversations.json')).rejects.toThrow();
  });
});

describe('InMemoryStorageBackend', () => {
  it('starts from the given documents', async () => {
    const backend = new InMemoryStorageBackend({ 'a.json': '[]' });

    await expect(backend.read('a.json')).resolves.toBe('[]');
    await expect(backend.read('b.json')).resolves.toBeUndefined();
    expect(backend.describe()).toBe('in-memory');
  });
});
