/**
 * Where the memory documents live. The file backend keeps one JSON file per
 * document in a directory; the in-memory backend is used by tests and by
 * callers that want a throwaway store.
 */
import * as fsPromises from 'fs/promises';
import * as path from 'path';

export interface StorageBackend {
  open(): Promise<void>;
  close(): Promise<void>;
  /** Raw document text, or undefined when the document does not exist yet. */
  read(name: string): Promise<string | undefined>;
  write(name: string, content: string): Promise<void>;
  describe(): string;
}

/**
 * Token for injecting a custom backend into MemoryStorageService
 */
export const MEMORY_STORAGE_BACKEND = Symbol('MEMORY_STORAGE_BACKEND');

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStorageBackend implements StorageBackend {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async open(): Promise<void> {
    await fsPromises.mkdir(this.directory, { recursive: true });
  }

  async close(): Promise<void> {
    // Nothing is held open between operations
  }

  async read(name: string): Promise<string | undefined> {
    try {
      return await fsPromises.readFile(path.join(this.directory, name), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async write(name: string, content: string): Promise<void> {
    await fsPromises.writeFile(path.join(this.directory, name), content, 'utf-8');
  }

  describe(): string {
    return this.directory;
  }
}

export class InMemoryStorageBackend implements StorageBackend {
  private readonly documents = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, content] of Object.entries(initial)) {
      this.documents.set(name, content);
    }
  }

  async open(): Promise<void> {}

  async close(): Promise<void> {}

  async read(name: string): Promise<string | undefined> {
    return this.documents.get(name);
  }

  async write(name: string, content: string): Promise<void> {
    this.documents.set(name, content);
  }

  describe(): string {
    return 'in-memory';
  }
}
