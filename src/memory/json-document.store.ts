/**
 * A single JSON document (e.g. conversations.json) read and rewritten whole.
 *
 * Every read and every load-mutate-save runs inside the store's exclusive
 * section, so two overlapping updates in this process cannot lose a write.
 * A missing, unreadable or malformed document reads as the empty value.
 */
import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { StorageBackend } from './storage.backend';

export class JsonDocumentStore<T> {
  private readonly logger = new Logger(JsonDocumentStore.name);
  // Tail of the exclusive section; each task starts after the previous settles
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly backend: StorageBackend,
    readonly fileName: string,
    private readonly schema: z.ZodType<T>,
    private readonly empty: () => T,
  ) {}

  private exclusive<R>(task: () => Promise<R>): Promise<R> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<T> {
    let raw: string | undefined;
    try {
      raw = await this.backend.read(this.fileName);
    } catch (error) {
      this.logger.warn(`Failed to read ${this.fileName}, treating as empty: ${error}`);
      return this.empty();
    }

    if (raw === undefined) {
      return this.empty();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Malformed JSON in ${this.fileName}, treating as empty: ${error}`);
      return this.empty();
    }

    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        `Unexpected shape in ${this.fileName}, treating as empty: ${parsed.error.issues[0]?.message}`,
      );
      return this.empty();
    }
    return parsed.data;
  }

  private async save(data: T): Promise<void> {
    await this.backend.write(this.fileName, JSON.stringify(data, null, 2));
  }

  /**
   * Current contents of the document.
   */
  read(): Promise<T> {
    return this.exclusive(() => this.load());
  }

  /**
   * Load the document, apply `mutate`, and write the result back.
   * Resolves with what was saved; rejects (without writing) if `mutate` throws.
   */
  update(mutate: (data: T) => T): Promise<T> {
    return this.exclusive(async () => {
      const next = mutate(await this.load());
      await this.save(next);
      return next;
    });
  }

  /**
   * Replace the document without reading it first.
   */
  replace(data: T): Promise<void> {
    return this.exclusive(() => this.save(data));
  }

  /**
   * Resolves once every queued read and update has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
