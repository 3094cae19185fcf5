/**
 * Owns the two memory documents and their lifecycle. Opened on module init
 * with the configured directory (or an injected backend) and closed at
 * application shutdown once pending writes settle. Profile and conversation
 * services go through this; nothing else touches the files.
 */
import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { JsonDocumentStore } from './json-document.store';
import {
  ConversationLogSchema,
  ConversationRecord,
  UserSummaries,
  UserSummariesSchema,
} from './memory.types';
import { FileStorageBackend, MEMORY_STORAGE_BACKEND, StorageBackend } from './storage.backend';

export const USER_SUMMARIES_FILE = 'user_summaries.json';
export const CONVERSATIONS_FILE = 'conversations.json';

interface OpenStores {
  backend: StorageBackend;
  profiles: JsonDocumentStore<UserSummaries>;
  conversations: JsonDocumentStore<ConversationRecord[]>;
}

@Injectable()
export class MemoryStorageService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(MemoryStorageService.name);
  private stores: OpenStores | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Optional()
    @Inject(MEMORY_STORAGE_BACKEND)
    private readonly injectedBackend?: StorageBackend,
  ) {}

  async onModuleInit() {
    await this.open();
  }

  // Runs after every onModuleDestroy hook, so background memory work has drained
  async onApplicationShutdown() {
    await this.close();
  }

  /**
   * Open the stores. An explicit directory wins over the injected backend,
   * which wins over the configured directory.
   */
  async open(directory?: string): Promise<void> {
    if (this.stores) {
      await this.close();
    }

    const backend = directory
      ? new FileStorageBackend(directory)
      : this.injectedBackend ?? new FileStorageBackend(this.configService.getMemoryConfig().directory);

    await backend.open();
    this.stores = {
      backend,
      profiles: new JsonDocumentStore<UserSummaries>(
        backend,
        USER_SUMMARIES_FILE,
        UserSummariesSchema,
        () => ({}),
      ),
      conversations: new JsonDocumentStore<ConversationRecord[]>(
        backend,
        CONVERSATIONS_FILE,
        ConversationLogSchema,
        () => [],
      ),
    };
    this.logger.log(`Memory storage opened (${backend.describe()})`);
  }

  /**
   * Wait for queued writes, then release the backend. Safe to call twice.
   */
  async close(): Promise<void> {
    const stores = this.stores;
    if (!stores) {
      return;
    }
    this.stores = null;
    await Promise.all([stores.profiles.idle(), stores.conversations.idle()]);
    await stores.backend.close();
    this.logger.log(`Memory storage closed (${stores.backend.describe()})`);
  }

  private getStores(): OpenStores {
    if (!this.stores) {
      throw new Error('Memory storage is not open');
    }
    return this.stores;
  }

  get profiles(): JsonDocumentStore<UserSummaries> {
    return this.getStores().profiles;
  }

  get conversations(): JsonDocumentStore<ConversationRecord[]> {
    return this.getStores().conversations;
  }
}
