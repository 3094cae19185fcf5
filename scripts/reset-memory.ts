/**
 * Reset the assistant's memory files.
 *
 * Usage:
 *   npm run memories:reset                     (empty both files)
 *   npm run memories:reset -- --channel=1234   (drop one channel's conversations only)
 *
 * Reads memory.directory from data/config.json (or CONFIG_PATH).
 */
import 'dotenv/config';
import { ConfigService } from '../src/config/config.service';
import { JsonDocumentStore } from '../src/memory/json-document.store';
import {
  CONVERSATIONS_FILE,
  USER_SUMMARIES_FILE,
} from '../src/memory/memory-storage.service';
import {
  ConversationLogSchema,
  ConversationRecord,
  UserSummaries,
  UserSummariesSchema,
} from '../src/memory/memory.types';
import { FileStorageBackend } from '../src/memory/storage.backend';

async function main(): Promise<void> {
  const channelArg = process.argv.find((a) => a.startsWith('--channel='));
  const onlyChannel = channelArg ? channelArg.replace('--channel=', '').trim() : null;

  const directory = new ConfigService().getMemoryConfig().directory;
  const backend = new FileStorageBackend(directory);
  await backend.open();

  const conversations = new JsonDocumentStore<ConversationRecord[]>(
    backend,
    CONVERSATIONS_FILE,
    ConversationLogSchema,
    () => [],
  );

  console.log('Memory reset');
  console.log('Directory:', backend.describe());
  console.log('Scope:', onlyChannel ? `channel ${onlyChannel} only` : 'ALL memory');
  console.log('—'.repeat(60));

  if (onlyChannel) {
    let removed = 0;
    await conversations.update((records) => {
      const kept = records.filter((r) => r.channel_id !== onlyChannel);
      removed = records.length - kept.length;
      return kept;
    });
    console.log(`Removed ${removed} conversation snippet(s) from channel ${onlyChannel}.`);
    return;
  }

  const profiles = new JsonDocumentStore<UserSummaries>(
    backend,
    USER_SUMMARIES_FILE,
    UserSummariesSchema,
    () => ({}),
  );
  await profiles.replace({});
  await conversations.replace([]);
  console.log(`Wrote empty ${USER_SUMMARIES_FILE} and ${CONVERSATIONS_FILE}.`);
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
