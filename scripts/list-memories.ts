/**
 * List everything the assistant remembers: user profiles and the conversation
 * log grouped by channel.
 *
 * Usage:
 *   npm run memories:list
 *   npm run memories:list -- --channel=1234   (one channel's conversations only)
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

function preview(text: string, max = 120): string {
  const flat = text.replace(/\s+/g, ' ');
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

async function main(): Promise<void> {
  const channelArg = process.argv.find((a) => a.startsWith('--channel='));
  const onlyChannel = channelArg ? channelArg.replace('--channel=', '').trim() : null;

  const directory = new ConfigService().getMemoryConfig().directory;
  const backend = new FileStorageBackend(directory);
  await backend.open();

  const profiles = new JsonDocumentStore<UserSummaries>(
    backend,
    USER_SUMMARIES_FILE,
    UserSummariesSchema,
    () => ({}),
  );
  const conversations = new JsonDocumentStore<ConversationRecord[]>(
    backend,
    CONVERSATIONS_FILE,
    ConversationLogSchema,
    () => [],
  );

  console.log('Memory directory:', backend.describe());
  console.log('—'.repeat(60));

  const summaries = Object.entries(await profiles.read());
  console.log(`\nUser profiles (${summaries.length})`);
  for (const [userId, entry] of summaries) {
    console.log(`  • ${userId}  (updated ${entry.updated_at})`);
    console.log(`    ${preview(entry.summary)}`);
  }

  const records = (await conversations.read()).filter(
    (r) => onlyChannel === null || r.channel_id === onlyChannel,
  );
  const byChannel = new Map<string, ConversationRecord[]>();
  for (const record of records) {
    const list = byChannel.get(record.channel_id) ?? [];
    list.push(record);
    byChannel.set(record.channel_id, list);
  }

  console.log(`\nConversations (${records.length})`);
  for (const [channelId, list] of byChannel) {
    console.log(`\n[Channel ${channelId}] (${list.length} snippet${list.length === 1 ? '' : 's'})`);
    for (const record of list) {
      console.log(`  • ${record.id}  ${record.timestamp}  messages: ${record.message_count}`);
      console.log(`    ${preview(record.document)}`);
    }
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
