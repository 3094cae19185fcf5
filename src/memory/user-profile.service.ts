/**
 * USER PROFILE SERVICE - One natural-language summary per user.
 * Writes replace the previous summary outright; merging old and new facts is
 * the synthesizer's job. Backed by user_summaries.json.
 */
import { Injectable, Logger } from '@nestjs/common';
import { MemoryStorageService } from './memory-storage.service';
import { UserProfile, UserSummaries } from './memory.types';

// zod's record parsing drops this key on load, so it could never be read back
const UNSTORABLE_USER_ID = '__proto__';

function toProfile(userId: string, summaries: UserSummaries): UserProfile | undefined {
  if (!Object.hasOwn(summaries, userId)) {
    return undefined;
  }
  const entry = summaries[userId];
  return { userId, summary: entry.summary, updatedAt: entry.updated_at };
}

@Injectable()
export class UserProfileService {
  private readonly logger = new Logger(UserProfileService.name);

  constructor(private readonly storage: MemoryStorageService) {}

  /**
   * Get the stored summary for a user, or undefined if there is none
   */
  async getSummary(userId: string): Promise<string | undefined> {
    const profile = await this.getProfile(userId);
    return profile?.summary;
  }

  async getProfile(userId: string): Promise<UserProfile | undefined> {
    const summaries = await this.storage.profiles.read();
    return toProfile(userId, summaries);
  }

  async listProfiles(): Promise<UserProfile[]> {
    const summaries = await this.storage.profiles.read();
    return Object.entries(summaries).map(([userId, entry]) => ({
      userId,
      summary: entry.summary,
      updatedAt: entry.updated_at,
    }));
  }

  /**
   * Overwrite the summary for a user and persist immediately
   */
  async setSummary(userId: string, summary: string): Promise<void> {
    if (userId === UNSTORABLE_USER_ID) {
      throw new Error(`Cannot store a profile for user id ${userId}`);
    }
    const entry = { summary, updated_at: new Date().toISOString() };
    await this.storage.profiles.update((summaries) => ({ ...summaries, [userId]: entry }));
    this.logger.debug(`Updated summary for user ${userId} (${summary.length} chars)`);
  }
}
