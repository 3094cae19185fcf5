import { Test } from '@nestjs/testing';
import { ConfigService } from '../config/config.service';
import { configStub } from '../testing/config.stub';
import { MemoryStorageService, USER_SUMMARIES_FILE } from './memory-storage.service';
import { InMemoryStorageBackend, MEMORY_STORAGE_BACKEND } from './storage.backend';
import { UserProfileService } from './user-profile.service';

describe('UserProfileService', () => {
  async function createService(backend: InMemoryStorageBackend) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        UserProfileService,
        MemoryStorageService,
        { provide: MEMORY_STORAGE_BACKEND, useValue: backend },
        { provide: ConfigService, useValue: configStub() },
      ],
    }).compile();
    await moduleRef.init();
    return moduleRef.get(UserProfileService);
  }

  it('returns undefined for a user with no summary', async () => {
    const service = await createService(new InMemoryStorageBackend());

    await expect(service.getSummary('u1')).resolves.toBeUndefined();
    await expect(service.getProfile('u1')).resolves.toBeUndefined();
  });

  it('returns the summary that was set', async () => {
    const service = await createService(new InMemoryStorageBackend());

    await service.setSummary('u1', 'Enjoys hiking.');

    await expect(service.getSummary('u1')).resolves.toBe('Enjoys hiking.');
  });

  it('keeps an empty summary as set', async () => {
    const service = await createService(new InMemoryStorageBackend());

    await service.setSummary('u1', '');

    await expect(service.getSummary('u1')).resolves.toBe('');
  });

  it('replaces the previous summary', async () => {
    const service = await createService(new InMemoryStorageBackend());

    await service.setSummary('u1', 'Enjoys hiking.');
    await service.setSummary('u1', 'Enjoys cycling.');

    await expect(service.getSummary('u1')).resolves.toBe('Enjoys cycling.');
  });

  it('does not treat inherited object keys as users', async () => {
    const service = await createService(new InMemoryStorageBackend());

    await expect(service.getSummary('toString')).resolves.toBeUndefined();
  });

  it('refuses a user id that could not be read back', async () => {
    const backend = new InMemoryStorageBackend();
    const service = await createService(backend);

    await expect(service.setSummary('__proto__', 'Lost.')).rejects.toThrow(
      'Cannot store a profile for user id __proto__',
    );

    await expect(backend.read(USER_SUMMARIES_FILE)).resolves.toBeUndefined();
    await expect(service.getSummary('__proto__')).resolves.toBeUndefined();
  });

  it('stores the summary with an ISO timestamp keyed by user id', async () => {
    const backend = new InMemoryStorageBackend();
    const service = await createService(backend);
    const before = Date.now();

    await service.setSummary('u1', 'Enjoys hiking.');

    const stored: unknown = JSON.parse((await backend.read(USER_SUMMARIES_FILE)) ?? '{}');
    expect(stored).toEqual({ u1: { summary: 'Enjoys hiking.', updated_at: expect.any(String) } });
    const profile = await service.getProfile('u1');
    expect(profile?.userId).toBe('u1');
    const updatedAt = Date.parse(profile?.updatedAt ?? '');
    expect(updatedAt).toBeGreaterThanOrEqual(before);
    expect(updatedAt).toBeLessThanOrEqual(Date.now());
  });

  it('lists every stored profile', async () => {
    const backend = new InMemoryStorageBackend({
      [USER_SUMMARIES_FILE]: JSON.stringify({
        u1: { summary: 'One', updated_at: '2026-01-01T00:00:00.000Z' },
        u2: { summary: 'Two', updated_at: '2026-01-02T00:00:00.000Z' },
      }),
    });
    const service = await createService(backend);

    await expect(service.listProfiles()).resolves.toEqual([
      { userId: 'u1', summary: 'One', updatedAt: '2026-01-01T00:00:00.000Z' },
      { userId: 'u2', summary: 'Two', updatedAt: '2026-01-02T00:00:00.000Z' },
    ]);
  });

  it('reads a corrupt file as empty and recovers on the next write', async () => {
    const backend = new InMemoryStorageBackend({ [USER_SUMMARIES_FILE]: '{"u1": ' });
    const service = await createService(backend);

    await expect(service.getSummary('u1')).resolves.toBeUndefined();

    await service.setSummary('u2', 'New here.');
    await expect(service.getSummary('u2')).resolves.toBe('New here.');
  });

  it('keeps every user from concurrent writes', async () => {
    const service = await createService(new InMemoryStorageBackend());

    await Promise.all(['u1', 'u2', 'u3'].map((id) => service.setSummary(id, `summary ${id}`)));

    const profiles = await service.listProfiles();
    expect(profiles.map((p) => p.userId).sort()).toEqual(['u1', 'u2', 'u3']);
  });
});
