import { Test } from '@nestjs/testing';
import { ConfigService } from '../config/config.service';
import { buildTestConfig, configStub } from '../testing/config.stub';
import { ConversationLogService } from './conversation-log.service';
import { MemoryContextService } from './memory-context.service';
import { UserProfileService } from './user-profile.service';

describe('MemoryContextService', () => {
  let getSummary: jest.Mock<Promise<string | undefined>, [string]>;
  let query: jest.Mock<Promise<string[]>, [string, { channelId?: string; topN?: number }]>;
  let service: MemoryContextService;

  beforeEach(async () => {
    getSummary = jest.fn().mockResolvedValue(undefined);
    query = jest.fn().mockResolvedValue([]);
    const moduleRef = await Test.createTestingModule({
      providers: [
        MemoryContextService,
        { provide: UserProfileService, useValue: { getSummary } },
        { provide: ConversationLogService, useValue: { query } },
        { provide: ConfigService, useValue: configStub(buildTestConfig({ contextTopN: 2 })) },
      ],
    }).compile();
    service = moduleRef.get(MemoryContextService);
  });

  it('returns undefined when nothing is remembered', async () => {
    await expect(service.buildContext('u1', 'hello', 'c1')).resolves.toBeUndefined();
  });

  it('includes only the user summary when no conversation matches', async () => {
    getSummary.mockResolvedValue('Likes tea.');

    await expect(service.buildContext('u1', 'hello', 'c1')).resolves.toBe(
      'About this user: Likes tea.',
    );
  });

  it('joins the user summary and relevant conversations', async () => {
    getSummary.mockResolvedValue('Likes tea.');
    query.mockResolvedValue(['user: tea?', 'assistant: green tea']);

    await expect(service.buildContext('u1', 'what tea?', 'c1')).resolves.toBe(
      'About this user: Likes tea.\n\n' +
        'Relevant past conversations:\nuser: tea?\n---\nassistant: green tea',
    );
    expect(getSummary).toHaveBeenCalledWith('u1');
    expect(query).toHaveBeenCalledWith('what tea?', { channelId: 'c1', topN: 2 });
  });

  it('skips an empty summary', async () => {
    getSummary.mockResolvedValue('');
    query.mockResolvedValue(['doc']);

    await expect(service.buildContext('u1', 'hi')).resolves.toBe(
      'Relevant past conversations:\ndoc',
    );
    expect(query).toHaveBeenCalledWith('hi', { channelId: undefined, topN: 2 });
  });

  it('leaves out the sections that are switched off', async () => {
    getSummary.mockResolvedValue('Likes tea.');
    query.mockResolvedValue(['doc']);

    await expect(
      service.buildContext('u1', 'hi', 'c1', { includeConversation: false }),
    ).resolves.toBe('About this user: Likes tea.');
    expect(query).not.toHaveBeenCalled();

    await expect(service.buildContext('u1', 'hi', 'c1', { includeUser: false })).resolves.toBe(
      'Relevant past conversations:\ndoc',
    );
    expect(getSummary).toHaveBeenCalledTimes(1);
  });

  it('propagates storage failures', async () => {
    getSummary.mockRejectedValue(new Error('disk gone'));

    await expect(service.buildContext('u1', 'hi', 'c1')).rejects.toThrow('disk gone');
  });
});
