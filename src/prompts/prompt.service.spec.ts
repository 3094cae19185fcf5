import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Test } from '@nestjs/testing';
import { ConfigService } from '../config/config.service';
import { buildTestConfig, configStub } from '../testing/config.stub';
import { PromptService } from './prompt.service';

describe('PromptService', () => {
  let promptsDir: string;

  async function createService(directory: string) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        PromptService,
        {
          provide: ConfigService,
          useValue: configStub(buildTestConfig({}, { prompts: { directory } })),
        },
      ],
    }).compile();
    const service = moduleRef.get(PromptService);
    await service.onModuleInit();
    return service;
  }

  beforeEach(() => {
    promptsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prompts-'));
  });

  afterEach(() => {
    fs.rmSync(promptsDir, { recursive: true, force: true });
  });

  it('uses the built-in prompts when the directory does not exist', async () => {
    const service = await createService(path.join(promptsDir, 'missing'));

    expect(service.getPrompt('memory', 'conversationSummary', { conversation: 'user: hi' })).toBe(
      'Summarize this conversation in 2-3 sentences. Focus on the main topic and any important information exchanged.\n\nuser: hi',
    );
  });

  it('lets a YAML file override a single key', async () => {
    fs.writeFileSync(
      path.join(promptsDir, 'memory.yaml'),
      'userSummary: "Describe {{userName}} in {{wordLimit}} words"\n',
    );
    const service = await createService(promptsDir);

    expect(service.getPrompt('memory', 'userSummary', { userName: 'Sam', wordLimit: '50' })).toBe(
      'Describe Sam in 50 words',
    );
    expect(service.getRawPrompt('memory', 'conversationSummary')).toContain(
      'Summarize this conversation',
    );
  });

  it('reads nested keys with dot notation', async () => {
    fs.writeFileSync(path.join(promptsDir, 'extra.yml'), 'greetings:\n  morning: Good morning\n');
    const service = await createService(promptsDir);

    expect(service.getRawPrompt('extra', 'greetings.morning')).toBe('Good morning');
    expect(service.getRawPrompt('extra', 'greetings.evening')).toBeUndefined();
  });

  it('ignores files that are not a mapping of strings', async () => {
    fs.writeFileSync(path.join(promptsDir, 'assistant.yaml'), '- one\n- two\n');
    const service = await createService(promptsDir);

    expect(service.getPrompt('assistant', 'apology')).toBe(
      "Sorry, I couldn't reach the language model just now. Please try again in a moment.",
    );
  });

  it('renders missing variables as empty and does not rescan values', async () => {
    fs.writeFileSync(path.join(promptsDir, 'test.yaml'), 'line: "[{{a}}|{{b}}]"\n');
    const service = await createService(promptsDir);

    expect(service.getPrompt('test', 'line', { a: '{{b}}' })).toBe('[{{b}}|]');
  });

  it('returns an empty string for an unknown prompt', async () => {
    const service = await createService(promptsDir);

    expect(service.getRawPrompt('nope', 'missing')).toBeUndefined();
    expect(service.getPrompt('nope', 'missing')).toBe('');
  });
});
