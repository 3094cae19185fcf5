/**
 * PROMPT SERVICE – Centralized prompt templates.
 * Built-in defaults can be overridden per key by YAML files in the configured
 * prompts directory (e.g. data/prompts/memory.yaml with a `userSummary` key).
 * Templates use {{variableName}} placeholders.
 */
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigService } from '../config/config.service';

export interface PromptTemplate {
  [key: string]: string | PromptTemplate;
}

const DEFAULT_PROMPTS: Record<string, PromptTemplate> = {
  assistant: {
    system: `You are {{botName}}, a helpful chat assistant taking part in a group conversation.
Messages from people are prefixed with their display name, e.g. "Sam: hello".
Your language model is {{model}}. Tell users about it only if they ask or it is relevant.
Be concise, useful and not biased in your responses.`,
    memory: `Things you remember from earlier conversations. Use them only when they are relevant:
{{context}}`,
    apology: `Sorry, I couldn't reach the language model just now. Please try again in a moment.`,
  },
  memory: {
    userSummary: `{{previousSummary}}Based on these recent messages from {{userName}}, write a brief summary of what you know about them.
Include: personality traits, interests, how they communicate, any facts they've shared.
Keep it under {{wordLimit}} words. Be factual, not speculative.

Recent messages:
{{messages}}`,
    conversationSummary: `Summarize this conversation in 2-3 sentences. Focus on the main topic and any important information exchanged.

{{conversation}}`,
  },
};

function isPromptTemplate(value: unknown): value is PromptTemplate {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((v) => typeof v === 'string' || isPromptTemplate(v));
}

@Injectable()
export class PromptService implements OnModuleInit {
  private readonly logger = new Logger(PromptService.name);
  private prompts: Map<string, PromptTemplate> = new Map();

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit() {
    await this.loadAllPrompts();
  }

  private getPromptsDir(): string {
    return path.resolve(this.configService.getConfig().prompts.directory);
  }

  private async loadAllPrompts(): Promise<void> {
    const promptsDir = this.getPromptsDir();
    let files: string[];
    try {
      files = (await fsPromises.readdir(promptsDir)).filter(
        (f) => f.endsWith('.yaml') || f.endsWith('.yml'),
      );
    } catch {
      this.logger.debug(`No prompts directory at ${promptsDir}, using built-in prompts`);
      return;
    }

    for (const file of files) {
      await this.loadPromptFile(promptsDir, file);
    }
    this.logger.log(`Loaded ${this.prompts.size} prompt override files`);
  }

  private async loadPromptFile(promptsDir: string, filename: string): Promise<void> {
    try {
      const content = await fsPromises.readFile(path.join(promptsDir, filename), 'utf-8');
      const parsed = yaml.load(content);
      if (!isPromptTemplate(parsed)) {
        this.logger.warn(`Ignoring prompt file ${filename}: expected a mapping of strings`);
        return;
      }
      const name = filename.replace(/\.ya?ml$/, '');
      this.prompts.set(name, parsed);
      this.logger.debug(`Loaded prompt file: ${name}`);
    } catch (error) {
      this.logger.error(`Failed to load prompt file ${filename}: ${error}`);
    }
  }

  private lookup(template: PromptTemplate | undefined, keyPath: string): string | undefined {
    let current: PromptTemplate | string | undefined = template;
    for (const part of keyPath.split('.')) {
      if (current === undefined || typeof current === 'string') {
        return undefined;
      }
      current = current[part];
    }
    return typeof current === 'string' ? current : undefined;
  }

  /**
   * Get a raw template. Path uses dot notation: getRawPrompt('memory', 'userSummary').
   * Overrides from YAML win over the built-in defaults.
   */
  getRawPrompt(file: string, keyPath: string): string | undefined {
    const override = this.lookup(this.prompts.get(file), keyPath);
    if (override !== undefined) {
      return override;
    }
    const fallback = this.lookup(DEFAULT_PROMPTS[file], keyPath);
    if (fallback === undefined) {
      this.logger.warn(`Prompt not found: ${file}.${keyPath}`);
    }
    return fallback;
  }

  /**
   * Get a prompt with variable substitution. Placeholders without a value
   * render as empty strings; substituted values are not rescanned.
   */
  getPrompt(file: string, keyPath: string, variables: Record<string, string> = {}): string {
    const template = this.getRawPrompt(file, keyPath) ?? '';
    return template.replace(/\{\{(\w+)\}\}/g, (_match, name: string) => variables[name] ?? '');
  }
}
