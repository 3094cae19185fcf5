/**
 * App configuration (model names, LLM endpoint, reply limits, memory tuning).
 * Loaded from data/config.json (or CONFIG_PATH) and validated with zod; missing
 * fields take their defaults. Used by the model factory, the memory services
 * and the chat flow; no flow logic.
 */
import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const MemoryConfigSchema = z.object({
  directory: z.string().min(1).default('data/memory'),
  /** Maximum stored conversation snippets; the oldest are evicted first. */
  maxConversations: z.number().int().positive().default(500),
  topN: z.number().int().positive().default(3),
  contextTopN: z.number().int().positive().default(2),
  minScore: z.number().min(-1).max(1).default(0.3),
  documentTurnLimit: z.number().int().positive().default(5),
  documentCharLimit: z.number().int().positive().default(200),
  summaryTurnLimit: z.number().int().positive().default(10),
  summaryCharLimit: z.number().int().positive().default(300),
  userTurnLimit: z.number().int().positive().default(10),
  summaryWordLimit: z.number().int().positive().default(100),
  summarizeConversations: z.boolean().default(false),
  profileUpdateProbability: z.number().min(0).max(1).default(0.25),
});

export const AppConfigSchema = z.object({
  botName: z.string().min(1).default('Assistant'),
  model: z.string().min(1).default('llama3.1:8b'),
  summary_model: z.string().min(1).optional(),
  embedding_model: z.string().min(1).default('nomic-embed-text'),
  llm: z
    .object({
      baseUrl: z.string().url().default('http://localhost:11434/v1'),
      temperature: z.number().min(0).max(2).default(0.7),
    })
    .default({}),
  prompts: z
    .object({
      directory: z.string().min(1).default('data/prompts'),
    })
    .default({}),
  historySize: z.number().int().positive().default(20),
  maxReplyLength: z.number().int().positive().default(2000),
  memory: MemoryConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly config: AppConfig;
  private readonly configPath: string;

  constructor() {
    this.configPath = process.env.CONFIG_PATH
      ? path.resolve(process.env.CONFIG_PATH)
      : path.join(process.cwd(), 'data/config.json');
    this.config = this.loadConfig();
  }

  /**
   * Read and validate the config file. Loaded synchronously so that providers
   * built from it see the final values during module construction.
   */
  private loadConfig(): AppConfig {
    let raw: string;
    try {
      raw = fs.readFileSync(this.configPath, 'utf-8');
    } catch {
      this.writeDefaults();
      return this.applyEnvironment(DEFAULT_CONFIG);
    }

    try {
      const parsed = AppConfigSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        this.logger.warn(`Invalid config.json, using defaults: ${issues}`);
        return this.applyEnvironment(DEFAULT_CONFIG);
      }
      this.logger.log('Configuration loaded from config.json');
      return this.applyEnvironment(parsed.data);
    } catch (error) {
      this.logger.warn(`Failed to parse config.json, using defaults: ${error}`);
      return this.applyEnvironment(DEFAULT_CONFIG);
    }
  }

  private applyEnvironment(config: AppConfig): AppConfig {
    const baseUrl = process.env.LLM_BASE_URL;
    if (!baseUrl) {
      return config;
    }
    return { ...config, llm: { ...config.llm, baseUrl } };
  }

  private writeDefaults(): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      fs.writeFileSync(this.configPath, JSON.stringify(DEFAULT_CONFIG, null, 2));
      this.logger.log(`Created default config at ${this.configPath}`);
    } catch (error) {
      this.logger.warn(`Could not write default config: ${error}`);
    }
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getMemoryConfig(): MemoryConfig {
    return this.config.memory;
  }
}
