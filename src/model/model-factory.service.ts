/**
 * MODEL FACTORY – Centralized ChatOpenAI / OpenAIEmbeddings instantiation.
 * Every model talks to the OpenAI-compatible endpoint from config (Ollama's
 * /v1 API by default). Instances are cached per role and temperature.
 */
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import { ConfigService } from '../config/config.service';

/** `main` answers users; `utility` writes summaries and profiles. */
export type ModelType = 'main' | 'utility';

export interface ModelOptions {
  temperature?: number;
}

const DEFAULT_API_KEY = 'ollama';

@Injectable()
export class ModelFactoryService implements OnModuleInit {
  private readonly logger = new Logger(ModelFactoryService.name);
  private models: Map<string, ChatOpenAI> = new Map();
  private embeddings: OpenAIEmbeddings | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    if (!process.env.LLM_API_KEY) {
      this.logger.warn(`LLM_API_KEY not set - using placeholder key for ${this.getBaseUrl()}`);
    }
    this.logger.log(`ModelFactory initialized (${this.getBaseUrl()})`);
  }

  private getBaseUrl(): string {
    return this.configService.getConfig().llm.baseUrl;
  }

  private getApiKey(): string {
    return process.env.LLM_API_KEY || DEFAULT_API_KEY;
  }

  private getModelName(type: ModelType): string {
    const config = this.configService.getConfig();
    switch (type) {
      case 'utility':
        return config.summary_model ?? config.model;
      case 'main':
      default:
        return config.model;
    }
  }

  private getDefaultTemperature(type: ModelType): number {
    return type === 'main' ? this.configService.getConfig().llm.temperature : 0;
  }

  /**
   * Get a chat model for the given role. Models are cached and reused.
   */
  getModel(type: ModelType, options?: ModelOptions): ChatOpenAI {
    const temperature = options?.temperature ?? this.getDefaultTemperature(type);
    const cacheKey = `${type}:${temperature}`;

    const cached = this.models.get(cacheKey);
    if (cached) {
      return cached;
    }

    const model = new ChatOpenAI({
      model: this.getModelName(type),
      temperature,
      apiKey: this.getApiKey(),
      configuration: {
        baseURL: this.getBaseUrl(),
      },
    });

    this.models.set(cacheKey, model);
    this.logger.debug(`Created ${type} model ${this.getModelName(type)} (temp=${temperature})`);
    return model;
  }

  /**
   * Get the embeddings client for the configured embedding model.
   */
  getEmbeddings(): OpenAIEmbeddings {
    if (this.embeddings) {
      return this.embeddings;
    }

    this.embeddings = new OpenAIEmbeddings({
      model: this.configService.getConfig().embedding_model,
      apiKey: this.getApiKey(),
      configuration: {
        baseURL: this.getBaseUrl(),
      },
    });
    this.logger.debug(`Created embeddings client ${this.configService.getConfig().embedding_model}`);
    return this.embeddings;
  }
}
