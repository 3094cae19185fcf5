/**
 * EMBEDDING SERVICE - Generates text embeddings for the conversation log.
 * Uses the embedding model from config via the model factory. Every call goes
 * to the model; stored records keep their own vectors.
 */
import { Injectable, Logger } from '@nestjs/common';
import { ModelFactoryService } from '../model/model-factory.service';

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);

  constructor(private readonly modelFactory: ModelFactoryService) {}

  /**
   * Generate the embedding for a single text. Rejects if the embedding
   * service fails or returns an empty vector.
   */
  async generateEmbedding(text: string): Promise<number[]> {
    try {
      const embedding = await this.modelFactory.getEmbeddings().embedQuery(text);
      if (embedding.length === 0) {
        throw new Error('Embedding service returned an empty vector');
      }
      return embedding;
    } catch (error) {
      this.logger.error(`Failed to generate embedding: ${error}`);
      throw error;
    }
  }
}
