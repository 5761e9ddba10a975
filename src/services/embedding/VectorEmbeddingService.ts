import { OpenAI } from 'openai';

/**
 * Anything that can turn a batch of texts into vectors, one per text, in order
 */
export interface EmbeddingProvider {
  readonly modelName: string;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Scales a vector to unit length; the zero vector is returned unchanged
 */
export function normalizeVector(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    return [...vector];
  }
  return vector.map(value => value / norm);
}

/**
 * VectorEmbeddingService generates text embeddings with OpenAI's embedding models
 */
export class VectorEmbeddingService implements EmbeddingProvider {
  private openai: OpenAI;
  readonly modelName: string;

  constructor(
    openaiApiKey: string,
    embeddingModel: string = 'text-embedding-3-small'
  ) {
    this.openai = new OpenAI({ apiKey: openaiApiKey });
    this.modelName = embeddingModel;
  }

  /**
   * Generate unit-norm embeddings for a batch of texts
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      // Truncate content if too long (OpenAI has token limits)
      const input = texts.map(text => this.truncateContent(text, 8000));

      const response = await this.openai.embeddings.create({
        model: this.modelName,
        input,
        encoding_format: 'float'
      });

      if (!response.data || response.data.length !== texts.length) {
        throw new Error(
          `Expected ${texts.length} embeddings from OpenAI, received ${response.data?.length ?? 0}`
        );
      }

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => normalizeVector(item.embedding));
    } catch (error) {
      console.error('❌ Failed to generate embeddings:', error);
      throw error;
    }
  }

  /**
   * Truncate content to fit within token limits
   */
  private truncateContent(content: string, maxChars: number): string {
    if (content.length <= maxChars) {
      return content;
    }

    // Truncate and add ellipsis
    return content.substring(0, maxChars - 3) + '...';
  }
}
