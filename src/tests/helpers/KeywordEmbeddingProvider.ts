import { EmbeddingProvider } from '../../services/embedding/VectorEmbeddingService';

/**
 * Deterministic in-process embedder: one dimension per vocabulary word,
 * counting its occurrences. Vectors are returned unnormalized.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly modelName = 'keyword-test-model';
  readonly batches: string[][] = [];

  constructor(private readonly vocabulary: string[] = ['langgraph', 'cooking', 'recipe', 'weather']) {}

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map(text => this.embed(text));
  }

  private embed(text: string): number[] {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return this.vocabulary.map(term => words.filter(word => word === term).length);
  }
}
