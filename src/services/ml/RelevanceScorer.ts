import { ContentBlock, ScoredBlock, ScorerOptions } from '../../types/models';
import { EmbeddingProvider, normalizeVector } from '../embedding/VectorEmbeddingService';
import { InvalidConfigurationError } from '../../models/validation';

export const DEFAULT_SCORER_OPTIONS: ScorerOptions = {
  includeHeading: false,
  batchSize: 64
};

/**
 * Trims interests and drops blank and repeated entries, keeping first occurrences
 */
export function cleanInterests(interests: readonly string[]): string[] {
  const cleaned: string[] = [];
  for (const interest of interests) {
    const trimmed = String(interest ?? '').trim();
    if (trimmed && !cleaned.includes(trimmed)) {
      cleaned.push(trimmed);
    }
  }
  return cleaned;
}

export function roundScore(value: number): number {
  const rounded = Math.round(value * 10000) / 10000;
  // Avoid handing out -0
  return rounded === 0 ? 0 : rounded;
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Scores content blocks against user interests by cosine similarity of their
 * embeddings. The embedding provider is created on first use and kept for the
 * lifetime of the scorer, so a run loads its model once.
 */
export class RelevanceScorer {
  private provider: EmbeddingProvider | null = null;
  private readonly options: ScorerOptions;

  constructor(
    private readonly createProvider: () => EmbeddingProvider,
    options: Partial<ScorerOptions> = {}
  ) {
    this.options = { ...DEFAULT_SCORER_OPTIONS, ...options };
    if (!Number.isInteger(this.options.batchSize) || this.options.batchSize < 1) {
      throw new InvalidConfigurationError(`batchSize must be a positive integer, got ${this.options.batchSize}`);
    }
  }

  async score(blocks: readonly ContentBlock[], interests: readonly string[]): Promise<ScoredBlock[]> {
    const labels = cleanInterests(interests);
    if (labels.length === 0) {
      throw new InvalidConfigurationError('interests list is empty.');
    }
    if (blocks.length === 0) {
      return [];
    }

    const blockVectors = await this.embed(blocks.map(block => this.scoringText(block)));
    const interestVectors = await this.embed(labels);

    if (blockVectors[0].length !== interestVectors[0].length) {
      throw new Error(
        `Embedding dimensions differ: blocks ${blockVectors[0].length}, interests ${interestVectors[0].length}`
      );
    }

    return blocks.map((block, i) => {
      // Vectors are unit length, so the dot product is the cosine similarity
      const similarities = interestVectors.map(interestVector => dot(blockVectors[i], interestVector));

      let best = 0;
      for (let j = 1; j < similarities.length; j++) {
        if (similarities[j] > similarities[best]) best = j;
      }

      const scores: Record<string, number> = {};
      labels.forEach((label, j) => {
        scores[label] = roundScore(similarities[j]);
      });

      return {
        block,
        scores,
        bestInterest: labels[best],
        bestScore: roundScore(similarities[best])
      };
    });
  }

  private scoringText(block: ContentBlock): string {
    const parts: string[] = [];
    if (this.options.includeHeading && block.heading) {
      parts.push(block.heading);
    }
    if (block.content) {
      parts.push(block.content);
    }
    return parts.join(' ').trim();
  }

  /**
   * Embeds texts batch by batch; batches share no state and are concatenated
   * in their original order
   */
  private async embed(texts: string[]): Promise<number[][]> {
    const provider = this.getProvider();
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      const batch = texts.slice(i, i + this.options.batchSize);
      const embedded = await provider.embedBatch(batch);
      if (embedded.length !== batch.length) {
        throw new Error(`Embedding provider returned ${embedded.length} vectors for ${batch.length} texts`);
      }
      vectors.push(...embedded.map(normalizeVector));
    }

    const dimension = vectors[0]?.length ?? 0;
    if (vectors.some(vector => vector.length !== dimension)) {
      throw new Error(`Embedding provider ${provider.modelName} returned vectors of mixed dimension`);
    }

    return vectors;
  }

  private getProvider(): EmbeddingProvider {
    if (!this.provider) {
      this.provider = this.createProvider();
    }
    return this.provider;
  }
}
