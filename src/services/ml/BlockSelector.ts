import { ScoredBlock } from '../../types/models';

export const DEFAULT_RELEVANCE_THRESHOLD = 0.38;

/**
 * Keeps the blocks whose best score reaches the threshold, in input order
 */
export function filterScoredBlocks(
  scored: readonly ScoredBlock[],
  threshold: number = DEFAULT_RELEVANCE_THRESHOLD
): ScoredBlock[] {
  return scored.filter(item => item.bestScore >= threshold);
}
