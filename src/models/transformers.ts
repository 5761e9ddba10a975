import { ScoredBlock } from '../types/models';

/**
 * Flat, JSON-friendly shape of a scored block, as printed by dry runs
 */
export interface ScoredBlockRecord {
  email_sender: string;
  email_subject: string;
  heading: string | null;
  content: string;
  links: string[];
  scores: Record<string, number>;
  best_interest: string;
  best_score: number;
}

export function scoredBlockToRecord(scored: ScoredBlock): ScoredBlockRecord {
  return {
    email_sender: scored.block.sender,
    email_subject: scored.block.subject,
    heading: scored.block.heading ?? null,
    content: scored.block.content,
    links: [...scored.block.links],
    scores: { ...scored.scores },
    best_interest: scored.bestInterest,
    best_score: scored.bestScore
  };
}

export function scoredBlocksToJson(scored: readonly ScoredBlock[]): string {
  return JSON.stringify(scored.map(scoredBlockToRecord), null, 2);
}
