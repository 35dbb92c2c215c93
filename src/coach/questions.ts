/**
 * Refinement prompts.
 * Pushes an owner one step deeper than their lineage history shows:
 * shallow thinkers toward specifics, medium toward implications,
 * deep thinkers toward novel connections.
 */

import type { QuestionTier } from '../types/api.js';

export const OPENING_QUESTION = 'What problem are you most curious about right now?';

export const QUESTION_BANK: Record<Exclude<QuestionTier, 'opening'>, string[]> = {
  surface: [
    "You've shared some interesting thoughts. How would you implement one of them?",
    'What specific problem does your latest idea solve?',
    'Can you describe the technical details of your idea?',
    'What would the first prototype look like?',
  ],
  medium: [
    'What are the second-order effects of your idea?',
    'Who would be threatened by this working?',
    'What needs to be true for this to succeed at scale?',
    'What would the world look like if this became mainstream?',
  ],
  deep: [
    'What seemingly unrelated field could inform this idea?',
    'What would be the contrarian take on your approach?',
    'How would you prove this wrong?',
    "What's the most radical version of this idea?",
  ],
};

export function tierForDepth(depthLevel: number): Exclude<QuestionTier, 'opening'> {
  if (depthLevel < 0.3) return 'surface';
  if (depthLevel < 0.6) return 'medium';
  return 'deep';
}

/** Deterministic pick: the n-th submission gets the n-th prompt of its tier. */
export function pickQuestion(depthLevel: number, totalSubmissions: number): {
  tier: QuestionTier;
  question: string;
} {
  if (totalSubmissions === 0) {
    return { tier: 'opening', question: OPENING_QUESTION };
  }
  const tier = tierForDepth(depthLevel);
  const bank = QUESTION_BANK[tier];
  return { tier, question: bank[totalSubmissions % bank.length] };
}
