/**
 * Coach mode.
 * Suggests the next refinement prompt from the depth of an owner's
 * lineage history.
 */

import type { NextQuestionResponse } from '../types/api.js';
import { pickQuestion } from '../coach/questions.js';
import type { ReputationService } from './ReputationService.js';

export class CoachService {
  constructor(private readonly reputation: ReputationService) {}

  async nextQuestion(ownerId: string): Promise<NextQuestionResponse> {
    const profile = await this.reputation.compute(ownerId);
    const { tier, question } = pickQuestion(
      profile?.depthLevel ?? 0,
      profile?.totalSubmissions ?? 0
    );
    return { ownerId, tier, question };
  }
}
