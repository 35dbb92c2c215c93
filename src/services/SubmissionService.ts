/**
 * Submission store.
 * Mints tracking ids and holds immutable idea records. Only the status
 * moves after creation, and only inside a chain commit: a link supersedes a
 * submitted parent, an outcome validates.
 */

import { randomInt } from 'node:crypto';
import type { ISubmissionRepository } from '../repositories/ISubmissionRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { SubmitIdeaRequest } from '../types/api.js';
import type { IdeaSubmission } from '../types/models.js';
import { systemClock, type Clock } from '../types/common.js';
import { toSubmission } from '../types/mappers.js';
import { assertUnitInterval } from '../scoring/accuracy.js';
import { NotFoundError, ValidationError } from '../errors.js';

const TRACKING_ID_PREFIX = 'IDEA-';
// Excludes 0, O, 1 and I.
const TRACKING_ID_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
const TRACKING_ID_LENGTH = 6;
const MAX_ID_ATTEMPTS = 10;

const MAX_TEXT_LENGTH = 5000;
const MAX_OWNER_ID_LENGTH = 200;
const MAX_CLASSIFICATION_LENGTH = 200;

export function generateTrackingId(): string {
  let code = '';
  for (let i = 0; i < TRACKING_ID_LENGTH; i++) {
    code += TRACKING_ID_ALPHABET[randomInt(TRACKING_ID_ALPHABET.length)];
  }
  return TRACKING_ID_PREFIX + code;
}

export class SubmissionService {
  constructor(
    private readonly submissionRepo: ISubmissionRepository,
    private readonly logProvider: ILogProvider,
    private readonly clock: Clock = systemClock,
    private readonly nextTrackingId: () => string = generateTrackingId
  ) {}

  /** Store a new idea. Every call mints a fresh tracking id. */
  async create(input: SubmitIdeaRequest): Promise<string> {
    this.validate(input);

    const id = await this.mintUniqueId();
    const row = await this.submissionRepo.insert({
      id,
      owner_id: input.ownerId,
      text: input.text,
      confidence: input.confidence ?? null,
      classification: input.classification ?? null,
      status: 'submitted',
      created_at: this.clock().toISOString(),
    });

    this.logProvider.info('submission created', {
      trackingId: row.id,
      ownerId: row.owner_id,
      hasConfidence: row.confidence !== null,
    });
    return row.id;
  }

  async get(trackingId: string): Promise<IdeaSubmission> {
    const row = await this.submissionRepo.findById(trackingId);
    if (!row) {
      throw new NotFoundError(`Submission "${trackingId}" not found`);
    }
    return toSubmission(row);
  }

  async listByOwner(ownerId: string, since?: Date): Promise<IdeaSubmission[]> {
    const rows = await this.submissionRepo.findByOwner(ownerId, {
      since: since?.toISOString(),
    });
    return rows.map(toSubmission);
  }

  private validate(input: SubmitIdeaRequest): void {
    if (!input.ownerId || input.ownerId.trim().length === 0) {
      throw new ValidationError('ownerId is required');
    }
    if (input.ownerId.length > MAX_OWNER_ID_LENGTH) {
      throw new ValidationError(`ownerId must be ${MAX_OWNER_ID_LENGTH} characters or less`);
    }
    if (!input.text || input.text.trim().length === 0) {
      throw new ValidationError('text is required');
    }
    if (input.text.length > MAX_TEXT_LENGTH) {
      throw new ValidationError(`text must be ${MAX_TEXT_LENGTH} characters or less`);
    }
    if (input.confidence !== undefined && input.confidence !== null) {
      assertUnitInterval('confidence', input.confidence);
    }
    if (
      input.classification !== undefined &&
      input.classification !== null &&
      input.classification.length > MAX_CLASSIFICATION_LENGTH
    ) {
      throw new ValidationError(
        `classification must be ${MAX_CLASSIFICATION_LENGTH} characters or less`
      );
    }
  }

  private async mintUniqueId(): Promise<string> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.nextTrackingId();
      const existing = await this.submissionRepo.findById(id);
      if (!existing) return id;
    }
    throw new Error(`Could not mint a unique tracking id after ${MAX_ID_ATTEMPTS} attempts`);
  }
}
