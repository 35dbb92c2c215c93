/**
 * Notification provider interface.
 * One-way hand-off to the delivery layer. The core never waits on delivery
 * and has no way to cancel it.
 */

export interface OutcomeRecordedEvent {
  type: 'outcome.recorded';
  trackingId: string;
  ownerId: string;
  outcomeId: string;
  result: number;
  accuracyScore: number;
}

export interface ProfileChangedEvent {
  type: 'profile.changed';
  ownerId: string;
  previousReputation: number | null;
  reputationScore: number;
}

export type NotificationEvent = OutcomeRecordedEvent | ProfileChangedEvent;

export interface INotificationProvider {
  notify(event: NotificationEvent): void;
}
