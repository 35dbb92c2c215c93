/**
 * Notification provider that only records events in the log.
 * Used when no delivery webhook is configured.
 */

import type { ILogProvider } from './ILogProvider.js';
import type { INotificationProvider, NotificationEvent } from './INotificationProvider.js';

export class LogNotificationProvider implements INotificationProvider {
  constructor(private readonly logProvider: ILogProvider) {}

  notify(event: NotificationEvent): void {
    const { type, ...fields } = event;
    this.logProvider.info(`notification ${type}`, fields);
  }
}
