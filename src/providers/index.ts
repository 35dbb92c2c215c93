export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { isLevelEnabled } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export type {
  INotificationProvider,
  NotificationEvent,
  OutcomeRecordedEvent,
  ProfileChangedEvent,
} from './INotificationProvider.js';
export { LogNotificationProvider } from './LogNotificationProvider.js';
export { WebhookNotificationProvider } from './WebhookNotificationProvider.js';
