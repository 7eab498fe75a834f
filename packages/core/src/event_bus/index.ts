export { EventBus } from './event_bus';
export type { IEventStream, EventBusDependencies } from './event_bus';
export type {
  BaseEvent,
  ReportSubmittedEvent,
  ReportEscalatedEvent,
  ReportFinalizedEvent,
  ProblemStatusChangedEvent,
  ListClosedEvent,
  ActGeneratedEvent,
  RemedyEvent,
  RemedyEventType,
  RemedyEventMap,
  EventHandler,
  EventSubscription,
} from './types';
