/**
 * Event Bus types for the Remedy event-driven flow
 */
import type {
  ProblemStatus,
  ReportStatus,
} from '../record_types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp (ms since epoch) */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Source that emitted the event */
  source: string;
};

/**
 * Report-related events
 */
export type ReportSubmittedEvent = BaseEvent & {
  type: 'report.submitted';
  payload: {
    reportId: string;
    problemId: string;
    listId: string;
    submitterUserId: string;
    /** True when the problem already had a live report */
    resubmission: boolean;
  };
};

export type ReportEscalatedEvent = BaseEvent & {
  type: 'report.escalated';
  payload: {
    reportId: string;
    problemId: string;
    mainAdminIds: string[];
  };
};

export type ReportFinalizedEvent = BaseEvent & {
  type: 'report.finalized';
  payload: {
    reportId: string;
    problemId: string;
    submitterUserId: string;
    status: Exclude<ReportStatus, 'pending'>;
    decidingAdminId: string;
    reason: string | null;
  };
};

/**
 * Problem/list lifecycle events
 */
export type ProblemStatusChangedEvent = BaseEvent & {
  type: 'problem.status.changed';
  payload: {
    problemId: string;
    listId: string;
    oldStatus: ProblemStatus;
    newStatus: ProblemStatus;
    reportId: string;
  };
};

export type ListClosedEvent = BaseEvent & {
  type: 'list.closed';
  payload: {
    listId: string;
    code: string;
    title: string;
  };
};

/**
 * Act ledger events
 */
export type ActGeneratedEvent = BaseEvent & {
  type: 'act.generated';
  payload: {
    assigneeId: string;
    problemIds: string[];
    problemNumbers: number[];
    listCode: string;
    /** Renderer-provided reference to the produced document */
    document: string;
  };
};

/**
 * Union type of all possible events
 */
export type RemedyEvent =
  | ReportSubmittedEvent
  | ReportEscalatedEvent
  | ReportFinalizedEvent
  | ProblemStatusChangedEvent
  | ListClosedEvent
  | ActGeneratedEvent;

export type RemedyEventType = RemedyEvent['type'];

/**
 * Maps an event type string to its event shape
 */
export type RemedyEventMap = {
  [E in RemedyEvent as E['type']]: E;
};

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription
 */
export type EventSubscription = {
  /** Unique subscription ID */
  id: string;
  /** Event type being subscribed to */
  eventType: RemedyEventType | '*';
  /** Subscription metadata */
  metadata?: {
    subscriberName?: string;
    createdAt: number;
  };
};
