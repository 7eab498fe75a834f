export {
  RemedyError,
  RecordNotFoundError,
  InvalidStateError,
  AlreadyFinalizedError,
  ListClosedError,
  NotAssigneeError,
  UnknownAdminError,
  ConflictError,
  ExternalDeliveryError,
  DetailedValidationError,
  isRemedyError,
} from './errors';
export type { RemedyErrorCode } from './errors';
