export { ReviewAdapter } from './review_adapter';
export type {
  IReviewAdapter,
  IEscalationCheck,
  ReviewAdapterDependencies,
  VoteResult,
  VoteSummaryEntry,
} from './review_adapter.types';
