export { ProblemAdapter, DEFAULT_REJECTION_REASON } from './problem_adapter';
export type {
  IProblemAdapter,
  ProblemAdapterDependencies,
  ProblemStats,
  SubmissionTransition,
  DecisionTransition,
} from './problem_adapter.types';
