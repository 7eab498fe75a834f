export { ReportAdapter } from './report_adapter';
export type {
  IReportAdapter,
  ReportAdapterDependencies,
  ReportStatsEntry,
  SubmitReportInput,
} from './report_adapter.types';
