export { Remedy, createRemedy } from './remedy';
export type { RemedyDependencies, SubmitReportOptions } from './remedy';
