export {
  parseCalendarDate,
  isCalendarDate,
  formatCalendarDate,
  daysBetween,
  systemClock,
} from './date_utils';
export type { Clock } from './date_utils';
export {
  isValidExternalId,
  generateListId,
  generateProblemId,
  generateReportId,
  generateReviewId,
  generateActEntryId,
  generateMediaId,
  generateStaffId,
} from './id_generator';
