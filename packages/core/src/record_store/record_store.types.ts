import type { RecordStore } from './record_store';
import type {
  UserRecord,
  ProblemListRecord,
  ProblemRecord,
  ReportRecord,
  ReportReviewRecord,
  ReportMediaRecord,
  ActEntryRecord,
  StaffMemberRecord,
} from '../record_types';

/**
 * RecordStores - Typed container for all stores
 *
 * Keys correspond to directory names in .remedy/
 */
export type RecordStores = {
  users: RecordStore<UserRecord>;
  lists: RecordStore<ProblemListRecord>;
  problems: RecordStore<ProblemRecord>;
  reports: RecordStore<ReportRecord>;
  reviews: RecordStore<ReportReviewRecord>;
  media: RecordStore<ReportMediaRecord>;
  acts: RecordStore<ActEntryRecord>;
  staff: RecordStore<StaffMemberRecord>;
};

export type RecordCollection = keyof RecordStores;

export const RECORD_COLLECTIONS: readonly RecordCollection[] = [
  'users',
  'lists',
  'problems',
  'reports',
  'reviews',
  'media',
  'acts',
  'staff',
];
