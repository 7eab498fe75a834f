import type { UserRecord, UserRole, StaffMemberRecord } from '../record_types';
import { generateStaffId, isValidExternalId } from '../utils/id_generator';
import { DetailedValidationError } from '../errors';
import type { StaffImportRow } from '../validation';

export type UserProfile = {
  id: string;
  username?: string;
  firstName?: string;
  lastName?: string;
};

export function assertExternalId(recordType: string, field: string, id: string): void {
  if (!isValidExternalId(id)) {
    throw new DetailedValidationError(recordType, [
      { field, message: 'must be 1-64 characters of A-Z a-z 0-9 _ @ . -', value: id },
    ]);
  }
}

export function createUserRecord(profile: UserProfile, role: UserRole, now: Date): UserRecord {
  assertExternalId('UserRecord', 'id', profile.id);

  return {
    id: profile.id,
    role,
    username: profile.username,
    firstName: profile.firstName,
    lastName: profile.lastName,
    createdAt: now.toISOString(),
  };
}

export function createStaffMemberRecord(row: StaffImportRow): StaffMemberRecord {
  assertExternalId('StaffMemberRecord', 'assigneeId', row.assignee);

  return {
    id: generateStaffId(row.assignee),
    assigneeId: row.assignee,
    post: row.post?.trim() || null,
    fio: row.fio?.trim() || null,
  };
}
