import type { ActEntryRecord } from '../record_types';
import { generateActEntryId } from '../utils/id_generator';

export function createActEntryRecord(problemId: string, assigneeId: string, now: Date): ActEntryRecord {
  return {
    id: generateActEntryId(problemId, assigneeId),
    problemId,
    assigneeId,
    createdAt: now.toISOString(),
  };
}
