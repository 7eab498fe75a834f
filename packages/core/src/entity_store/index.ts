export { EntityStore } from './entity_store';
export type { ProblemQuery, DeleteListResult } from './entity_store';
