export { ActAdapter } from './act_adapter';
export type { ActAdapterDependencies, ActSweepEntry } from './act_adapter';
