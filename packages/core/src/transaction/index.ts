export { AggregateLock, lockKeys } from './aggregate_lock';
