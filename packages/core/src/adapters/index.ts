export * from './identity_adapter';
export * from './problem_adapter';
export * from './review_adapter';
export * from './report_adapter';
export * from './reminder_adapter';
export * from './act_adapter';
export * from './notification_adapter';
