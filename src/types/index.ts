export * from './issue-event';
export * from './notification';
