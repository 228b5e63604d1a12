export * from './subscriptions';
export * from './processedEvents';
export * from './whitelist';
export * from './removalLogs';
export * from './notificationLogs';
export * from './inviteLogs';
