// Settings schema
export * from './user-settings';

// Usage ledger schema
export * from './messages';
