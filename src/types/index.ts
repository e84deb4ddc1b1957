export * from './UserRecord.js';
