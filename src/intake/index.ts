export * from './validators.js';
export * from './pagination.js';
export * from './RandomUserProvider.js';
export * from './IntakeService.js';
