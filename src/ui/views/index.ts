export * from './types.js';
export * from './IntakeFormController.js';
export * from './renderIntakeView.js';
