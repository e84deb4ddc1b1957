export { createUserHandlers, parseUserBody } from './UserHandlers.js';
export type { UserHandlers } from './UserHandlers.js';
