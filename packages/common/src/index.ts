export * from './utils/result.js';
export * from './utils/credential-crypto.js';
export * from './types/email-accounts.js';
export * from './schemas/email-accounts.js';
export * from './schemas/pagination.js';
