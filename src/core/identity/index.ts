/**
 * Identity module.
 *
 * Sanitizing ids and deriving the files, host alias and working directory
 * that belong to each identity.
 */
export type { GitUser, Identity } from './types.js';

export { sanitizeIdentityId, isValidIdentityId } from './sanitize.js';
export { deriveIdentity, InvalidIdentityError } from './derive.js';
export { toHomeRelative } from '../settings/paths.js';
