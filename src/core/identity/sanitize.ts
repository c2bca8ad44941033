/**
 * Identity id sanitization.
 *
 * Ids become filename suffixes, host aliases and directory names, so they
 * are restricted to a conservative character class.
 */

const DISALLOWED = /[^A-Za-z0-9_-]/g;
const VALID_ID = /^[A-Za-z0-9_-]+$/;


/**
 * Drop every character outside `[A-Za-z0-9_-]`.
 *
 * @example
 * ```typescript
 * sanitizeIdentityId('  Pepsi Co!')  // 'PepsiCo'
 * sanitizeIdentityId('../etc')       // 'etc'
 * sanitizeIdentityId('@@@')          // ''
 * ```
 */
export function sanitizeIdentityId(raw: string): string {

    return raw.replace(DISALLOWED, '');

}


/**
 * Whether an id is non-empty and uses only the allowed characters.
 */
export function isValidIdentityId(id: string): boolean {

    return VALID_ID.test(id);

}
