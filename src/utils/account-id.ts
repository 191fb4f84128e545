/**
 * Account id rules
 *
 * Ids are 2 to 64 characters of dot-separated parts; each part is lowercase
 * alphanumerics, optionally joined by single '-' or '_'. A resource account
 * is a sub-account `<name>.<factory account>`.
 */
export const ACCOUNT_ID_MIN_LENGTH = 2;
export const ACCOUNT_ID_MAX_LENGTH = 64;

const ACCOUNT_ID_PATTERN = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/;

export function isValidAccountId(accountId: string): boolean {
  return (
    accountId.length >= ACCOUNT_ID_MIN_LENGTH &&
    accountId.length <= ACCOUNT_ID_MAX_LENGTH &&
    ACCOUNT_ID_PATTERN.test(accountId)
  );
}

export function subAccountId(name: string, parentId: string): string {
  return `${name}.${parentId}`;
}

// A name becomes exactly one new leading part of the parent id
export function isValidSubAccountName(name: string, parentId: string): boolean {
  return !name.includes('.') && isValidAccountId(subAccountId(name, parentId));
}

// 'room.factory.test' -> 'factory.test'; top-level ids have no parent
export function parentAccountId(accountId: string): string | null {
  const dot = accountId.indexOf('.');
  return dot === -1 ? null : accountId.slice(dot + 1);
}
