const CANONICAL_UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/** Lower-case, hyphenated UUID as stored by PostgreSQL. */
export function isCanonicalUuid(value: string): boolean {
  return CANONICAL_UUID_REGEX.test(value);
}
