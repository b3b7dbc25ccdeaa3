/**
 * Dotted attribute-path resolution against heterogeneous record shapes.
 * Absence is a normal outcome: every lookup failure resolves to undefined.
 */

const IPV4_INTERFACE = /^(\d{1,3}(?:\.\d{1,3}){3})\/\d{1,2}$/;
const IPV6_INTERFACE = /^([0-9a-fA-F]*:[0-9a-fA-F:.]*)\/\d{1,3}$/;

type Scalar = string | number | boolean | bigint;

function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint'
  );
}

/**
 * Look up one path segment on a container; scalars are not traversable
 */
function step(current: unknown, segment: string): unknown {
  if (current instanceof Map) {
    return current.get(segment);
  }
  if (typeof current !== 'object' || current === null || current instanceof Date) {
    return undefined;
  }
  if (Array.isArray(current)) {
    const index = Number(segment);
    return Number.isInteger(index) ? current[index] : undefined;
  }
  if (!Object.prototype.hasOwnProperty.call(current, segment)) {
    return undefined;
  }
  const next: unknown = Reflect.get(current, segment);
  return next;
}

/**
 * IP interfaces ("10.0.0.1/24") are searched by their bare address
 */
function stripPrefixLength(value: string): string {
  const match = IPV4_INTERFACE.exec(value) ?? IPV6_INTERFACE.exec(value);
  return match ? match[1] : value;
}

function scalarToString(value: Scalar): string {
  return typeof value === 'string' ? stripPrefixLength(value) : String(value);
}

/**
 * Convert a resolved leaf to its search string, or undefined when it is not a scalar
 */
function leafToString(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  if (isScalar(value)) return scalarToString(value);
  if (Array.isArray(value)) {
    const parts = value.filter(isScalar).map(scalarToString);
    return parts.length > 0 ? parts.join(',') : undefined;
  }
  return undefined;
}

/**
 * Resolve a dot-separated attribute path ("role.name", "custom_fields.cmdb_id") on a record
 */
export function resolveAttribute(record: unknown, path: string): string | undefined {
  if (!path) return undefined;

  let current: unknown = record;
  for (const segment of path.split('.')) {
    if (!segment) return undefined;
    current = step(current, segment);
    if (current === null || current === undefined) return undefined;
  }

  return leafToString(current);
}
