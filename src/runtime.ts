/**
 * Runtime helpers imported by every generated value class.
 * Generated `equals`/`hashCode` bodies only ever call these functions.
 */

const NAN_HASH = 0x7ff80000;
const TRUE_HASH = 1231;
const FALSE_HASH = 1237;

const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

type WithEquals = { equals(other: unknown): boolean };
type WithHashCode = { hashCode(): number };

function hasEquals(value: unknown): value is WithEquals {
  return typeof value === "object" && value !== null && "equals" in value && typeof value.equals === "function";
}

function hasHashCode(value: unknown): value is WithHashCode {
  return typeof value === "object" && value !== null && "hashCode" in value && typeof value.hashCode === "function";
}

/**
 * Total order over numbers: NaN equals NaN and sorts above everything,
 * -0 sorts below 0. Returns -1, 0 or 1.
 */
export function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;

  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    if (aNaN === bNaN) return 0;
    return aNaN ? 1 : -1;
  }

  if (a === 0 && b === 0) {
    const aNegative = Object.is(a, -0);
    const bNegative = Object.is(b, -0);
    if (aNegative === bNegative) return 0;
    return aNegative ? -1 : 1;
  }

  return 0;
}

/**
 * Equality for non-numeric properties. `null` and `undefined` are the same
 * absent value; arrays compare element-wise; objects with an `equals` method
 * decide for themselves; everything else compares by identity.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || a === undefined) return b === null || b === undefined;
  if (b === null || b === undefined) return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => valuesEqual(item, b[index]));
  }

  if (a instanceof Date) {
    return b instanceof Date && a.getTime() === b.getTime();
  }

  if (hasEquals(a)) {
    return a.equals(b);
  }

  return false;
}

function hashString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (31 * hash + text.charCodeAt(i)) | 0;
  }
  return hash;
}

function hashNumber(value: number): number {
  if (Number.isNaN(value)) return NAN_HASH;
  if (Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff) {
    return value | 0;
  }

  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return (view.getInt32(0) ^ view.getInt32(4)) | 0;
}

function identityHash(value: object): number {
  const existing = identityHashes.get(value);
  if (existing !== undefined) return existing;

  const hash = nextIdentityHash;
  nextIdentityHash = (nextIdentityHash + 1) | 0;
  identityHashes.set(value, hash);
  return hash;
}

/**
 * Hash of a single value, consistent with `valuesEqual` and `compareNumbers`:
 * absent values (and 0) hash to 0.
 */
export function hashValue(value: unknown): number {
  switch (typeof value) {
    case "undefined":
      return 0;
    case "boolean":
      return value ? TRUE_HASH : FALSE_HASH;
    case "number":
      return hashNumber(value);
    case "string":
      return hashString(value);
    case "bigint":
      return hashString(value.toString());
    case "symbol":
      return hashString(value.description ?? "");
    case "function":
      return identityHash(value);
  }

  if (value === null) return 0;
  if (Array.isArray(value)) return combineHash(...value);
  if (value instanceof Date) return hashNumber(value.getTime());
  if (hasHashCode(value)) return value.hashCode() | 0;
  return identityHash(value);
}

/**
 * Order-sensitive combination of value hashes (`31 * h + hash(v)`, seeded with 1).
 */
export function combineHash(...values: unknown[]): number {
  let result = 1;
  for (const value of values) {
    result = (31 * result + hashValue(value)) | 0;
  }
  return result;
}
