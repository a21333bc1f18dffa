/**
 * Vehicle identifier handling.
 *
 * Identifiers reach us from object keys, CLI filters, the dead-vehicle list
 * and previously written summary rows, spelled as "EL-052", "EL052",
 * "el_052" and so on. Everything that groups or matches by vehicle goes
 * through {@link canonicalVehicleId} first.
 *
 * Canonical form: uppercase, alphabetic prefix and digits joined by a single
 * hyphen ("EL-052"). Digits are kept verbatim, so "EL-52" and "EL-052" stay
 * distinct.
 */

export const UNKNOWN_VEHICLE = 'UNKNOWN';

/** "el" not preceded by a letter, so "fuel_7" is not a vehicle */
export const DEFAULT_VEHICLE_ID_PATTERN = '(?<![a-z])el[-_]?\\d+';

const PREFIX_DIGITS = /^([A-Z]+)[-_\s]*(\d+)$/;

export function canonicalVehicleId(raw: string): string {
  const trimmed = raw.trim().toUpperCase();
  if (!trimmed) {
    return UNKNOWN_VEHICLE;
  }

  const match = PREFIX_DIGITS.exec(trimmed);
  if (match) {
    return `${match[1]}-${match[2]}`;
  }

  return trimmed.replace(/[_\s]+/g, '-');
}

/**
 * Pull a vehicle id out of an object key or file path.
 *
 * @param pattern - regular expression source, matched case-insensitively
 */
export function inferVehicleId(
  identifier: string,
  pattern: string = DEFAULT_VEHICLE_ID_PATTERN,
): string {
  const match = new RegExp(pattern, 'i').exec(identifier);
  if (!match) {
    return UNKNOWN_VEHICLE;
  }
  return canonicalVehicleId(match[0]);
}

/**
 * Parse a filter given as "EL-040,EL-041" or "EL-040 EL-041".
 * Returns null when the filter is empty (meaning: all vehicles).
 */
export function parseVehicleFilter(
  input: string | string[] | undefined,
): Set<string> | null {
  if (input === undefined) {
    return null;
  }

  const tokens = (Array.isArray(input) ? input : [input])
    .flatMap((value) => value.split(/[\s,]+/))
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  if (tokens.length === 0) {
    return null;
  }
  return new Set(tokens.map(canonicalVehicleId));
}

export function matchesVehicleFilter(
  vehicleId: string,
  filter: ReadonlySet<string> | null,
): boolean {
  if (!filter) {
    return true;
  }
  return filter.has(canonicalVehicleId(vehicleId));
}

/**
 * Fleet ordering used in aggregate tables: numeric part first, then id.
 */
export function compareVehicleIds(a: string, b: string): number {
  const numA = vehicleNumber(a);
  const numB = vehicleNumber(b);
  if (numA !== numB) {
    return numA - numB;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function vehicleNumber(vehicleId: string): number {
  const match = /(\d+)/.exec(vehicleId);
  return match ? Number(match[1]) : Number.POSITIVE_INFINITY;
}
