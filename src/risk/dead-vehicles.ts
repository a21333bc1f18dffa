import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import { readCsvRecords } from '../common/csv';
import { ConfigurationError, formatErrorMessage } from '../common/errors';
import { canonicalVehicleId } from '../common/vehicle-id';

const DEAD_VALUES = new Set(['1', 'true', 'yes']);

/**
 * Read the dead-vehicle list (`vehicle_id,dead`). Ids are canonicalized;
 * a vehicle is dead when `dead` is 1, true or yes in any case.
 *
 * @returns null when the file does not exist
 * @throws ConfigurationError when the file lacks the expected columns
 */
export async function loadDeadVehicles(filePath: string): Promise<Set<string> | null> {
  try {
    await fs.access(filePath);
  } catch {
    return null;
  }

  const seen: { headers: string[] } = { headers: [] };
  const dead = new Set<string>();
  try {
    const rows = readCsvRecords(createReadStream(filePath), {
      onHeaders: (headers) => {
        seen.headers = headers.map((header) => header.toLowerCase());
      },
    });
    for await (const row of rows) {
      const cells = new Map(
        Object.entries(row).map(([key, value]): [string, string] => [key.toLowerCase(), value]),
      );
      const vehicleId = cells.get('vehicle_id') ?? '';
      const flag = (cells.get('dead') ?? '').trim().toLowerCase();
      if (vehicleId.trim() && DEAD_VALUES.has(flag)) {
        dead.add(canonicalVehicleId(vehicleId));
      }
    }
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read dead-vehicle list ${filePath}: ${formatErrorMessage(error)}`,
      error,
    );
  }

  if (seen.headers.length > 0) {
    const missing = ['vehicle_id', 'dead'].filter((column) => !seen.headers.includes(column));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Dead-vehicle list ${filePath} is missing column(s): ${missing.join(', ')}`,
      );
    }
  }
  return dead;
}
