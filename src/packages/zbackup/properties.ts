/*
Read the backup policy of every filesystem in a pool from its ZFS user
properties.
*/

import getLogger from "@zfs-tiers/backend/logger";
import { UNSET_SENTINEL } from "./config";
import {
  backupProperties,
  isZprefixed,
  normalizeSource,
  zunprefixed,
} from "./names";
import type { Output } from "./output";
import type { PropertyStore } from "./store";
import type { BackupProperties, PropertyRow, Provenance } from "./types";

const logger = getLogger("zbackup:properties");

export interface ReadOptions {
  // only read the properties for this tier; otherwise read everything
  tier?: string;
  // also keep inherited values (for displaying the effective policy)
  includeInherited?: boolean;
  output?: Output;
}

export async function readBackupProperties(
  store: PropertyStore,
  pool: string,
  { tier, includeInherited = false, output }: ReadOptions = {},
): Promise<BackupProperties> {
  logger.debug("readBackupProperties", { pool, tier, includeInherited });
  const rows = await store.query(
    pool,
    tier == null ? "all" : backupProperties(tier),
  );
  return resolveBackupProperties(rows, {
    module: store.module,
    tier,
    includeInherited,
    output,
  });
}

// Only locally set and received properties matter for backups; the display
// of all properties also shows inherited ones.
export function resolveBackupProperties(
  rows: PropertyRow[],
  {
    module,
    tier,
    includeInherited = false,
    output,
  }: ReadOptions & { module: string },
): BackupProperties {
  const keep = (source: Provenance): boolean => {
    switch (source) {
      case "local":
      case "received":
        return true;
      case "inherited":
        return includeInherited;
      case "unset":
        return false;
    }
  };

  const properties: BackupProperties = {};
  for (const { filesystem, property, value, source } of rows) {
    if (!isZprefixed(module, property) || value == UNSET_SENTINEL) {
      continue;
    }
    const name = zunprefixed(module, property);
    const provenance = normalizeSource(source);
    if (!keep(provenance)) {
      continue;
    }
    properties[filesystem] ??= {};
    properties[filesystem][name] = { value, source: provenance };
    output?.verbose(`${filesystem} ${name}=${value} ${provenance}`);
  }
  return properties;
}
