/**
 * Timezone resolution with silent fallback to the default zone
 */

import { IANAZone } from "luxon";
import { DEFAULT_TIMEZONE } from "./constants.js";

export interface ResolvedTimezone {
  /** Canonical zone name, or the default */
  name: string;
  zone: IANAZone;
  /** True when a non-empty name was rejected and replaced */
  defaulted: boolean;
}

export function resolveTimezone(name?: string | null): ResolvedTimezone {
  if (!name) {
    return {
      name: DEFAULT_TIMEZONE,
      zone: IANAZone.create(DEFAULT_TIMEZONE),
      defaulted: false,
    };
  }

  if (!IANAZone.isValidZone(name)) {
    return {
      name: DEFAULT_TIMEZONE,
      zone: IANAZone.create(DEFAULT_TIMEZONE),
      defaulted: true,
    };
  }

  const canonical = canonicalZoneName(name);
  return { name: canonical, zone: IANAZone.create(canonical), defaulted: false };
}

/**
 * Zone lookup ignores case, so "asia/shanghai" resolves; report the
 * spelling the runtime's time zone database uses
 */
function canonicalZoneName(name: string): string {
  return new Intl.DateTimeFormat("en-US", { timeZone: name }).resolvedOptions()
    .timeZone;
}
