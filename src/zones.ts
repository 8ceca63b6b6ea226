import { IANAZone, SystemZone, type Zone } from "luxon";

import type { Env } from "./config.js";

/**
 * Looks up a zone handle by name. Returns null for names it does not know so
 * callers decide how to report the failure.
 */
export interface ZoneResolver {
  resolve(name: string): Zone | null;
}

export const ianaZones: ZoneResolver = {
  resolve(name) {
    return IANAZone.isValidZone(name) ? IANAZone.create(name) : null;
  },
};

export function defaultZone(env: Pick<Env, "TIMEZONE">, zones: ZoneResolver = ianaZones): Zone {
  if (env.TIMEZONE) {
    const zone = zones.resolve(env.TIMEZONE);
    if (zone) {
      return zone;
    }
  }
  return SystemZone.instance;
}
