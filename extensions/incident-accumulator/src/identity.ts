/**
 * Identity Resolver
 *
 * Decides which real-world incident a record describes. Three tiers are
 * tried in order and the first usable one wins:
 *
 *   1. uuid:            the feed's own identifier
 *   2. location-time:   rounded location + type + report time
 *   3. location-street: rounded location + type + street name
 *
 * Keys from different tiers never compare equal, so a record is only ever
 * matched against entries resolved through the same tier.
 */

import { COORDINATE_DECIMALS } from "./normalizer.js";
import type { Incident, IdentityKey, IncidentType } from "./types.js";

/** Type component of a location key: the known kind, or the raw value. */
export function typeKeyPart(type: IncidentType): string {
  return type.kind === "other" ? `other:${type.raw.toUpperCase()}` : type.kind;
}

export function resolveIdentity(incident: Incident): IdentityKey {
  if (incident.uuid) {
    return { tier: "uuid", uuid: incident.uuid };
  }

  const { lat, lon } = incident.canonical;
  const type = typeKeyPart(incident.type);

  if (incident.timestamp !== undefined) {
    return { tier: "location-time", lat, lon, type, timestamp: incident.timestamp };
  }

  // No time bound at this tier: a recurring incident on the same street
  // resolves to the first one ever seen.
  return { tier: "location-street", lat, lon, type, street: incident.street ?? "" };
}

function coordinate(value: number): string {
  return value.toFixed(COORDINATE_DECIMALS);
}

/**
 * Canonical string form of a key, used as the store's map key. The tuple
 * is JSON-encoded so free-text parts cannot collide with separators.
 */
export function identityKeyString(key: IdentityKey): string {
  switch (key.tier) {
    case "uuid":
      return JSON.stringify(["uuid", key.uuid]);
    case "location-time":
      return JSON.stringify(["loc-time", coordinate(key.lat), coordinate(key.lon), key.type, key.timestamp]);
    case "location-street":
      return JSON.stringify(["loc-street", coordinate(key.lat), coordinate(key.lon), key.type, key.street]);
  }
}

export function incidentKey(incident: Incident): string {
  return identityKeyString(resolveIdentity(incident));
}
