import { MAX_SEASON_CHECKED } from "../catalog/client.js";
import type { SeasonStatus } from "../types.js";

/**
 * Season to request next, or null when seasons 1..3 are all available,
 * already requested, or missing from the show.
 *
 * Visits seasons in ascending order: an unavailable season stops the walk and
 * is returned; available or requested/processing seasons are passed over.
 */
export function selectSeason(statuses: readonly SeasonStatus[]): number | null {
  for (let seasonNumber = 1; seasonNumber <= MAX_SEASON_CHECKED; seasonNumber += 1) {
    const status = statuses.find((item) => item.seasonNumber === seasonNumber);
    if (!status) continue;
    if (status.state === "unavailable") return seasonNumber;
  }
  return null;
}
