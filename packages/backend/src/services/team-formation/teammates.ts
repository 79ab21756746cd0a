import type { Player } from './models.js';

/**
 * Normalize a name for matching: lowercase letters only
 * "Mary-Kate O'Neil" -> "marykateoneil"
 */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z]/g, '');
}

/**
 * Resolve every player's free-text teammate requests to player ids.
 *
 * Names are matched exactly after normalization against "first last".
 * A name shared by several players resolves to all of them. Requests for
 * oneself and repeated requests collapse away, so each player ends up with a
 * set of distinct requested ids.
 */
export function buildTeammateRequestIndex(players: readonly Player[]): Map<string, ReadonlySet<string>> {
  const idsByName = new Map<string, string[]>();
  for (const player of players) {
    const key = normalizeName(`${player.firstName}${player.lastName}`);
    const ids = idsByName.get(key);
    if (ids) {
      ids.push(player.id);
    } else {
      idsByName.set(key, [player.id]);
    }
  }

  const requests = new Map<string, ReadonlySet<string>>();
  for (const player of players) {
    const requested = new Set<string>();
    for (const name of player.teammateRequests) {
      const key = normalizeName(name);
      if (key.length === 0) continue;
      for (const id of idsByName.get(key) ?? []) {
        if (id !== player.id) requested.add(id);
      }
    }
    requests.set(player.id, requested);
  }
  return requests;
}
