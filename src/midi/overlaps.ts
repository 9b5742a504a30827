// ─── Overlap Resolution ──────────────────────────────────────────────────────
//
// Trims same-pitch, same-channel note overlaps so that a note always ends
// no later than the next one on its key starts.
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteMessage } from "./types.js";

/**
 * Group notes by (channel, pitch). Each group holds references to the
 * caller's note records, so edits made through a group land in the
 * original array.
 */
export function groupByChannelPitch(
  noteMsgs: readonly NoteMessage[],
): Map<string, NoteMessage[]> {
  const groups = new Map<string, NoteMessage[]>();
  for (const msg of noteMsgs) {
    const key = `${msg.channel}:${msg.data.pitch}`;
    const group = groups.get(key);
    if (group) {
      group.push(msg);
    } else {
      groups.set(key, [msg]);
    }
  }
  return groups;
}

/**
 * Resolve overlaps in place.
 *
 * For a pair of notes on the same key with a < b < c:
 *
 *   [a, b + x], [b - y, c]  →  [a, b - y], [b - y, c]
 *
 * Only the earlier note's end moves. Start ticks, velocities and the order
 * of `noteMsgs` are left alone.
 */
export function resolveOverlaps(noteMsgs: readonly NoteMessage[]): void {
  for (const group of groupByChannelPitch(noteMsgs).values()) {
    group.sort((a, b) => a.data.start - b.data.start || a.data.end - b.data.end);

    for (let i = 1; i < group.length; i++) {
      const prev = group[i - 1];
      const curr = group[i];
      if (prev.data.end > curr.data.start) {
        prev.data.end = curr.data.start;
      }
    }
  }
}
