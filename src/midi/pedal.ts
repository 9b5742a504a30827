// ─── Sustain Pedal ───────────────────────────────────────────────────────────
//
// Sustain intervals, pedal-driven note extension, and pruning of pedal
// presses that never affect a note.
// ─────────────────────────────────────────────────────────────────────────────

import type {
  NoteMessage,
  PedalMessage,
  PedalInterval,
  PedalIntervals,
} from "./types.js";
import { resolveOverlaps } from "./overlaps.js";

// ─── Intervals ───────────────────────────────────────────────────────────────

/**
 * Build the per-channel sustain intervals.
 *
 * `pedalMsgs` is stable-sorted by tick in place. Repeated presses and
 * releases are ignored here. A pedal still down after the last message is
 * closed at the latest note end over every channel; with no notes at all
 * it closes where it opened.
 */
export function buildPedalIntervals(
  pedalMsgs: PedalMessage[],
  noteMsgs: readonly NoteMessage[],
): PedalIntervals {
  pedalMsgs.sort((a, b) => a.tick - b.tick);

  const intervals: PedalIntervals = new Map();
  const downSince = new Map<number, number>();

  const push = (channel: number, interval: PedalInterval): void => {
    const list = intervals.get(channel);
    if (list) {
      list.push(interval);
    } else {
      intervals.set(channel, [interval]);
    }
  };

  for (const msg of pedalMsgs) {
    const start = downSince.get(msg.channel);
    if (msg.data === 1 && start === undefined) {
      downSince.set(msg.channel, msg.tick);
    } else if (msg.data === 0 && start !== undefined) {
      push(msg.channel, [start, msg.tick]);
      downSince.delete(msg.channel);
    }
  }

  let finalTick: number | undefined;
  for (const msg of noteMsgs) {
    if (finalTick === undefined || msg.data.end > finalTick) finalTick = msg.data.end;
  }
  for (const [channel, start] of downSince) {
    push(channel, [start, finalTick ?? start]);
  }

  return intervals;
}

// ─── Extension ───────────────────────────────────────────────────────────────

/**
 * Extend every note that ends strictly inside a sustain interval on its
 * channel to the end of that interval, then resolve the overlaps this can
 * create. Notes are edited in place.
 *
 * Not idempotent: running it again on extended notes can extend them
 * further, because intervals are rebuilt from the pedal messages.
 */
export function extendNotesWithPedal(
  noteMsgs: readonly NoteMessage[],
  pedalMsgs: PedalMessage[],
): void {
  const intervals = buildPedalIntervals(pedalMsgs, noteMsgs);

  for (const msg of noteMsgs) {
    const channelIntervals = intervals.get(msg.channel);
    if (!channelIntervals) continue;

    const end = msg.data.end;
    for (const [pedalStart, pedalEnd] of channelIntervals) {
      if (pedalStart < end && end < pedalEnd) {
        msg.data.end = pedalEnd;
        break;
      }
    }
  }

  resolveOverlaps(noteMsgs);
}

// ─── Pruning ─────────────────────────────────────────────────────────────────

/**
 * Whether a pedal held over `[start, end]` touches any note, meaning some
 * note on the channel ends inside it (a release that lands exactly on a
 * note end counts).
 *
 * @param notes Notes on the pedal's channel, sorted by start.
 */
export function isPedalUseful(
  start: number,
  end: number,
  notes: readonly NoteMessage[],
): boolean {
  for (const note of notes) {
    if (note.data.start > end) break;
    if (start <= note.data.end && note.data.end <= end) return true;
  }
  return false;
}

/**
 * Return the pedal messages that survive pruning, in their original order.
 *
 * Per channel:
 * - no notes on the channel: every pedal message goes;
 * - a release while up, or a press while down, goes;
 * - a press/release pair that touches no note goes (both messages);
 * - a press never released goes.
 */
export function pruneRedundantPedals(
  pedalMsgs: readonly PedalMessage[],
  noteMsgs: readonly NoteMessage[],
): PedalMessage[] {
  const byChannel = new Map<number, number[]>();
  pedalMsgs.forEach((msg, idx) => {
    const idxs = byChannel.get(msg.channel);
    if (idxs) {
      idxs.push(idx);
    } else {
      byChannel.set(msg.channel, [idx]);
    }
  });

  const remove = new Set<number>();

  for (const [channel, idxs] of byChannel) {
    const notes = noteMsgs
      .filter(msg => msg.channel === channel)
      .sort((a, b) => a.data.start - b.data.start);

    if (notes.length === 0) {
      for (const idx of idxs) remove.add(idx);
      continue;
    }

    let down: { tick: number; idx: number } | undefined;

    for (let position = 0; position < idxs.length; position++) {
      const idx = idxs[position];
      const msg = pedalMsgs[idx];

      if (position === idxs.length - 1 && msg.data === 1) {
        remove.add(idx);
      }

      if (down === undefined) {
        if (msg.data === 1) {
          down = { tick: msg.tick, idx };
        } else {
          remove.add(idx);
        }
        continue;
      }

      if (msg.data === 1) {
        remove.add(idx);
        continue;
      }

      if (!isPedalUseful(down.tick, msg.tick, notes)) {
        remove.add(down.idx);
        remove.add(idx);
      }
      down = undefined;
    }

    if (down !== undefined) remove.add(down.idx);
  }

  return pedalMsgs.filter((_, idx) => !remove.has(idx));
}
