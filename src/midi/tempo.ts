// ─── Tempo Map ───────────────────────────────────────────────────────────────
//
// Tick → wall-clock conversion across tempo changes.
// ─────────────────────────────────────────────────────────────────────────────

import type { TempoMessage } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** 120 BPM, the SMF default when a file carries no setTempo. */
export const DEFAULT_TEMPO = 500_000;

// ─── Public API ──────────────────────────────────────────────────────────────

/** Seconds spanned by `ticks` at a fixed tempo. */
export function ticksToSeconds(
  ticks: number,
  microsecondsPerBeat: number,
  ticksPerBeat: number,
): number {
  return ticks * (microsecondsPerBeat / 1e6) / ticksPerBeat;
}

/**
 * Round to the nearest integer, ties to even.
 * Durations computed elsewhere from the same data round this way, so
 * matching it keeps millisecond values identical across tools.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Index of the tempo segment active at `tick`: the greatest index whose
 * tick is ≤ `tick`, or 0 when `tick` precedes every tempo change.
 */
export function findTempoIndex(tick: number, tempoMsgs: readonly TempoMessage[]): number {
  let idx = 0;
  for (let i = 0; i < tempoMsgs.length; i++) {
    if (tempoMsgs[i].tick <= tick) {
      idx = i;
    } else {
      break;
    }
  }
  return idx;
}

/**
 * Elapsed milliseconds between two ticks.
 *
 * Seconds are summed per tempo segment in floating point and converted to
 * whole milliseconds once at the end; rounding per segment would drift.
 * Past the last tempo change the last tempo keeps applying.
 *
 * @param tempoMsgs Non-empty, sorted ascending by tick.
 */
export function getDurationMs(
  startTick: number,
  endTick: number,
  tempoMsgs: readonly TempoMessage[],
  ticksPerBeat: number,
): number {
  if (tempoMsgs.length === 0) {
    throw new Error("getDurationMs requires at least one tempo message");
  }
  if (endTick < startTick) {
    throw new Error(`endTick (${endTick}) precedes startTick (${startTick})`);
  }

  let seconds = 0;
  let currentTick = startTick;

  for (let i = findTempoIndex(startTick, tempoMsgs); i < tempoMsgs.length; i++) {
    const next = tempoMsgs[i + 1];
    const segmentEnd = next === undefined ? endTick : Math.min(next.tick, endTick);

    if (segmentEnd > currentTick) {
      seconds += ticksToSeconds(segmentEnd - currentTick, tempoMsgs[i].data, ticksPerBeat);
      currentTick = segmentEnd;
    }

    if (next === undefined || next.tick >= endTick) break;
  }

  return roundHalfEven(seconds * 1e3);
}
