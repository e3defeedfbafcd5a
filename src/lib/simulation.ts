import type { CommandSequencer } from "@/lib/sequencer";
import type { TrajectoryRecorder } from "@/lib/trajectory";
import type { AdvanceResult, MotionConfig, TrajectorySegment } from "@/lib/types";

export interface LiveClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: LiveClock = {
  now: () => performance.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms))
};

export interface FrameInfo {
  tick: number;
  dt: number;
  result: AdvanceResult;
  segment: TrajectorySegment | null;
}

export interface RunSummary {
  ticks: number;
  aborted: boolean;
  final: AdvanceResult;
}

export interface LiveOptions {
  clock?: LiveClock;
  signal?: AbortSignal;
  onFrame?: (frame: FrameInfo) => void;
}

function idleResult(sequencer: CommandSequencer): AdvanceResult {
  return {
    pose: sequencer.pose,
    phase: sequencer.phase,
    direction: sequencer.direction,
    finishedAll: sequencer.finishedAll,
    commandIndex: sequencer.commandIndex,
    completed: null
  };
}

/** Runs to completion synchronously with a fixed `1 / tickRate` step. */
export function runInstant(
  sequencer: CommandSequencer,
  recorder: TrajectoryRecorder,
  config: Pick<MotionConfig, "tickRate">,
  onFrame?: (frame: FrameInfo) => void
): RunSummary {
  const dt = 1 / config.tickRate;
  let ticks = 0;
  let final = idleResult(sequencer);

  while (!sequencer.finishedAll && sequencer.status !== "idle") {
    final = sequencer.advance(dt);
    ticks += 1;
    const segment = recorder.observe(final);
    onFrame?.({ tick: ticks, dt, result: final, segment });
  }

  return { ticks, aborted: false, final };
}

/**
 * Paces frames at `tickRate` against the clock. Each frame advances by the
 * wall-clock time since the previous one, scaled by `speedMultiplier`.
 */
export async function runLive(
  sequencer: CommandSequencer,
  recorder: TrajectoryRecorder,
  config: Pick<MotionConfig, "tickRate" | "speedMultiplier">,
  options: LiveOptions = {}
): Promise<RunSummary> {
  const clock = options.clock ?? systemClock;
  const frameMs = 1000 / config.tickRate;
  let ticks = 0;
  let final = idleResult(sequencer);
  let last = clock.now();

  while (!sequencer.finishedAll && sequencer.status !== "idle") {
    if (options.signal?.aborted) {
      return { ticks, aborted: true, final };
    }

    await clock.sleep(frameMs);
    if (options.signal?.aborted) {
      return { ticks, aborted: true, final };
    }

    const now = clock.now();
    const dt = ((now - last) / 1000) * config.speedMultiplier;
    last = now;

    final = sequencer.advance(dt);
    ticks += 1;
    const segment = recorder.observe(final);
    options.onFrame?.({ tick: ticks, dt, result: final, segment });
  }

  return { ticks, aborted: false, final };
}
