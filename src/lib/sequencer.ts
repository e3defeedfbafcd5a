import type { MotionEngine } from "@/lib/motion_engine";
import type {
  AdvanceResult,
  Command,
  CompletedSubPhase,
  MotionPhase,
  MotionState,
  Pose,
  SequencerStatus,
  TravelDirection
} from "@/lib/types";
import { InvalidCommandError, validateCommand, validatePose } from "@/lib/validate";

export interface LoadOptions {
  /** `abort` rejects the whole load; `skip` drops invalid commands. */
  onInvalid?: "abort" | "skip";
}

export interface SkippedCommand {
  index: number;
  error: InvalidCommandError;
}

export interface LoadReport {
  accepted: number;
  skipped: SkippedCommand[];
}

/**
 * Owns the ordered commands of a run and feeds them to the engine one at a
 * time. The rendering side pulls `pose`/`phase` once per tick.
 *
 * idle -> loaded -> running -> finished; only `load` leaves `finished`.
 */
export class CommandSequencer {
  private readonly engine: MotionEngine;
  private commands: Command[] = [];
  private cursor = 0;
  private state: MotionState | null = null;
  private currentPose: Pose = { x: 0, y: 0, angle: 0 };
  private currentStatus: SequencerStatus = "idle";

  constructor(engine: MotionEngine) {
    this.engine = engine;
  }

  load(commands: readonly Command[], startingPose: Pose, options: LoadOptions = {}): LoadReport {
    const pose = validatePose(startingPose);
    const accepted: Command[] = [];
    const skipped: SkippedCommand[] = [];

    commands.forEach((command, index) => {
      try {
        validateCommand(command, index);
        accepted.push(command);
      } catch (error) {
        if (!(error instanceof InvalidCommandError) || options.onInvalid !== "skip") {
          throw error;
        }
        skipped.push({ index, error });
      }
    });

    this.commands = accepted;
    this.cursor = 0;
    this.currentPose = pose;

    if (accepted.length === 0) {
      this.state = null;
      this.currentStatus = "finished";
    } else {
      this.state = this.engine.begin(accepted[0], pose);
      this.currentStatus = "loaded";
    }

    return { accepted: accepted.length, skipped };
  }

  advance(dt: number): AdvanceResult {
    if (this.currentStatus === "idle") {
      return this.snapshot(null);
    }

    if (this.currentStatus === "finished" || !this.state) {
      this.currentStatus = "finished";
      return this.snapshot(null);
    }

    const index = this.cursor;
    const result = this.engine.step(this.state, dt);
    this.currentStatus = "running";
    this.currentPose = result.pose;
    this.state = result.state;

    if (result.completed) {
      this.cursor += 1;
      const next = this.commands[this.cursor];
      if (next) {
        this.state = this.engine.begin(next, result.pose);
      } else {
        this.state = null;
        this.currentStatus = "finished";
      }
    }

    return this.snapshot(
      result.completedPhase
        ? { phase: result.completedPhase, direction: result.completedDirection, commandIndex: index }
        : null
    );
  }

  get pose(): Pose {
    return { ...this.currentPose };
  }

  get phase(): MotionPhase {
    if (this.currentStatus === "idle") return "idle";
    if (this.currentStatus === "finished" || !this.state) return "done";
    return this.state.phase;
  }

  /** Direction of the translation in flight, null while rotating or stopped. */
  get direction(): TravelDirection | null {
    if (this.currentStatus === "idle" || this.currentStatus === "finished" || !this.state) return null;
    return this.state.direction;
  }

  get status(): SequencerStatus {
    return this.currentStatus;
  }

  get finishedAll(): boolean {
    return this.currentStatus === "finished";
  }

  /** Index of the command in flight, or the command count once finished. */
  get commandIndex(): number {
    return this.cursor;
  }

  get length(): number {
    return this.commands.length;
  }

  private snapshot(completed: CompletedSubPhase | null): AdvanceResult {
    return {
      pose: this.pose,
      phase: this.phase,
      direction: this.direction,
      finishedAll: this.finishedAll,
      commandIndex: this.cursor,
      completed
    };
  }
}
