import type { AdvanceResult, Pose, TrajectorySegment } from "@/lib/types";

export class TrajectoryRecorder {
  private anchor: Pose = { x: 0, y: 0, angle: 0 };
  private readonly recorded: TrajectorySegment[] = [];

  reset(startPose: Pose): void {
    this.anchor = { ...startPose };
    this.recorded.length = 0;
  }

  observe(result: AdvanceResult): TrajectorySegment | null {
    if (!result.completed) {
      return null;
    }

    const segment: TrajectorySegment = Object.freeze({
      start: Object.freeze({ ...this.anchor }),
      end: Object.freeze({ ...result.pose }),
      phase: result.completed.phase,
      direction: result.completed.direction,
      commandIndex: result.completed.commandIndex
    });
    this.recorded.push(segment);
    this.anchor = { ...result.pose };
    return segment;
  }

  get segments(): readonly TrajectorySegment[] {
    return this.recorded;
  }

  /** Total path length of translation segments, in mm. */
  get travelled(): number {
    return this.recorded.reduce((sum, segment) => sum + Math.hypot(segment.end.x - segment.start.x, segment.end.y - segment.start.y), 0);
  }
}
