import { validateMotionConfig } from "@/lib/config";
import {
  bearingTo,
  distanceBetween,
  headingVector,
  normalizeAngle,
  shortestAngleDelta
} from "@/lib/geometry";
import type { Command, MotionConfig, MotionState, Pose, StepResult, SubPhase } from "@/lib/types";
import { validateCommand, validatePose } from "@/lib/validate";

export class MotionError extends Error {
  readonly code = "MOTION_ERROR";
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}

/**
 * Turns one command into an ordered list of rotate/translate sub-phases and
 * advances them tick by tick. Every method is pure: states and poses passed
 * in are never mutated, and the same `(state, dt)` always yields the same
 * result.
 */
export class MotionEngine {
  readonly config: Readonly<MotionConfig>;

  constructor(config: MotionConfig) {
    validateMotionConfig(config);
    this.config = Object.freeze({ ...config });
  }

  planSubPhases(command: Command, pose: Pose): SubPhase[] {
    switch (command.type) {
      case "goto": {
        const finalRotation: SubPhase = {
          kind: "rotate",
          phase: "rotating_final",
          targetAngle: normalizeAngle(command.angle)
        };
        const distance = distanceBetween(pose, command);
        // no bearing exists for a target under the robot
        if (distance < this.config.positionEpsilon) {
          return [finalRotation];
        }
        return [
          { kind: "rotate", phase: "rotating_to_face", targetAngle: bearingTo(pose, command, this.config.convention) },
          { kind: "translate", phase: "moving_forward", distance },
          finalRotation
        ];
      }
      case "forward":
        return [{ kind: "translate", phase: "moving_direct", distance: command.distance }];
      case "rotate":
        return [
          { kind: "rotate", phase: "rotating_relative", targetAngle: normalizeAngle(pose.angle + command.deltaAngle) }
        ];
    }
  }

  begin(command: Command, currentPose: Pose): MotionState {
    validateCommand(command);
    const pose = validatePose(currentPose);

    return this.enter(
      {
        command,
        pose,
        phase: "idle",
        subPhases: this.planSubPhases(command, pose),
        cursor: 0,
        targetAngle: null,
        target: null,
        remaining: 0,
        direction: null,
        linearSpeed: this.config.linearSpeed,
        angularSpeed: this.config.angularSpeed
      },
      0
    );
  }

  step(state: MotionState, dt: number): StepResult {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new MotionError("dt must be a finite, non-negative number of seconds.", { dt });
    }

    const subPhase = state.subPhases[state.cursor];
    if (state.phase === "done" || !subPhase) {
      return { pose: state.pose, state, completed: true, completedPhase: null, completedDirection: null };
    }

    const { pose } = state;

    if (subPhase.kind === "rotate") {
      const delta = shortestAngleDelta(pose.angle, subPhase.targetAngle);
      const turn = Math.min(state.angularSpeed * dt, Math.abs(delta));
      const angle = normalizeAngle(pose.angle + Math.sign(delta) * turn);
      const remaining = Math.abs(shortestAngleDelta(angle, subPhase.targetAngle));

      if (remaining <= this.config.angleEpsilon) {
        return this.complete(state, { ...pose, angle: subPhase.targetAngle });
      }

      const next: Pose = { ...pose, angle };
      return { pose: next, state: { ...state, pose: next, remaining }, completed: false, completedPhase: null, completedDirection: null };
    }

    const travel = Math.min(state.linearSpeed * dt, state.remaining);
    const remaining = state.remaining - travel;

    if (remaining <= this.config.positionEpsilon && state.target) {
      return this.complete(state, { ...pose, x: state.target.x, y: state.target.y });
    }

    const heading = headingVector(pose.angle, this.config.convention);
    const sign = subPhase.distance < 0 ? -1 : 1;
    const next: Pose = {
      x: pose.x + heading.x * sign * travel,
      y: pose.y + heading.y * sign * travel,
      angle: pose.angle
    };
    return { pose: next, state: { ...state, pose: next, remaining }, completed: false, completedPhase: null, completedDirection: null };
  }

  /** Steps with a fixed `dt` until the command completes. */
  run(state: MotionState, dt: number = 1 / this.config.tickRate): StepResult {
    if (!Number.isFinite(dt) || dt <= 0) {
      throw new MotionError("run() needs a positive dt to make progress.", { dt });
    }

    let result = this.step(state, dt);
    while (!result.completed) {
      result = this.step(result.state, dt);
    }
    return result;
  }

  private complete(state: MotionState, pose: Pose): StepResult {
    const finished = state.subPhases[state.cursor];
    const next = this.enter({ ...state, pose }, state.cursor + 1);
    return {
      pose,
      state: next,
      completed: next.phase === "done",
      completedPhase: finished ? finished.phase : null,
      completedDirection: finished?.kind === "translate" ? state.direction : null
    };
  }

  private enter(state: MotionState, cursor: number): MotionState {
    const subPhase = state.subPhases[cursor];
    const { pose, command } = state;

    if (!subPhase) {
      return { ...state, cursor, phase: "done", targetAngle: null, target: null, remaining: 0, direction: null };
    }

    if (subPhase.kind === "rotate") {
      return {
        ...state,
        cursor,
        phase: subPhase.phase,
        targetAngle: subPhase.targetAngle,
        target: null,
        remaining: Math.abs(shortestAngleDelta(pose.angle, subPhase.targetAngle)),
        direction: null
      };
    }

    const heading = headingVector(pose.angle, this.config.convention);
    const target =
      command.type === "goto"
        ? { x: command.x, y: command.y }
        : { x: pose.x + heading.x * subPhase.distance, y: pose.y + heading.y * subPhase.distance };

    return {
      ...state,
      cursor,
      phase: subPhase.phase,
      targetAngle: null,
      target,
      remaining: Math.abs(subPhase.distance),
      direction: subPhase.distance < 0 ? "reverse" : "forward"
    };
  }
}
