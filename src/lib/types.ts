export type AngleConvention = "math" | "compass";

export type SimulationMode = "live" | "instant";

export type Alliance = "blue" | "yellow";

export interface Pose {
  x: number;
  y: number;
  angle: number;
}

export interface GoToCommand {
  type: "goto";
  x: number;
  y: number;
  angle: number;
}

export interface ForwardCommand {
  type: "forward";
  distance: number;
}

export interface RotateCommand {
  type: "rotate";
  deltaAngle: number;
}

export type Command = GoToCommand | ForwardCommand | RotateCommand;

export type RotationPhase = "rotating_to_face" | "rotating_final" | "rotating_relative";

export type TranslationPhase = "moving_forward" | "moving_direct";

export type MotionPhase = RotationPhase | TranslationPhase | "idle" | "done";

export type TravelDirection = "forward" | "reverse";

export interface RotationSubPhase {
  kind: "rotate";
  phase: RotationPhase;
  targetAngle: number;
}

export interface TranslationSubPhase {
  kind: "translate";
  phase: TranslationPhase;
  // signed: negative values travel in reverse along the heading
  distance: number;
}

export type SubPhase = RotationSubPhase | TranslationSubPhase;

export interface MotionState {
  command: Command;
  pose: Pose;
  phase: MotionPhase;
  subPhases: readonly SubPhase[];
  cursor: number;
  targetAngle: number | null;
  target: { x: number; y: number } | null;
  remaining: number;
  direction: TravelDirection | null;
  linearSpeed: number;
  angularSpeed: number;
}

export interface StepResult {
  pose: Pose;
  state: MotionState;
  completed: boolean;
  completedPhase: MotionPhase | null;
  // set when the sub-phase that just finished was a translation
  completedDirection: TravelDirection | null;
}

export interface MotionConfig {
  linearSpeed: number;
  angularSpeed: number;
  positionEpsilon: number;
  angleEpsilon: number;
  speedMultiplier: number;
  tickRate: number;
  mode: SimulationMode;
  convention: AngleConvention;
}

export type SequencerStatus = "idle" | "loaded" | "running" | "finished";

export interface AdvanceResult {
  pose: Pose;
  phase: MotionPhase;
  direction: TravelDirection | null;
  finishedAll: boolean;
  commandIndex: number;
  completed: CompletedSubPhase | null;
}

export interface CompletedSubPhase {
  phase: MotionPhase;
  direction: TravelDirection | null;
  commandIndex: number;
}

export interface TrajectorySegment {
  start: Pose;
  end: Pose;
  phase: MotionPhase;
  /** Travel direction of translation segments, null for rotations. */
  direction: TravelDirection | null;
  commandIndex: number;
}

export interface ParsedStep {
  name: string;
  commands: Command[];
}

export interface ParsedStrategy {
  startingPose: Pose;
  alliance: Alliance;
  steps: ParsedStep[];
}

export interface LabeledCommand {
  step: string;
  command: Command;
}
