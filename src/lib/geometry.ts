import type { AngleConvention, Command, Pose } from "@/lib/types";

const RAD_PER_DEG = Math.PI / 180;

export function normalizeAngle(angle: number): number {
  const wrapped = ((angle % 360) + 360) % 360;
  // -0
  return wrapped === 0 ? 0 : wrapped;
}

/** Signed turn from `from` to `to`, in (-180, 180]. */
export function shortestAngleDelta(from: number, to: number): number {
  const delta = normalizeAngle(to - from);
  return delta > 180 ? delta - 360 : delta;
}

export function toRadians(degrees: number): number {
  return degrees * RAD_PER_DEG;
}

export function toDegrees(radians: number): number {
  return radians / RAD_PER_DEG;
}

export function distanceBetween(a: { x: number; y: number }, b: { x: number; y: number }): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Unit vector the robot travels along at `angle`.
 *
 * `math`: 0° is +x and angles grow counterclockwise.
 * `compass`: 0° is +y and angles grow clockwise.
 */
export function headingVector(angle: number, convention: AngleConvention): { x: number; y: number } {
  const rad = toRadians(angle);
  if (convention === "compass") {
    return { x: Math.sin(rad), y: Math.cos(rad) };
  }
  return { x: Math.cos(rad), y: Math.sin(rad) };
}

export function bearingTo(from: { x: number; y: number }, to: { x: number; y: number }, convention: AngleConvention): number {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const rad = convention === "compass" ? Math.atan2(dx, dy) : Math.atan2(dy, dx);
  return normalizeAngle(toDegrees(rad));
}

export function mirrorHeading(angle: number, convention: AngleConvention): number {
  return convention === "compass" ? normalizeAngle(-angle) : normalizeAngle(180 - angle);
}

// Reflection across the field's vertical center line (x = 0).
export function mirrorPose(pose: Pose, convention: AngleConvention): Pose {
  return { x: -pose.x, y: pose.y, angle: mirrorHeading(pose.angle, convention) };
}

export function mirrorCommand(command: Command, convention: AngleConvention): Command {
  switch (command.type) {
    case "goto":
      return { type: "goto", x: -command.x, y: command.y, angle: mirrorHeading(command.angle, convention) };
    case "forward":
      return { ...command };
    case "rotate":
      return { type: "rotate", deltaAngle: -command.deltaAngle };
  }
}
