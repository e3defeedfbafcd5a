import { decode, encode } from "jpeg-js";
import { headingVector } from "@/lib/geometry";
import type { AngleConvention, MotionPhase, Pose, TrajectorySegment, TravelDirection } from "@/lib/types";

export type Rgb = readonly [number, number, number];

export interface FieldGeometry {
  widthMm: number;
  heightMm: number;
  // pixels per mm
  scale: number;
}

export const DEFAULT_FIELD: FieldGeometry = { widthMm: 3000, heightMm: 2000, scale: 0.4 };

export const ROBOT_FOOTPRINT = { lengthMm: 315, widthMm: 235, circleMarginMm: 20 } as const;

export const BACKDROP_ALPHA = 200;

const BLACK: Rgb = [0, 0, 0];
const WHITE: Rgb = [255, 255, 255];
const RED: Rgb = [255, 0, 0];
const GREEN: Rgb = [0, 255, 0];
const YELLOW: Rgb = [255, 255, 0];
const ORANGE: Rgb = [255, 165, 0];
const SLATE: Rgb = [100, 116, 139];

export const PHASE_COLORS: Record<MotionPhase | "moving_reverse", Rgb> = {
  rotating_to_face: YELLOW,
  moving_forward: GREEN,
  rotating_final: RED,
  rotating_relative: RED,
  moving_direct: WHITE,
  moving_reverse: ORANGE,
  idle: WHITE,
  done: WHITE
};

export function trailColor(phase: MotionPhase, direction: TravelDirection | null): Rgb {
  return direction === "reverse" ? PHASE_COLORS.moving_reverse : PHASE_COLORS[phase];
}

// Liang-Barsky against an inclusive box; null when the segment misses it.
function clipSegment(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  box: { minX: number; minY: number; maxX: number; maxY: number }
): [number, number, number, number] | null {
  const dx = x1 - x0;
  const dy = y1 - y0;
  let t0 = 0;
  let t1 = 1;
  const edges: Array<[number, number]> = [
    [-dx, x0 - box.minX],
    [dx, box.maxX - x0],
    [-dy, y0 - box.minY],
    [dy, box.maxY - y0]
  ];

  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return null;
      continue;
    }
    const t = q / p;
    if (p < 0) {
      if (t > t1) return null;
      t0 = Math.max(t0, t);
    } else {
      if (t < t0) return null;
      t1 = Math.min(t1, t);
    }
  }

  return [Math.round(x0 + t0 * dx), Math.round(y0 + t0 * dy), Math.round(x0 + t1 * dx), Math.round(y0 + t1 * dy)];
}

export class FieldCanvas {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.data = Buffer.alloc(width * height * 4);
    this.fill(BLACK);
  }

  fill(color: Rgb): void {
    for (let i = 0; i < this.width * this.height; i += 1) {
      this.data[i * 4] = color[0];
      this.data[i * 4 + 1] = color[1];
      this.data[i * 4 + 2] = color[2];
      this.data[i * 4 + 3] = 255;
    }
  }

  getPixel(x: number, y: number): Rgb {
    const offset = (y * this.width + x) * 4;
    return [this.data[offset], this.data[offset + 1], this.data[offset + 2]];
  }

  setPixel(x: number, y: number, color: Rgb): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    const offset = (Math.trunc(y) * this.width + Math.trunc(x)) * 4;
    this.data[offset] = color[0];
    this.data[offset + 1] = color[1];
    this.data[offset + 2] = color[2];
    this.data[offset + 3] = 255;
  }

  drawLine(fromX: number, fromY: number, toX: number, toY: number, color: Rgb, thickness = 2): void {
    // only the part that can stamp a visible pixel is walked
    const clipped = clipSegment(fromX, fromY, toX, toY, {
      minX: 1 - thickness,
      minY: 1 - thickness,
      maxX: this.width - 1,
      maxY: this.height - 1
    });
    if (!clipped) return;

    const [x0, y0, x1, y1] = clipped;
    const dx = Math.abs(x1 - x0);
    const dy = -Math.abs(y1 - y0);
    const sx = x0 < x1 ? 1 : -1;
    const sy = y0 < y1 ? 1 : -1;
    let err = dx + dy;
    let x = x0;
    let y = y0;

    for (;;) {
      for (let ox = 0; ox < thickness; ox += 1) {
        for (let oy = 0; oy < thickness; oy += 1) {
          this.setPixel(x + ox, y + oy, color);
        }
      }
      if (x === x1 && y === y1) break;
      const e2 = 2 * err;
      if (e2 >= dy) {
        err += dy;
        x += sx;
      }
      if (e2 <= dx) {
        err += dx;
        y += sy;
      }
    }
  }

  fillCircle(cx: number, cy: number, radius: number, color: Rgb): void {
    const r = Math.max(0, Math.trunc(radius));
    for (let oy = -r; oy <= r; oy += 1) {
      for (let ox = -r; ox <= r; ox += 1) {
        if (ox * ox + oy * oy <= r * r) {
          this.setPixel(cx + ox, cy + oy, color);
        }
      }
    }
  }
}

export interface FrameInput {
  pose: Pose;
  segments: readonly TrajectorySegment[];
  backdrop?: FieldCanvas | null;
}

/**
 * Draws the field in screen space: origin at the bottom center, +x right,
 * +y up, `scale` pixels per mm.
 */
export class FieldRenderer {
  readonly field: FieldGeometry;
  readonly convention: AngleConvention;
  readonly width: number;
  readonly height: number;

  constructor(convention: AngleConvention, field: FieldGeometry = DEFAULT_FIELD) {
    this.field = field;
    this.convention = convention;
    this.width = Math.trunc(field.widthMm * field.scale);
    this.height = Math.trunc(field.heightMm * field.scale);
  }

  worldToScreen(x: number, y: number): [number, number] {
    return [Math.trunc(x * this.field.scale + this.width / 2), Math.trunc(this.height - y * this.field.scale)];
  }

  screenToWorld(screenX: number, screenY: number): { x: number; y: number } {
    return {
      x: (screenX - this.width / 2) / this.field.scale,
      y: (this.height - screenY) / this.field.scale
    };
  }

  render(frame: FrameInput): FieldCanvas {
    const canvas = new FieldCanvas(this.width, this.height);
    if (frame.backdrop && frame.backdrop.width === this.width && frame.backdrop.height === this.height) {
      frame.backdrop.data.copy(canvas.data);
    }

    this.drawRobot(canvas, frame.pose);
    this.drawTrajectory(canvas, frame.segments);
    return canvas;
  }

  private drawTrajectory(canvas: FieldCanvas, segments: readonly TrajectorySegment[]): void {
    for (const segment of segments) {
      const color = trailColor(segment.phase, segment.direction);
      const [x0, y0] = this.worldToScreen(segment.start.x, segment.start.y);
      const [x1, y1] = this.worldToScreen(segment.end.x, segment.end.y);
      if (x0 === x1 && y0 === y1) {
        // rotations leave no line; mark where they happened
        canvas.fillCircle(x0, y0, 3, color);
      } else {
        canvas.drawLine(x0, y0, x1, y1, color);
      }
    }
  }

  private drawRobot(canvas: FieldCanvas, pose: Pose): void {
    const { lengthMm, widthMm, circleMarginMm } = ROBOT_FOOTPRINT;
    const [cx, cy] = this.worldToScreen(pose.x, pose.y);
    canvas.fillCircle(cx, cy, ((lengthMm + circleMarginMm) / 2) * this.field.scale, RED);

    const forward = headingVector(pose.angle, this.convention);
    const side = { x: -forward.y, y: forward.x };
    const corner = (f: number, s: number) =>
      this.worldToScreen(
        pose.x + forward.x * f * (lengthMm / 2) + side.x * s * (widthMm / 2),
        pose.y + forward.y * f * (lengthMm / 2) + side.y * s * (widthMm / 2)
      );

    const corners = [corner(1, 1), corner(1, -1), corner(-1, -1), corner(-1, 1)];
    corners.forEach(([x0, y0], index) => {
      const [x1, y1] = corners[(index + 1) % corners.length];
      canvas.drawLine(x0, y0, x1, y1, SLATE);
    });

    const [hx, hy] = this.worldToScreen(pose.x + forward.x * (lengthMm / 2), pose.y + forward.y * (lengthMm / 2));
    canvas.drawLine(cx, cy, hx, hy, GREEN);
  }
}

/** Decodes a JPEG backdrop, scales it to the canvas and dims it over black. */
export function decodeBackdrop(jpegBytes: Uint8Array, width: number, height: number, alpha = BACKDROP_ALPHA): FieldCanvas {
  const image = decode(jpegBytes, { useTArray: true });
  const canvas = new FieldCanvas(width, height);
  const weight = alpha / 255;

  for (let y = 0; y < height; y += 1) {
    const srcY = Math.min(image.height - 1, Math.trunc((y * image.height) / height));
    for (let x = 0; x < width; x += 1) {
      const srcX = Math.min(image.width - 1, Math.trunc((x * image.width) / width));
      const offset = (srcY * image.width + srcX) * 4;
      canvas.setPixel(x, y, [
        Math.round(image.data[offset] * weight),
        Math.round(image.data[offset + 1] * weight),
        Math.round(image.data[offset + 2] * weight)
      ]);
    }
  }

  return canvas;
}

export function encodeFrame(canvas: FieldCanvas, quality = 90): Buffer {
  return encode({ data: canvas.data, width: canvas.width, height: canvas.height }, quality).data;
}
