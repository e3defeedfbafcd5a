import assert from "node:assert/strict";
import { encode } from "jpeg-js";
import {
  decodeBackdrop,
  encodeFrame,
  FieldCanvas,
  FieldRenderer,
  PHASE_COLORS
} from "../src/lib/render";
import type { TrajectorySegment } from "../src/lib/types";

function run(name: string, fn: () => void) {
  try {
    fn();
    console.log(`PASS ${name}`);
  } catch (error) {
    console.error(`FAIL ${name}`);
    throw error;
  }
}

function segment(
  phase: TrajectorySegment["phase"],
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  direction: TrajectorySegment["direction"] = null
): TrajectorySegment {
  return { start: { x: x0, y: y0, angle: 0 }, end: { x: x1, y: y1, angle: 0 }, phase, direction, commandIndex: 0 };
}

run("field is 1200 x 800 pixels at 0.4 px/mm", () => {
  const renderer = new FieldRenderer("math");
  assert.equal(renderer.width, 1200);
  assert.equal(renderer.height, 800);
});

run("world origin sits at the bottom center", () => {
  const renderer = new FieldRenderer("math");
  assert.deepEqual(renderer.worldToScreen(0, 0), [600, 800]);
  assert.deepEqual(renderer.worldToScreen(-1500, 2000), [0, 0]);
  assert.deepEqual(renderer.worldToScreen(250, 500), [700, 600]);
});

run("screenToWorld echoes click positions in mm", () => {
  const renderer = new FieldRenderer("math");
  assert.deepEqual(renderer.screenToWorld(600, 400), { x: 0, y: 1000 });
  assert.deepEqual(renderer.screenToWorld(700, 600), { x: 250, y: 500 });
  assert.deepEqual(renderer.screenToWorld(0, 800), { x: -1500, y: 0 });
});

run("trajectory segments are drawn in their phase color", () => {
  const renderer = new FieldRenderer("math");
  const canvas = renderer.render({
    pose: { x: 500, y: 500, angle: 0 },
    segments: [segment("moving_forward", 0, 500, 500, 500), segment("moving_direct", -1000, 1500, -500, 1500)]
  });

  assert.deepEqual(canvas.getPixel(700, 600), PHASE_COLORS.moving_forward);
  assert.deepEqual(canvas.getPixel(300, 200), PHASE_COLORS.moving_direct);
  assert.deepEqual(canvas.getPixel(10, 10), [0, 0, 0]);
});

run("reverse moves get their own color", () => {
  const renderer = new FieldRenderer("math");
  const canvas = renderer.render({
    pose: { x: 1000, y: 1500, angle: 0 },
    segments: [
      segment("moving_direct", -1000, 500, -500, 500, "reverse"),
      segment("moving_direct", -1000, 1000, -500, 1000, "forward")
    ]
  });
  assert.deepEqual(canvas.getPixel(300, 600), PHASE_COLORS.moving_reverse);
  assert.deepEqual(canvas.getPixel(300, 400), PHASE_COLORS.moving_direct);
  assert.notDeepEqual(PHASE_COLORS.moving_reverse, PHASE_COLORS.moving_direct);
});

run("lines running far off the canvas are clipped to it", () => {
  const canvas = new FieldCanvas(1200, 800);
  canvas.drawLine(600, 400, 600 + 4e11, 400, [0, 255, 0]);
  assert.deepEqual(canvas.getPixel(600, 400), [0, 255, 0]);
  assert.deepEqual(canvas.getPixel(1199, 400), [0, 255, 0]);
  assert.deepEqual(canvas.getPixel(1199, 401), [0, 255, 0]);
  assert.deepEqual(canvas.getPixel(599, 400), [0, 0, 0]);

  const untouched = new FieldCanvas(1200, 800);
  untouched.drawLine(-4e11, -5000, -10, -3000, [255, 0, 0]);
  assert.ok(untouched.data.equals(new FieldCanvas(1200, 800).data));
});

run("rotation segments are marked with a dot", () => {
  const renderer = new FieldRenderer("math");
  const canvas = renderer.render({
    pose: { x: 1000, y: 1500, angle: 0 },
    segments: [segment("rotating_to_face", -1000, 500, -1000, 500)]
  });
  assert.deepEqual(canvas.getPixel(200, 600), [255, 255, 0]);
  assert.deepEqual(canvas.getPixel(202, 602), [255, 255, 0]);
  assert.deepEqual(canvas.getPixel(205, 600), [0, 0, 0]);
});

run("robot is drawn with a bounding circle and heading", () => {
  const renderer = new FieldRenderer("math");
  const canvas = renderer.render({ pose: { x: 0, y: 1000, angle: 90 }, segments: [] });
  // heading points up the screen from the center at (600, 400)
  assert.deepEqual(canvas.getPixel(600, 380), [0, 255, 0]);
  // inside the circle but off the footprint outline and heading line
  assert.deepEqual(canvas.getPixel(620, 420), [255, 0, 0]);
});

run("backdrop is scaled and dimmed over black", () => {
  const width = 16;
  const height = 16;
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < width * height; i += 1) {
    data[i * 4] = 200;
    data[i * 4 + 1] = 200;
    data[i * 4 + 2] = 200;
    data[i * 4 + 3] = 255;
  }
  const jpegBytes = encode({ data, width, height }, 100).data;

  const backdrop = decodeBackdrop(jpegBytes, 40, 20);
  assert.equal(backdrop.width, 40);
  assert.equal(backdrop.height, 20);
  const [r, g, b] = backdrop.getPixel(25, 10);
  for (const channel of [r, g, b]) {
    assert.ok(Math.abs(channel - 157) <= 3, `channel ${channel} not dimmed to ~157`);
  }
});

run("backdrop of the wrong size is ignored", () => {
  const renderer = new FieldRenderer("math");
  const backdrop = new FieldCanvas(10, 10);
  backdrop.fill([255, 255, 255]);
  const canvas = renderer.render({ pose: { x: 0, y: 1000, angle: 0 }, segments: [], backdrop });
  assert.deepEqual(canvas.getPixel(5, 5), [0, 0, 0]);
});

run("encodeFrame produces a JPEG", () => {
  const canvas = new FieldCanvas(32, 24);
  canvas.drawLine(0, 0, 31, 23, [255, 0, 0]);
  const bytes = encodeFrame(canvas, 80);
  assert.equal(bytes[0], 0xff);
  assert.equal(bytes[1], 0xd8);
  assert.equal(bytes[bytes.length - 2], 0xff);
  assert.equal(bytes[bytes.length - 1], 0xd9);
});

console.log("All render tests passed.");
