import assert from "node:assert/strict";
import { createMotionConfig } from "../src/lib/config";
import { MotionEngine, MotionError } from "../src/lib/motion_engine";
import { CommandSequencer } from "../src/lib/sequencer";
import { TrajectoryRecorder } from "../src/lib/trajectory";
import type { AdvanceResult, Command } from "../src/lib/types";
import { InvalidCommandError } from "../src/lib/validate";

function run(name: string, fn: () => void) {
  try {
    fn();
    console.log(`PASS ${name}`);
  } catch (error) {
    console.error(`FAIL ${name}`);
    throw error;
  }
}

const DT = 1 / 60;

function makeSequencer() {
  return new CommandSequencer(new MotionEngine(createMotionConfig({ linearSpeed: 500, angularSpeed: 90 })));
}

function drain(sequencer: CommandSequencer, recorder?: TrajectoryRecorder): AdvanceResult[] {
  const results: AdvanceResult[] = [];
  while (!sequencer.finishedAll) {
    const result = sequencer.advance(DT);
    recorder?.observe(result);
    results.push(result);
    assert.ok(results.length < 100_000, "sequencer did not finish");
  }
  return results;
}

run("idle sequencer reports idle and does nothing", () => {
  const sequencer = makeSequencer();
  assert.equal(sequencer.status, "idle");
  assert.equal(sequencer.phase, "idle");
  const result = sequencer.advance(DT);
  assert.equal(result.finishedAll, false);
  assert.deepEqual(result.pose, { x: 0, y: 0, angle: 0 });
});

run("single goto runs loaded -> running -> finished", () => {
  const sequencer = makeSequencer();
  const report = sequencer.load([{ type: "goto", x: 100, y: 0, angle: 90 }], { x: 0, y: 0, angle: 0 });
  assert.deepEqual(report, { accepted: 1, skipped: [] });
  assert.equal(sequencer.status, "loaded");
  assert.equal(sequencer.phase, "rotating_to_face");

  sequencer.advance(DT);
  assert.equal(sequencer.status, "running");

  const results = drain(sequencer);
  const last = results[results.length - 1];
  assert.equal(last.finishedAll, true);
  assert.equal(last.phase, "done");
  assert.deepEqual(last.pose, { x: 100, y: 0, angle: 90 });
  assert.equal(sequencer.status, "finished");
});

run("advance after finishing is idempotent", () => {
  const sequencer = makeSequencer();
  sequencer.load([{ type: "rotate", deltaAngle: -45 }], { x: 12, y: 34, angle: 0 });
  drain(sequencer);

  for (let i = 0; i < 5; i += 1) {
    const result = sequencer.advance(DT);
    assert.deepEqual(result, {
      pose: { x: 12, y: 34, angle: 315 },
      phase: "done",
      direction: null,
      finishedAll: true,
      commandIndex: 1,
      completed: null
    });
  }
});

run("empty strategy finishes immediately", () => {
  const sequencer = makeSequencer();
  const report = sequencer.load([], { x: 5, y: 6, angle: 7 });
  assert.equal(report.accepted, 0);
  assert.equal(sequencer.finishedAll, true);
  assert.equal(sequencer.phase, "done");
  assert.deepEqual(sequencer.advance(DT).pose, { x: 5, y: 6, angle: 7 });
});

run("commands run in order and record one segment per sub-phase", () => {
  const sequencer = makeSequencer();
  const recorder = new TrajectoryRecorder();
  const commands: Command[] = [
    { type: "forward", distance: 100 },
    { type: "rotate", deltaAngle: 90 },
    { type: "forward", distance: 50 }
  ];
  sequencer.load(commands, { x: 0, y: 0, angle: 0 });
  recorder.reset(sequencer.pose);

  const results = drain(sequencer, recorder);
  const indices = [...new Set(results.map((result) => result.commandIndex))];
  assert.deepEqual(indices, [0, 1, 2, 3]);

  const final = sequencer.pose;
  assert.ok(Math.abs(final.x - 100) < 1e-9);
  assert.ok(Math.abs(final.y - 50) < 1e-9);
  assert.equal(final.angle, 90);

  assert.deepEqual(
    recorder.segments.map((segment) => [segment.phase, segment.commandIndex]),
    [
      ["moving_direct", 0],
      ["rotating_relative", 1],
      ["moving_direct", 2]
    ]
  );
  assert.deepEqual(recorder.segments[0].start, { x: 0, y: 0, angle: 0 });
  assert.deepEqual(recorder.segments[0].end, { x: 100, y: 0, angle: 0 });
  assert.deepEqual(recorder.segments[1].start, recorder.segments[0].end);
  assert.ok(Math.abs(recorder.travelled - 150) < 1e-9);
});

run("goto records face, drive and final segments", () => {
  const sequencer = makeSequencer();
  const recorder = new TrajectoryRecorder();
  sequencer.load([{ type: "goto", x: 0, y: 300, angle: 0 }], { x: 0, y: 0, angle: 0 });
  recorder.reset(sequencer.pose);
  drain(sequencer, recorder);

  assert.deepEqual(
    recorder.segments.map((segment) => segment.phase),
    ["rotating_to_face", "moving_forward", "rotating_final"]
  );
  assert.deepEqual(recorder.segments[1].end, { x: 0, y: 300, angle: 90 });
});

run("reverse moves are reported and recorded as reverse", () => {
  const sequencer = makeSequencer();
  const recorder = new TrajectoryRecorder();
  sequencer.load(
    [
      { type: "forward", distance: -50 },
      { type: "goto", x: -50, y: 100, angle: 0 }
    ],
    { x: 0, y: 0, angle: 0 }
  );
  recorder.reset(sequencer.pose);

  assert.equal(sequencer.direction, "reverse");
  const first = sequencer.advance(DT);
  recorder.observe(first);
  assert.equal(first.phase, "moving_direct");
  assert.equal(first.direction, "reverse");

  drain(sequencer, recorder);
  assert.equal(sequencer.direction, null);
  assert.deepEqual(
    recorder.segments.map((segment) => [segment.phase, segment.direction]),
    [
      ["moving_direct", "reverse"],
      ["rotating_to_face", null],
      ["moving_forward", "forward"],
      ["rotating_final", null]
    ]
  );
  assert.deepEqual(recorder.segments[0].end, { x: -50, y: 0, angle: 0 });
});

run("a rejected dt leaves a loaded sequencer loaded", () => {
  const sequencer = makeSequencer();
  sequencer.load([{ type: "forward", distance: 100 }], { x: 0, y: 0, angle: 0 });

  assert.throws(() => sequencer.advance(-1), MotionError);
  assert.equal(sequencer.status, "loaded");
  assert.deepEqual(sequencer.pose, { x: 0, y: 0, angle: 0 });

  sequencer.advance(DT);
  assert.equal(sequencer.status, "running");
});

run("skip drops invalid commands and reports them", () => {
  const sequencer = makeSequencer();
  const report = sequencer.load(
    [
      { type: "forward", distance: 10 },
      { type: "forward", distance: Number.NaN },
      { type: "rotate", deltaAngle: 5 }
    ],
    { x: 0, y: 0, angle: 0 },
    { onInvalid: "skip" }
  );
  assert.equal(report.accepted, 2);
  assert.equal(report.skipped.length, 1);
  assert.equal(report.skipped[0].index, 1);
  assert.ok(report.skipped[0].error instanceof InvalidCommandError);
  assert.equal(sequencer.length, 2);

  drain(sequencer);
  assert.deepEqual(sequencer.pose, { x: 10, y: 0, angle: 5 });
});

run("abort keeps the previous run intact", () => {
  const sequencer = makeSequencer();
  sequencer.load([{ type: "forward", distance: 200 }], { x: 0, y: 0, angle: 0 });
  sequencer.advance(DT);
  const pose = sequencer.pose;

  assert.throws(
    () => sequencer.load([{ type: "rotate", deltaAngle: Number.POSITIVE_INFINITY }], { x: 1, y: 1, angle: 1 }),
    InvalidCommandError
  );
  assert.deepEqual(sequencer.pose, pose);
  assert.equal(sequencer.status, "running");
  assert.equal(sequencer.length, 1);
});

run("load after finishing starts over", () => {
  const sequencer = makeSequencer();
  sequencer.load([{ type: "forward", distance: 20 }], { x: 0, y: 0, angle: 0 });
  drain(sequencer);
  sequencer.load([{ type: "forward", distance: 20 }], { x: 0, y: 0, angle: 180 });
  assert.equal(sequencer.status, "loaded");
  assert.equal(sequencer.commandIndex, 0);
  drain(sequencer);
  assert.ok(Math.abs(sequencer.pose.x + 20) < 1e-9);
});

console.log("All sequencer tests passed.");
