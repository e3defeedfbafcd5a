import fs from "node:fs";
import path from "node:path";
import { InvalidConfigurationError, isSimulationMode, loadMotionConfig } from "@/lib/config";
import { MotionEngine, MotionError } from "@/lib/motion_engine";
import { decodeBackdrop, encodeFrame, FieldRenderer } from "@/lib/render";
import { CommandSequencer } from "@/lib/sequencer";
import { runInstant, runLive, type FrameInfo, type RunSummary } from "@/lib/simulation";
import { TrajectoryRecorder } from "@/lib/trajectory";
import type { Command, MotionConfig, Pose } from "@/lib/types";
import { InvalidCommandError, loadStrategyFile, strategyCommands, ValidationError } from "@/lib/validate";

export interface CliOptions {
  strategyPath: string;
  outPath: string;
  mapPath?: string;
  probe?: [number, number];
  overrides: Partial<MotionConfig>;
}

const USAGE = "Usage: field-motion-sim [live|instant] [speed] [--strategy file] [--out file] [--map file] [--probe px,py]";

function parsePositive(raw: string, label: string): number {
  const value = Number(raw);
  if (!raw.trim() || !Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigurationError(`${label} must be positive.`, { value: raw });
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { strategyPath: "strategy.json", outPath: "frame.jpg", overrides: {} };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined) {
      throw new InvalidConfigurationError(`${arg} needs a value.`, { usage: USAGE });
    }
    i += 1;

    if (arg === "--strategy") {
      options.strategyPath = value;
    } else if (arg === "--out") {
      options.outPath = value;
    } else if (arg === "--map") {
      options.mapPath = value;
    } else if (arg === "--probe") {
      const parts = value.split(",").map((part) => Number(part));
      if (parts.length !== 2 || parts.some((part) => !Number.isFinite(part))) {
        throw new InvalidConfigurationError("--probe must be in format: 'px,py'.", { value });
      }
      options.probe = [parts[0], parts[1]];
    } else {
      throw new InvalidConfigurationError(`Unknown option: ${arg}`, { usage: USAGE });
    }
  }

  const [mode, speed] = positional;
  if (mode !== undefined) {
    if (!isSimulationMode(mode)) {
      throw new InvalidConfigurationError(`Invalid mode: ${mode}`, { usage: USAGE });
    }
    options.overrides.mode = mode;
  }
  if (speed !== undefined) {
    options.overrides.speedMultiplier = parsePositive(speed, "Speed multiplier");
  }

  return options;
}

export function describeCommand(command: Command): string {
  switch (command.type) {
    case "goto":
      return `goto ${command.x},${command.y},${command.angle}`;
    case "forward":
      return `forward ${command.distance}`;
    case "rotate":
      return `rotate ${command.deltaAngle}`;
  }
}

export function formatPose(pose: Pose): string {
  return `X: ${pose.x.toFixed(1)} Y: ${pose.y.toFixed(1)} Angle: ${pose.angle.toFixed(1)}°`;
}

function isKnownError(
  error: unknown
): error is InvalidConfigurationError | ValidationError | InvalidCommandError | MotionError {
  return (
    error instanceof InvalidConfigurationError ||
    error instanceof ValidationError ||
    error instanceof InvalidCommandError ||
    error instanceof MotionError
  );
}

/** Runs one simulation and returns the process exit code. */
export async function runCli(argv: readonly string[], signal?: AbortSignal): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    const config = loadMotionConfig(options.overrides);
    const renderer = new FieldRenderer(config.convention);

    if (options.probe) {
      const [px, py] = options.probe;
      const world = renderer.screenToWorld(px, py);
      console.log(`[sim] screen ${px},${py} -> world ${world.x.toFixed(1)},${world.y.toFixed(1)} mm`);
      return 0;
    }

    const strategy = loadStrategyFile(options.strategyPath);
    const { startingPose, commands } = strategyCommands(strategy, config.convention);
    const backdrop = options.mapPath
      ? decodeBackdrop(fs.readFileSync(options.mapPath), renderer.width, renderer.height)
      : null;

    const engine = new MotionEngine(config);
    const sequencer = new CommandSequencer(engine);
    const recorder = new TrajectoryRecorder();
    sequencer.load(
      commands.map((entry) => entry.command),
      startingPose
    );
    recorder.reset(sequencer.pose);

    console.log(
      `[sim] loaded ${commands.length} commands from ${options.strategyPath} (${strategy.alliance}, ${config.mode} mode, convention ${config.convention})`
    );

    const writeFrame = () => {
      const frame = renderer.render({ pose: sequencer.pose, segments: recorder.segments, backdrop });
      fs.mkdirSync(path.dirname(path.resolve(options.outPath)), { recursive: true });
      fs.writeFileSync(options.outPath, encodeFrame(frame));
    };

    let announced = -1;
    const announce = (index: number) => {
      const entry = commands[index];
      if (!entry || index === announced) return;
      announced = index;
      console.log(`[sim] ${entry.step}: ${describeCommand(entry.command)}`);
    };
    announce(0);

    const onFrame = (frame: FrameInfo) => {
      if (frame.segment && config.mode === "live") {
        writeFrame();
      }
      announce(frame.result.commandIndex);
    };

    let summary: RunSummary;
    if (config.mode === "instant") {
      summary = runInstant(sequencer, recorder, config, onFrame);
    } else {
      summary = await runLive(sequencer, recorder, config, { signal, onFrame });
    }

    writeFrame();
    console.log(
      `[sim] ${summary.aborted ? "stopped" : "finished"} after ${summary.ticks} ticks, ${recorder.segments.length} segments, ${recorder.travelled.toFixed(0)} mm travelled: ${formatPose(sequencer.pose)}`
    );
    console.log(`[sim] frame written to ${options.outPath}`);
    return 0;
  } catch (error) {
    if (isKnownError(error)) {
      console.error(`Configuration error: ${error.message}`);
      if (error.details !== undefined) {
        console.error(JSON.stringify(error.details));
      }
      return 1;
    }

    console.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
