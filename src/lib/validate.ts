import fs from "node:fs";
import { mirrorCommand, mirrorPose, normalizeAngle } from "@/lib/geometry";
import type {
  Alliance,
  AngleConvention,
  Command,
  LabeledCommand,
  ParsedStep,
  ParsedStrategy,
  Pose
} from "@/lib/types";

const ACTION_KEYS = ["goto", "forward", "rotate"] as const;

type ActionKey = (typeof ACTION_KEYS)[number];

export class ValidationError extends Error {
  readonly code = "VALIDATION_ERROR";
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}

export class InvalidCommandError extends Error {
  readonly code = "INVALID_COMMAND";
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isActionKey(value: string): value is ActionKey {
  return ACTION_KEYS.some((key) => key === value);
}

function commandFields(command: Command): Record<string, number> {
  switch (command.type) {
    case "goto":
      return { x: command.x, y: command.y, angle: command.angle };
    case "forward":
      return { distance: command.distance };
    case "rotate":
      return { deltaAngle: command.deltaAngle };
  }
}

export function validateCommand(command: Command, index?: number): void {
  if (!isObject(command) || !["goto", "forward", "rotate"].includes(String(command.type))) {
    throw new InvalidCommandError("Unknown command type.", { command_index: index, command });
  }

  for (const [field, value] of Object.entries(commandFields(command))) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new InvalidCommandError(`${command.type} command field ${field} must be a finite number.`, {
        command_index: index,
        field,
        value
      });
    }
  }
}

export function validatePose(pose: Pose): Pose {
  for (const field of ["x", "y", "angle"] as const) {
    if (typeof pose[field] !== "number" || !Number.isFinite(pose[field])) {
      throw new InvalidCommandError(`Pose field ${field} must be a finite number.`, { field, value: pose[field] });
    }
  }
  return { x: pose.x, y: pose.y, angle: normalizeAngle(pose.angle) };
}

function parseScalar(raw: unknown, label: string, details: Record<string, unknown>): number {
  const text = typeof raw === "number" ? String(raw) : typeof raw === "string" ? raw.trim() : "";
  const value = Number(text);
  if (!text || !Number.isFinite(value)) {
    throw new ValidationError(`${label} must be a number.`, { ...details, value: raw });
  }
  return value;
}

export function parseTriple(raw: unknown, label: string, details: Record<string, unknown> = {}): [number, number, number] {
  if (typeof raw !== "string") {
    throw new ValidationError(`${label} must be in format: 'x,y,angle'.`, { ...details, value: raw });
  }

  const parts = raw.split(",");
  if (parts.length !== 3) {
    throw new ValidationError(`${label} must be in format: 'x,y,angle'.`, { ...details, value: raw });
  }

  const [x, y, angle] = parts.map((part) => parseScalar(part, label, details));
  return [x, y, angle];
}

function parseAction(rawAction: unknown, context: { step_index: number; action_index: number }): Command {
  if (!isObject(rawAction)) {
    throw new ValidationError("Each action must be an object.", context);
  }

  const keys = Object.keys(rawAction);
  if (keys.length !== 1) {
    throw new ValidationError("Each action must have exactly one command.", { ...context, keys });
  }

  const key = keys[0];
  if (!isActionKey(key)) {
    throw new ValidationError(`Unknown action command: ${key}`, { ...context, command: key });
  }

  const value = rawAction[key];
  const details = { ...context, command: key };

  if (key === "goto") {
    const [x, y, angle] = parseTriple(value, "Goto command", details);
    return { type: "goto", x, y, angle };
  }

  if (key === "forward") {
    return { type: "forward", distance: parseScalar(value, "Forward command", details) };
  }

  return { type: "rotate", deltaAngle: parseScalar(value, "Rotate command", details) };
}

function parseAlliance(raw: unknown): Alliance {
  if (raw === undefined) {
    return "blue";
  }

  const lowered = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  if (lowered === "blue" || lowered === "yellow") {
    return lowered;
  }

  throw new ValidationError("color must be 'blue' or 'yellow' when provided.", { color: raw });
}

export function parseStrategy(raw: unknown): ParsedStrategy {
  if (!isObject(raw)) {
    throw new ValidationError("Strategy must be a JSON object.");
  }

  const missing = ["startingPos", "strategy"].filter((field) => !(field in raw));
  if (missing.length > 0) {
    throw new ValidationError("Strategy must contain fields: startingPos, strategy", { missing });
  }

  const [x, y, angle] = parseTriple(raw.startingPos, "Starting position");

  if (!Array.isArray(raw.strategy)) {
    throw new ValidationError("Strategy must be a list of action groups.");
  }

  const steps: ParsedStep[] = raw.strategy.map((group, stepIndex) => {
    if (!isObject(group)) {
      throw new ValidationError("Each strategy group must be an object.", { step_index: stepIndex });
    }

    if (typeof group.name !== "string" || !("actions" in group)) {
      throw new ValidationError("Strategy groups must have 'name' and 'actions' fields.", { step_index: stepIndex });
    }

    if (!Array.isArray(group.actions)) {
      throw new ValidationError("Group actions must be a list.", { step_index: stepIndex, name: group.name });
    }

    const commands = group.actions.map((action, actionIndex) =>
      parseAction(action, { step_index: stepIndex, action_index: actionIndex })
    );
    return { name: group.name, commands };
  });

  return {
    startingPose: { x, y, angle: normalizeAngle(angle) },
    alliance: parseAlliance(raw.color),
    steps
  };
}

/**
 * Flattens steps into dispatch order. Yellow strategies are written from the
 * blue side and mirrored across the field's center line here.
 */
export function strategyCommands(
  strategy: ParsedStrategy,
  convention: AngleConvention
): { startingPose: Pose; commands: LabeledCommand[] } {
  const mirrored = strategy.alliance === "yellow";
  const commands = strategy.steps.flatMap((step) =>
    step.commands.map((command) => ({
      step: step.name,
      command: mirrored ? mirrorCommand(command, convention) : command
    }))
  );

  return {
    startingPose: mirrored ? mirrorPose(strategy.startingPose, convention) : { ...strategy.startingPose },
    commands
  };
}

export function loadStrategyFile(filePath: string): ParsedStrategy {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Strategy file not found: ${filePath}`, { path: filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ValidationError("Strategy file is not valid JSON.", {
      path: filePath,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  return parseStrategy(raw);
}
