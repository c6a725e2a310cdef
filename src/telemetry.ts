import { randomUUID } from "node:crypto";
import { appConfig, type LogLevel } from "./config.js";

export type RunLogContext = {
  runId: string;
  command: string;
  startedAt: number;
};

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = appConfig.logLevel;
let stderrOnly = false;

export function setLogLevel(level: LogLevel) {
  activeLevel = level;
}

// stdout belongs to the MCP transport when the server is running
export function routeLogsToStderr() {
  stderrOnly = true;
}

function nowIso() {
  return new Date().toISOString();
}

function compactString(value: string, max = 240): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= max) return normalized;
  return `${normalized.slice(0, max - 1)}…`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return compactString(error.message);
  if (typeof error === "string") return compactString(error);
  return "unknown error";
}

function emit(level: LogLevel, event: string, fields: Record<string, unknown>) {
  if (levelRank[level] < levelRank[activeLevel]) return;
  const payload = {
    ts: nowIso(),
    level,
    event,
    ...fields,
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn" || stderrOnly) {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logEvent(
  level: LogLevel,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit(level, event, fields);
}

export function startRunLog(
  command: string,
  fields: Record<string, unknown> = {},
): RunLogContext {
  const context: RunLogContext = {
    runId: randomUUID().slice(0, 8),
    command,
    startedAt: Date.now(),
  };

  emit("info", "run.start", {
    runId: context.runId,
    command,
    ...fields,
  });
  return context;
}

export function stepRunLog(
  context: RunLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("info", event, {
    runId: context.runId,
    command: context.command,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function debugRunLog(
  context: RunLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("debug", event, {
    runId: context.runId,
    command: context.command,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function warnRunLog(
  context: RunLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("warn", event, {
    runId: context.runId,
    command: context.command,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function errorRunLog(
  context: RunLogContext,
  event: string,
  error: unknown,
  fields: Record<string, unknown> = {},
) {
  emit("error", event, {
    runId: context.runId,
    command: context.command,
    elapsedMs: Date.now() - context.startedAt,
    message: toErrorMessage(error),
    ...fields,
  });
}

export function endRunLog(
  context: RunLogContext,
  fields: Record<string, unknown> = {},
) {
  emit("info", "run.end", {
    runId: context.runId,
    command: context.command,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}
