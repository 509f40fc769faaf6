/**
 * Report dispatch.
 *
 * Every event is counted against the current environment, then handed to the
 * method registered for `[env.reporter, event.type]`. A reporter may register
 * `"*"` to receive every type it has no specific method for.
 */
import {
  getCurrent,
  incReportCounter,
  testingContextsStr,
  testingVarsStr,
} from "./env.js";
import type {
  AssertionEventFields,
  CounterEventType,
  EventOf,
  ReportEvent,
  ReportEventType,
} from "./types.js";

export type ReportHandler<E extends ReportEvent = ReportEvent> = (event: E) => void;

type MethodKey = ReportEventType | "*";

const reporters = new Map<string, Map<MethodKey, ReportHandler>>();

function isEventOf<T extends ReportEventType>(event: ReportEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

export function defineReportMethod<T extends ReportEventType>(
  reporter: string,
  type: T,
  handler: ReportHandler<EventOf<T>>
): void {
  let methods = reporters.get(reporter);
  if (!methods) {
    methods = new Map();
    reporters.set(reporter, methods);
  }
  methods.set(type, (event) => {
    if (isEventOf(event, type)) handler(event);
  });
}

/** Register a catch-all method for `reporter`. */
export function defineDefaultReportMethod(reporter: string, handler: ReportHandler): void {
  let methods = reporters.get(reporter);
  if (!methods) {
    methods = new Map();
    reporters.set(reporter, methods);
  }
  methods.set("*", handler);
}

export function removeReporter(reporter: string): void {
  reporters.delete(reporter);
}

export function isCounterEvent(
  event: ReportEvent
): event is EventOf<CounterEventType> {
  return event.type === "pass" || event.type === "fail" || event.type === "error";
}

// --- Stack locations ---

const FRAME_RE = /\(?((?:file:\/\/)?[^\s()]+?):(\d+):\d+\)?$/;

export interface SourceLocation {
  file: string;
  line: number;
}

/** First usable `file:line` frame from an error's stack. */
export function fileAndLine(stack: string | undefined): SourceLocation | null {
  if (!stack) return null;
  for (const raw of stack.split("\n").slice(1)) {
    const frame = raw.trim();
    if (!frame.startsWith("at ")) continue;
    const m = FRAME_RE.exec(frame);
    if (m && !m[1].startsWith("node:")) {
      return { file: m[1], line: Number(m[2]) };
    }
  }
  return null;
}

function withDiagnostics(event: EventOf<CounterEventType>): EventOf<CounterEventType> {
  const env = getCurrent();
  const extra: AssertionEventFields = {};
  const context = testingContextsStr(env);
  if (context) extra.context = context;
  const testVar = testingVarsStr(env);
  if (testVar) extra.testVar = testVar;
  if (event.type === "error" && event.actual instanceof Error && event.file === undefined) {
    const loc = fileAndLine(event.actual.stack);
    if (loc) {
      extra.file = loc.file;
      extra.line = loc.line;
    }
  }
  return { ...extra, ...event };
}

/**
 * Record `event` in the current run: count it, attach diagnostics, dispatch.
 * Counter events are counted exactly once here, whatever reporter is active.
 */
export function report(event: ReportEvent): void {
  const env = getCurrent();
  let final: ReportEvent = event;
  if (isCounterEvent(event)) {
    incReportCounter(event.type);
    final = withDiagnostics(event);
  }
  const frozen = Object.freeze(final);
  const methods = reporters.get(env.reporter);
  const handler = methods?.get(frozen.type) ?? methods?.get("*");
  handler?.(frozen);
}
