/**
 * A reporter that keeps every event it receives, in order.
 */
import { createEnvironment } from "./env.js";
import type { RunEnvironment } from "./env.js";
import { defineDefaultReportMethod, removeReporter } from "./report.js";
import type { ReportEvent, ReportEventType } from "./types.js";

export interface RecordingReporter {
  name: string;
  events: ReportEvent[];
  /** Environment whose events go to this reporter. */
  env(): RunEnvironment;
  types(): ReportEventType[];
  dispose(): void;
}

let seq = 0;

export function createRecordingReporter(name = `recording-${++seq}`): RecordingReporter {
  const events: ReportEvent[] = [];
  defineDefaultReportMethod(name, (event) => {
    events.push(event);
  });
  return {
    name,
    events,
    env: () => createEnvironment({ reporter: name }),
    types: () => events.map((e) => e.type),
    dispose: () => removeReporter(name),
  };
}
