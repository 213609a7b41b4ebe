import { createWriteStream } from "node:fs";

import type { EventBus } from "../events/event-bus.js";
import type { Event } from "../events/types.js";

const formatScore = (value: number): string => value.toFixed(3);

/** One log line per event; `null` for events the log skips. */
export const describeEvent = (event: Event): string | null => {
  switch (event.type) {
    case "orchestration.started":
      return `Orchestration started: ${event.payload.orchestration_id} (query ${event.payload.query_chars} chars, threshold ${event.payload.confidence_threshold})`;
    case "stage.started":
      return null;
    case "stage.completed": {
      const { stage, role, elapsed_ms, output_chars } = event.payload;
      return (
        `Stage ${stage}${role ? ` (${role})` : ""} completed in ${elapsed_ms}ms` +
        (output_chars !== undefined ? `, ${output_chars} chars` : "")
      );
    }
    case "arbitration.completed": {
      const { decision, divergence, composite_score, selected_candidate, degraded } = event.payload;
      return (
        `Arbitration: ${decision}, divergence ${formatScore(divergence)}, composite ${formatScore(composite_score)}, selected ${selected_candidate}` +
        (degraded ? " [degraded]" : "")
      );
    }
    case "verification.triggered":
      return `Verification triggered: composite ${formatScore(event.payload.composite_score)} < ${event.payload.confidence_threshold}`;
    case "warning.raised":
      return event.payload.source
        ? `Warning [${event.payload.source}]: ${event.payload.message}`
        : `Warning: ${event.payload.message}`;
    case "orchestration.completed":
      return `Orchestration completed: ${event.payload.orchestration_id} (${event.payload.stages_run} stages, final ${event.payload.final_role})`;
    case "orchestration.failed":
      return `Orchestration failed at ${event.payload.stage}: ${event.payload.error}`;
  }
};

/** Appends one timestamped line per orchestration event to a log file. */
export class ExecutionLogger {
  private stream: ReturnType<typeof createWriteStream> | null;
  private unsubscribe: (() => void) | null = null;

  constructor(logPath: string) {
    this.stream = createWriteStream(logPath, { flags: "a" });
  }

  private append(line: string): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  attach(bus: EventBus): void {
    this.detach();
    this.unsubscribe = bus.subscribeAll(
      (event) => {
        const line = describeEvent(event);
        if (line !== null) {
          this.append(line);
        }
      },
      (error, event) => {
        const message = error instanceof Error ? error.message : String(error);
        this.append(`Execution log subscriber error (${event.type}): ${message}`);
      }
    );
  }

  async close(): Promise<void> {
    if (!this.stream) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.stream?.end(() => resolve());
      this.stream?.on("error", (error) => reject(error));
    });
    this.stream = null;
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}
