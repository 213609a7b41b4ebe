import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { EventBus } from "../../events/event-bus.js";
import { ExecutionLogger } from "../execution-log.js";

describe("ExecutionLogger", () => {
  const dirs: string[] = [];

  afterEach(() => {
    dirs.splice(0).forEach((dir) => rmSync(dir, { recursive: true, force: true }));
  });

  it("writes one timestamped line per event", async () => {
    const dir = mkdtempSync(join(tmpdir(), "concord-log-"));
    dirs.push(dir);
    const logPath = join(dir, "execution.log");
    const bus = new EventBus();
    const logger = new ExecutionLogger(logPath);
    logger.attach(bus);

    bus.emit({
      type: "stage.completed",
      payload: { orchestration_id: "o", stage: "arbitrate", role: null, elapsed_ms: 12 }
    });
    bus.emit({
      type: "arbitration.completed",
      payload: {
        orchestration_id: "o",
        decision: "selected_best",
        divergence: 0.1,
        composite_score: 0.85,
        selected_candidate: "model_b",
        degraded: true
      }
    });
    bus.emit({
      type: "orchestration.failed",
      payload: { orchestration_id: "o", completed_at: "2026-01-01T00:00:00.000Z", stage: "critique", error: "boom" }
    });
    logger.detach();
    bus.emit({
      type: "orchestration.failed",
      payload: { orchestration_id: "o", completed_at: "2026-01-01T00:00:00.000Z", stage: "verify", error: "late" }
    });
    await logger.close();

    const lines = readFileSync(logPath, "utf8").trimEnd().split("\n");
    expect(lines.map((line) => line.slice(25))).toEqual([
      "Stage arbitrate completed in 12ms",
      "Arbitration: selected_best, divergence 0.100, composite 0.850, selected model_b [degraded]",
      "Orchestration failed at critique: boom"
    ]);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z /);
  });
});
