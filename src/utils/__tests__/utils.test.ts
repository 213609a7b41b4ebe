import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { EventBus } from "../../events/event-bus.js";
import { writeJsonAtomic } from "../io.js";
import { generateOrchestrationId } from "../orchestration-id.js";
import { createCollectingWarningSink, createEventWarningSink } from "../warnings.js";

describe("generateOrchestrationId", () => {
  it("formats a UTC timestamp and a hex suffix", () => {
    const now = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
    expect(generateOrchestrationId(now, "ABCDEF12")).toBe("20260102T030405Z_abcdef12");
    expect(generateOrchestrationId(now, "1")).toBe("20260102T030405Z_10000000");
    expect(generateOrchestrationId(now)).toMatch(/^20260102T030405Z_[0-9a-f]{8}$/);
  });
});

describe("writeJsonAtomic", () => {
  const dirs: string[] = [];
  afterEach(() => {
    dirs.splice(0).forEach((dir) => rmSync(dir, { recursive: true, force: true }));
  });

  it("creates parent directories and writes formatted JSON", () => {
    const dir = mkdtempSync(join(tmpdir(), "concord-io-"));
    dirs.push(dir);
    const path = join(dir, "nested", "result.json");
    writeJsonAtomic(path, { ok: true });
    expect(readFileSync(path, "utf8")).toBe('{\n  "ok": true\n}\n');
  });
});

describe("warning sinks", () => {
  it("collects prefixed messages", () => {
    const sink = createCollectingWarningSink();
    sink.warn("first");
    sink.warn("second", "config");
    expect(sink.warnings).toEqual(["first", "[config] second"]);
  });

  it("emits warning events on the bus", () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.subscribe("warning.raised", handler);
    createEventWarningSink(bus).warn("careful", "orchestrator");
    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({ message: "careful", source: "orchestrator" })
    );
  });
});
