import type { EventBus } from "../events/event-bus.js";

export type WarningSink = {
  warn: (message: string, source?: string) => void;
};

export const createConsoleWarningSink = (): WarningSink => ({
  warn: (message: string, source?: string) => {
    if (source) {
      console.warn(`[${source}] ${message}`);
    } else {
      console.warn(message);
    }
  }
});

export const createEventWarningSink = (bus: EventBus): WarningSink => ({
  warn: (message: string, source?: string) => {
    bus.emit({
      type: "warning.raised",
      payload: {
        message,
        source,
        recorded_at: new Date().toISOString()
      }
    });
  }
});

export const createCollectingWarningSink = (): WarningSink & { warnings: string[] } => {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (message: string, source?: string) => {
      warnings.push(source ? `[${source}] ${message}` : message);
    }
  };
};
