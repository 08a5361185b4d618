import type { EventBus } from "../events/event-bus.js";
import { createStderrFormatter } from "../ui/fmt.js";

export type WarningSink = {
  warn: (message: string, source?: string) => void;
};

const withSource = (message: string, source?: string): string =>
  source ? `[${source}] ${message}` : message;

/** Prints `warn: [source] message` to stderr, colored when stderr is a TTY. */
export const createConsoleWarningSink = (): WarningSink => {
  const fmt = createStderrFormatter();
  return {
    warn: (message, source) => {
      console.warn(fmt.warnBlock(withSource(message, source)));
    }
  };
};

/** Republishes warnings on the bus, so the execution log and the CLI both see them. */
export const createEventWarningSink = (bus: EventBus, now: () => Date = () => new Date()): WarningSink => ({
  warn: (message, source) => {
    const recorded_at = now().toISOString();
    bus.emit({
      type: "warning.raised",
      payload: source ? { message, source, recorded_at } : { message, recorded_at }
    });
  }
});
