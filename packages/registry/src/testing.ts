import type { RegistryLogger } from "./log.js";

export const H1 = "a".repeat(64);
export const H2 = "b".repeat(64);
export const H3 = "c".repeat(64);

export const ADMIN = "admin-a";

export type ManualClock = {
  (): number;
  advance: (seconds: number) => void;
};

export const manualClock = (start = 1_700_000_000): ManualClock => {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    advance: (seconds: number) => {
      now += seconds;
    }
  });
};

export type CapturedLog = {
  level: "info" | "warn" | "error";
  event: string;
  meta?: Record<string, unknown>;
};

export const captureLogger = () => {
  const lines: CapturedLog[] = [];
  const logger: RegistryLogger = {
    info: (event, meta) => lines.push({ level: "info", event, meta }),
    warn: (event, meta) => lines.push({ level: "warn", event, meta }),
    error: (event, meta) => lines.push({ level: "error", event, meta })
  };
  return { lines, logger };
};
