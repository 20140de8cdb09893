import type { Logger, Result } from "../src/index.js";

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    info(message) {
      lines.push(`info: ${message}`);
    },
    error(message) {
      lines.push(`error: ${message}`);
    },
  };
  return { lines, logger };
}
