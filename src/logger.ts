export type LogLevel = "info" | "warning" | "error";

export type Logger = (level: LogLevel, message: string) => void;

export type Printer = (line: string) => void;

export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  date: Date = new Date(),
): string {
  return `${formatTimestamp(date)} - ${level.toUpperCase()} - ${message}`;
}

// stdout is reserved for the MCP transport and the tree printer
export const consoleLogger: Logger = (level, message) => {
  console.error(formatLogLine(level, message));
};

export const consolePrinter: Printer = (line) => {
  console.log(line);
};

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

export function formatKilobytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

export function formatByteCount(bytes: number): string {
  return `${bytes.toLocaleString("en-US")} bytes`;
}

export function elapsedSeconds(startMs: number): number {
  return (Date.now() - startMs) / 1000;
}
