import { describe, expect, it, vi } from "vitest";

import {
  consoleLogger,
  formatByteCount,
  formatKilobytes,
  formatLogLine,
  formatMegabytes,
  formatSeconds,
  formatTimestamp,
} from "./logger.js";

const AT = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

describe("log formatting", () => {
  it("formats timestamps as UTC date and time", () => {
    expect(formatTimestamp(AT)).toBe("2024-01-02 03:04:05");
  });

  it("prefixes the timestamp and upper-cased level", () => {
    expect(formatLogLine("warning", "disk nearly full", AT)).toBe(
      "2024-01-02 03:04:05 - WARNING - disk nearly full",
    );
  });

  it("writes through console.error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    consoleLogger("info", "hello");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - INFO - hello$/);
    spy.mockRestore();
  });
});

describe("field formatting", () => {
  it("renders seconds, sizes and byte counts", () => {
    expect(formatSeconds(1.234)).toBe("1.23s");
    expect(formatMegabytes(1572864)).toBe("1.5 MB");
    expect(formatKilobytes(2048)).toBe("2.0 KB");
    expect(formatByteCount(1234567)).toBe("1,234,567 bytes");
  });
});
