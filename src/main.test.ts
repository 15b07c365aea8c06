import { describe, expect, it, vi } from "vitest";

import { main } from "./main.js";
import { buildArchive, bytes, FakePrinter, makeTempDir } from "./test-utils.js";

describe("main", () => {
  it("refuses to connect while the sample placeholders are configured", async () => {
    const logger = vi.fn();
    const connect = vi.fn();

    const result = await main({ PRINTER_ACCESS_CODE: "test-code" }, { logger, connect });

    expect(result).toBeNull();
    expect(logger).toHaveBeenNthCalledWith(1, "error", "Please configure proper printer IP and access code!");
    expect(connect).not.toHaveBeenCalled();
  });

  it("connects and runs the listing pass once configured", async () => {
    const logger = vi.fn();
    const printer = new FakePrinter().addFile(
      "/benchy.3mf",
      buildArchive({ "Metadata/plate_1.png": bytes(8, 1) }),
    );

    const result = await main(
      {
        PRINTER_HOST: "10.0.0.5",
        PRINTER_ACCESS_CODE: "test-code",
        PRINTER_OUTPUT_DIR: makeTempDir(),
      },
      { logger, connect: printer.connector() },
    );

    expect(logger).toHaveBeenNthCalledWith(1, "info", "Connecting to printer at 10.0.0.5");
    expect(result).toMatchObject({ success: true, value: { found: 1, processed: 1, failed: 0 } });
  });
});
