import * as fs from "fs";
import { describe, expect, it } from "vitest";

import { makeTempDir } from "./test-utils.js";

describe("makeTempDir", () => {
  let created: string | undefined;

  it("creates a scratch directory", () => {
    created = makeTempDir();
    expect(fs.statSync(created).isDirectory()).toBe(true);
  });

  it("removes it once the test that made it finishes", () => {
    expect(created).toBeDefined();
    expect(created && fs.existsSync(created)).toBe(false);
  });
});
