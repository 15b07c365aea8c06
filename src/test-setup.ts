import { afterEach } from "vitest";

import { removeTempDirs } from "./test-utils.js";

afterEach(() => {
  removeTempDirs();
});
