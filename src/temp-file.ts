import * as fs from "fs";
import * as os from "os";
import * as path from "path";

/**
 * Run `fn` with a fresh temporary file path ending in `suffix`. The directory
 * holding it is removed when `fn` settles, whether it resolved or threw.
 */
export async function withTempFile<T>(
  suffix: string,
  fn: (tempPath: string) => Promise<T>,
): Promise<T> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "printer-3mf-"));
  const tempPath = path.join(tmpDir, `download${suffix}`);

  try {
    return await fn(tempPath);
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}
