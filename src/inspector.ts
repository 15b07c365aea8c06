/**
 * 3MF Inspector — diagnostic procedures against a printer's SD card.
 *
 * Each procedure follows the same recipe: download into a scoped temporary
 * file, time the download, process the archive, time that, and let the temp
 * file go on every exit path. Per-file failures are logged and skipped; only a
 * failure to connect ends a run.
 *
 * No timeouts or cancellation beyond the FTP client's own: a hung transfer
 * blocks the caller.
 */

import { imageSize } from "image-size";
import * as fs from "fs";
import * as path from "path";
import {
  isMetadataPng,
  isRequiredEntry,
  isThumbnailImage,
  readArchive,
  REQUIRED_ENTRIES,
  totalSize,
  writeEntries,
} from "./archive.js";
import {
  joinRemotePath,
  withPrinterConnection,
  type PrinterConnector,
  type PrinterFileSystem,
} from "./ftps-client.js";
import {
  consoleLogger,
  consolePrinter,
  elapsedSeconds,
  formatByteCount,
  formatKilobytes,
  formatMegabytes,
  formatSeconds,
  formatTimestamp,
  type Logger,
  type Printer,
} from "./logger.js";
import { withTempFile } from "./temp-file.js";
import {
  errorMessage,
  fail,
  succeed,
  type ArchiveEntryInfo,
  type DecodedImage,
  type OperationResult,
  type PrinterConfig,
  type RemoteFile,
} from "./types.js";

export const THUMBNAILS_DIR = "thumbnails";

const RULE_WIDTH = 60;

// ===== Types =====

export interface InspectorDeps {
  connect?: PrinterConnector;
  logger?: Logger;
}

export interface TreeDeps extends InspectorDeps {
  print?: Printer;
}

export interface ProcessOptions {
  outputRoot: string;
  logger?: Logger;
}

export interface StructureOptions extends ProcessOptions {
  print?: Printer;
}

export interface ListSummary {
  found: number;
  processed: number;
  failed: number;
  seconds: number;
}

export interface ExtractionSummary {
  outputDir: string;
  extracted: string[];
  archiveBytes: number;
  downloadSeconds: number;
  extractSeconds: number;
}

export interface StructureReport {
  entries: ArchiveEntryInfo[];
  extracted: string[];
}

// ===== Shared download recipe =====

interface DownloadStats {
  archiveBytes: number;
  downloadSeconds: number;
}

/**
 * Download `remotePath` into a scoped temp file and hand its path to
 * `handle`. Download failures come back as `reason: "download"`.
 */
async function downloadAndProcess<T>(
  ftp: PrinterFileSystem,
  remotePath: string,
  handle: (tempPath: string, stats: DownloadStats) => Promise<OperationResult<T>>,
  onDownloadStart?: (tempPath: string) => void,
): Promise<OperationResult<T>> {
  return withTempFile(".3mf", async (tempPath) => {
    onDownloadStart?.(tempPath);
    const downloadStart = Date.now();
    let archiveBytes: number;
    try {
      await ftp.downloadFile(remotePath, tempPath);
      archiveBytes = fs.statSync(tempPath).size;
    } catch (error) {
      return fail<T>("download", `Download of ${remotePath} failed: ${errorMessage(error)}`);
    }
    return handle(tempPath, {
      archiveBytes,
      downloadSeconds: elapsedSeconds(downloadStart),
    });
  });
}

function archiveBaseName(remotePath: string): string {
  const base = path.posix.basename(remotePath);
  return base.slice(0, base.length - path.posix.extname(base).length);
}

// ===== list_3mf_files =====

export async function list3mfFiles(
  config: PrinterConfig,
  deps: InspectorDeps = {},
): Promise<OperationResult<ListSummary>> {
  const log = deps.logger ?? consoleLogger;
  const totalStart = Date.now();

  const result = await withPrinterConnection(
    config,
    async (ftp): Promise<OperationResult<ListSummary>> => {
      const listStart = Date.now();
      let files: RemoteFile[];
      try {
        files = await ftp.listFiles("/", ".3mf");
      } catch (error) {
        log("error", `Failed to list /: ${errorMessage(error)}`);
        log("error", `Connection error: ${errorMessage(error)}`);
        return fail<ListSummary>("list", error);
      }
      log(
        "info",
        `Found ${files.length} 3MF files in ${formatSeconds(elapsedSeconds(listStart))}`,
      );

      let processed = 0;
      let failed = 0;
      for (const file of files) {
        log("info", `Processing: ${file.name}`);
        const extraction = await extractRequiredFiles(ftp, file.path, {
          outputRoot: config.outputRoot,
          logger: log,
        });
        if (extraction.success) {
          processed++;
        } else {
          failed++;
          log("error", `Failed to process ${file.name}: ${extraction.error}`);
        }
      }

      return succeed({
        found: files.length,
        processed,
        failed,
        seconds: 0,
      });
    },
    deps.connect,
  );

  if (!result.success) {
    log("error", `Connection error: ${result.error}`);
  }

  const seconds = elapsedSeconds(totalStart);
  log("info", `Total operation completed in ${formatSeconds(seconds)}`);

  if (!result.success) return result;
  const inner = result.value;
  if (!inner.success) return inner;
  return succeed({ ...inner.value, seconds });
}

// ===== extract_required_files =====

export async function extractRequiredFiles(
  ftp: PrinterFileSystem,
  remotePath: string,
  options: ProcessOptions,
): Promise<OperationResult<ExtractionSummary>> {
  const log = options.logger ?? consoleLogger;
  const outputDir = path.join(options.outputRoot, archiveBaseName(remotePath));

  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    log("error", `Cannot create ${outputDir}: ${errorMessage(error)}`);
    return fail("write", error);
  }

  const result = await downloadAndProcess<ExtractionSummary>(
    ftp,
    remotePath,
    async (tempPath, { archiveBytes, downloadSeconds }) => {
      log(
        "info",
        `Downloaded ${remotePath} (${formatMegabytes(archiveBytes)}) in ${formatSeconds(downloadSeconds)}`,
      );

      const extractStart = Date.now();
      const archive = readArchive(tempPath, isRequiredEntry, log);
      if (!archive.success) return archive;

      const present = REQUIRED_ENTRIES.filter((name) =>
        archive.value.files.has(name),
      );
      log(
        "info",
        `Extracting ${present.length} files (${formatKilobytes(totalSize(archive.value.entries, present))})`,
      );
      const extracted = writeEntries(archive.value, present, outputDir, log);

      const extractSeconds = elapsedSeconds(extractStart);
      log("info", `Extraction completed in ${formatSeconds(extractSeconds)}`);
      log(
        "info",
        `Total processing time: ${formatSeconds(downloadSeconds + extractSeconds)}`,
      );

      return succeed({
        outputDir,
        extracted,
        archiveBytes,
        downloadSeconds,
        extractSeconds,
      });
    },
  );

  if (!result.success) {
    log("error", `Error extracting ${remotePath}: ${result.error}`);
  }
  return result;
}

// ===== examine_3mf_structure =====

export async function examine3mfStructure(
  ftp: PrinterFileSystem,
  remotePath: string,
  options: StructureOptions,
): Promise<OperationResult<StructureReport>> {
  const print = options.print ?? consolePrinter;
  const log = options.logger ?? consoleLogger;
  const thumbnailsDir = path.join(options.outputRoot, THUMBNAILS_DIR);

  try {
    fs.mkdirSync(thumbnailsDir, { recursive: true });
  } catch (error) {
    log("error", `Cannot create ${thumbnailsDir}: ${errorMessage(error)}`);
    return fail("write", error);
  }

  const result = await downloadAndProcess<StructureReport>(
    ftp,
    remotePath,
    async (tempPath) => {
      print("");
      print("Examining 3MF structure and extracting thumbnails:");
      print("-".repeat(RULE_WIDTH));

      const archive = readArchive(tempPath, isMetadataPng, log);
      if (!archive.success) {
        print(`Error examining ZIP: ${archive.error}`);
        return archive;
      }

      const extracted: string[] = [];
      for (const entry of archive.value.entries) {
        print(`File: ${entry.name}`);
        print(`  Size: ${formatByteCount(entry.size)}`);

        if (isMetadataPng(entry.name)) {
          const [savePath] = writeEntries(
            archive.value,
            [entry.name],
            thumbnailsDir,
            log,
          );
          if (savePath) {
            extracted.push(savePath);
            print(`  └── Extracted to: ${savePath}`);
          }
        }
        print("");
      }

      return succeed({ entries: archive.value.entries, extracted });
    },
    (tempPath) => print(`Downloading ${remotePath} to ${tempPath}...`),
  );

  if (!result.success && result.reason === "download") {
    log("error", result.error);
  }
  return result;
}

// ===== extract_thumbnails =====

export function decodeImage(
  name: string,
  data: Uint8Array,
): OperationResult<DecodedImage> {
  try {
    const { width, height, type } = imageSize(data);
    if (width === undefined || height === undefined || type === undefined) {
      return fail("decode", `${name}: image dimensions not found`);
    }
    return succeed({ name, format: type, width, height, data });
  } catch (error) {
    return fail("decode", `${name}: ${errorMessage(error)}`);
  }
}

export async function extractThumbnails(
  ftp: PrinterFileSystem,
  remotePath: string,
  options: { logger?: Logger } = {},
): Promise<OperationResult<DecodedImage[]>> {
  const log = options.logger ?? consoleLogger;

  const result = await downloadAndProcess<DecodedImage[]>(
    ftp,
    remotePath,
    async (tempPath) => {
      const archive = readArchive(tempPath, isThumbnailImage, log);
      if (!archive.success) return archive;

      const thumbnails: DecodedImage[] = [];
      for (const [name, data] of archive.value.files) {
        const image = decodeImage(name, data);
        if (image.success) {
          thumbnails.push(image.value);
        } else {
          log("warning", `Skipping thumbnail ${image.error}`);
        }
      }
      return succeed(thumbnails);
    },
  );
  if (!result.success) {
    log("error", `Error processing ${remotePath}: ${result.error}`);
  }
  return result;
}

// ===== list_printer_filesystem =====

interface ClassifiedEntry {
  file: RemoteFile;
  size: number;
}

/**
 * Decide whether a listed child is a file. The listing's own type wins when
 * it has one. Otherwise a size query is the probe: success means file, any
 * failure is taken as a directory. That probe is best-effort only, since a
 * transient error on a real file also reads as a directory.
 */
async function classify(
  ftp: PrinterFileSystem,
  file: RemoteFile,
): Promise<ClassifiedEntry | null> {
  if (file.kind === "directory") return null;
  if (file.kind === "file" && file.size !== null) {
    return { file, size: file.size };
  }
  try {
    return { file, size: await ftp.getFileSize(file.path) };
  } catch {
    return null;
  }
}

async function describeDate(
  ftp: PrinterFileSystem,
  remotePath: string,
): Promise<string> {
  try {
    return formatTimestamp(await ftp.getFileDate(remotePath));
  } catch {
    return "unknown date";
  }
}

const byName = (a: RemoteFile, b: RemoteFile) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Depth-first walk printing one line per entry. Directories come before
 * files, each group sorted by name. A directory that cannot be listed prints
 * an error line and its siblings carry on.
 */
export async function printDirectoryTree(
  ftp: PrinterFileSystem,
  print: Printer,
  remotePath = "/",
  prefix = "",
): Promise<void> {
  let children: RemoteFile[];
  try {
    children = await ftp.listFiles(remotePath);
  } catch (error) {
    print(`${prefix}Error reading ${remotePath}: ${errorMessage(error)}`);
    return;
  }

  const dirs: RemoteFile[] = [];
  const files: ClassifiedEntry[] = [];
  for (const child of children) {
    const entry = await classify(ftp, child);
    if (entry) files.push(entry);
    else dirs.push(child);
  }
  dirs.sort(byName);
  files.sort((a, b) => byName(a.file, b.file));

  const total = dirs.length + files.length;
  let index = 0;

  for (const dir of dirs) {
    const isLast = ++index === total;
    print(`${prefix}${isLast ? "└── " : "├── "}${dir.name}/`);
    await printDirectoryTree(
      ftp,
      print,
      joinRemotePath(remotePath, dir.name),
      prefix + (isLast ? "    " : "│   "),
    );
  }

  for (const { file, size } of files) {
    const isLast = ++index === total;
    const date = await describeDate(ftp, file.path);
    print(
      `${prefix}${isLast ? "└── " : "├── "}${file.name} (${formatByteCount(size)}, ${date})`,
    );
  }
}

export async function listPrinterFilesystem(
  config: PrinterConfig,
  deps: TreeDeps = {},
): Promise<OperationResult<void>> {
  const print = deps.print ?? consolePrinter;
  const log = deps.logger ?? consoleLogger;

  const result = await withPrinterConnection(
    config,
    async (ftp) => {
      print("");
      print("Scanning printer filesystem...");
      print("=".repeat(RULE_WIDTH));
      await printDirectoryTree(ftp, print);
      print("=".repeat(RULE_WIDTH));
    },
    deps.connect,
  );

  if (!result.success) {
    log("error", `Connection error: ${result.error}`);
    print("");
    print(`Error: ${result.error}`);
    print("");
    print("Please verify:");
    print("1. The printer is powered on");
    print("2. The IP address is correct");
    print("3. The access code is correct");
    print("4. You're on the same network as the printer");
  }
  return result;
}
