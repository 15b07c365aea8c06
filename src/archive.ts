/**
 * 3MF archive access
 *
 * A 3MF file is a ZIP container. Slicer output keeps its previews and settings
 * under Metadata/:
 * - Metadata/plate_N.png, Metadata/top_N.png (plate previews)
 * - Metadata/model_settings.config (per-object settings, XML)
 * - Metadata/thumbnail*.png (project thumbnails, some slicers)
 */

import { unzipSync } from "fflate";
import * as fs from "fs";
import * as path from "path";
import type { Logger } from "./logger.js";
import {
  errorMessage,
  fail,
  succeed,
  type ArchiveContents,
  type ArchiveEntryInfo,
  type OperationResult,
} from "./types.js";

export const REQUIRED_ENTRIES: readonly string[] = [
  "Metadata/plate_1.png",
  "Metadata/top_1.png",
  "Metadata/model_settings.config",
];

const THUMBNAIL_EXTENSIONS = [".png", ".jpg", ".jpeg"];

// ===== Entry predicates =====

export function isRequiredEntry(name: string): boolean {
  return REQUIRED_ENTRIES.includes(name);
}

export function isMetadataPng(name: string): boolean {
  return name.startsWith("Metadata/") && name.endsWith(".png");
}

export function isThumbnailImage(name: string): boolean {
  const lower = name.toLowerCase();
  return (
    lower.includes("thumbnail") &&
    THUMBNAIL_EXTENSIONS.some((ext) => lower.endsWith(ext))
  );
}

// ===== Reading =====

/**
 * Read the central directory of a local ZIP and decompress only the entries
 * accepted by `select`. Entry sizes are collected for every entry. Each
 * selected entry is inflated on its own; one that fails is logged and left
 * out of `files`.
 */
export function readArchive(
  localPath: string,
  select: (name: string) => boolean,
  logger: Logger,
): OperationResult<ArchiveContents> {
  let data: Uint8Array;
  try {
    data = fs.readFileSync(localPath);
  } catch (error) {
    return fail("archive", error);
  }

  const entries: ArchiveEntryInfo[] = [];
  try {
    unzipSync(data, {
      filter: (file) => {
        entries.push({
          name: file.name,
          size: file.originalSize,
          compressedSize: file.size,
        });
        return false;
      },
    });
  } catch (error) {
    return fail("archive", `${localPath} is not a readable ZIP archive: ${errorMessage(error)}`);
  }

  const files = new Map<string, Uint8Array>();
  for (const { name } of entries) {
    if (!select(name) || files.has(name)) continue;
    try {
      const unzipped = unzipSync(data, { filter: (file) => file.name === name });
      const content = unzipped[name];
      if (content) files.set(name, content);
    } catch (error) {
      logger("error", `Failed to read ${name} from ${localPath}: ${errorMessage(error)}`);
    }
  }

  return succeed({ entries, files });
}

// ===== Writing =====

/**
 * Write the named entries into `outputDir` under their base names. An existing
 * file with the same name is overwritten. Entries missing from `contents` are
 * skipped; a failed write is logged and skipped.
 */
export function writeEntries(
  contents: ArchiveContents,
  names: Iterable<string>,
  outputDir: string,
  logger: Logger,
): string[] {
  const written: string[] = [];

  for (const name of names) {
    const data = contents.files.get(name);
    if (!data) continue;

    const savePath = path.join(outputDir, path.posix.basename(name));
    try {
      fs.writeFileSync(savePath, data);
      written.push(savePath);
    } catch (error) {
      logger("error", `Failed to write ${name} to ${savePath}: ${errorMessage(error)}`);
    }
  }

  return written;
}

export function totalSize(
  entries: readonly ArchiveEntryInfo[],
  names: readonly string[],
): number {
  return entries
    .filter((entry) => names.includes(entry.name))
    .reduce((sum, entry) => sum + entry.size, 0);
}
