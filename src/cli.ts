#!/usr/bin/env node
/**
 * Batch entry point: list every 3MF on the printer and pull its previews and
 * model settings into per-archive directories.
 *
 * Configuration comes from PRINTER_HOST / PRINTER_ACCESS_CODE (see config.ts).
 */

import { main } from "./main.js";

main().catch(console.error);
