import fs from "node:fs";
import path from "node:path";
import process from "node:process";

import { parseEventData, type EventData } from "@evdata/core";

export function readEventDataFile(filePath: string, cwd: string = process.cwd()): string {
  const absolutePath = path.resolve(cwd, filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Event data file not found: ${absolutePath}`);
  }

  return fs.readFileSync(absolutePath, "utf-8");
}

export function parseEventDataText(raw: string, source: string): EventData {
  const result = parseEventData(raw);
  if (result.ok === false) {
    throw new Error(`Invalid event data in ${source}: ${result.error.message}`);
  }

  return result.data;
}
