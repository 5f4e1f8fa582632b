#!/usr/bin/env -S node --import tsx
import process from "node:process";

import { log } from "@clack/prompts";
import pc from "picocolors";

import { renderEventData } from "@evdata/core";
import { describeTerms, enrichEventData, OUTPUT_KEY } from "./fifth-value.js";
import { parseEventDataText, readEventDataFile } from "./input.js";

const USAGE = "Usage: evdata <path to event data>";

const USAGE_DETAILS = `Reads key:"value" pairs from the file and prints them as a JSON object.
When one, two, three and four are present, the derived ${OUTPUT_KEY} value is added.`;

function runConvert(filePath: string): void {
  const raw = readEventDataFile(filePath);
  const data = parseEventDataText(raw, filePath);

  const enriched = enrichEventData(data);
  if (enriched.result.ok === false) {
    if (enriched.result.reason === "invalid_hex") {
      throw new Error(`Unexpected value for key "${enriched.result.key}"`);
    }
    console.error(
      pc.yellow(`Skipping ${OUTPUT_KEY}: missing key "${enriched.result.key}"`)
    );
  } else {
    for (const line of describeTerms(enriched.result.terms)) {
      console.error(pc.dim(line));
    }
  }

  console.log(renderEventData(enriched.data));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // The only argument is a path, so no word is reserved for help.
  if (args.length !== 1) {
    throw new Error(`${USAGE}\n${USAGE_DETAILS}`);
  }

  runConvert(args[0]);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  log.error(message);
  process.exit(1);
});
