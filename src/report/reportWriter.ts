/**
 * Report output.
 *
 * The default format is markdown that pastes straight into a report:
 *
 *   **Adobe**
 *   * alice@example.com
 *   * bob@example.com
 *
 * A `.json` output path writes the same index as a JSON object instead.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../logger.js";
import type { BreachIndex } from "../types.js";

export function renderReport(index: BreachIndex): string {
  let out = "";
  for (const [breach, emails] of index) {
    out += `**${breach}**\n`;
    for (const email of emails) {
      out += `* ${email}\n`;
    }
    out += "\n";
  }
  return out;
}

export function renderJsonReport(index: BreachIndex): string {
  return JSON.stringify(Object.fromEntries(index), null, 2) + "\n";
}

/**
 * Reads a markdown report back into an index. Lines that are neither a
 * breach heading nor a bullet under one are ignored.
 */
export function parseReport(text: string): BreachIndex {
  const index: BreachIndex = new Map();
  let current: string[] | undefined;

  for (const line of text.split(/\r?\n/)) {
    const heading = /^\*\*(.*)\*\*$/.exec(line);
    if (heading) {
      const name = heading[1];
      current = index.get(name) ?? [];
      index.set(name, current);
      continue;
    }
    if (line.startsWith("* ") && current) {
      current.push(line.slice(2));
      continue;
    }
    if (line.trim() === "") {
      current = undefined;
    }
  }

  return index;
}

/** Writes the report, replacing any existing file at `outPath`. */
export async function writeReport(index: BreachIndex, outPath: string, logger: Logger): Promise<void> {
  logger.info(`Writing results to ${outPath}`);
  const ext = path.extname(outPath).toLowerCase();
  const content = ext === ".json" ? renderJsonReport(index) : renderReport(index);
  await fs.promises.writeFile(outPath, content, "utf8");
  logger.success("All done, enjoy!");
}
