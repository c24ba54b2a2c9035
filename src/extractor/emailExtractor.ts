/**
 * Email extraction from free-form text.
 *
 * The input can be anything (a dump, a CSV, a scraped page); addresses are
 * found wherever they appear, so nothing needs cleaning up first.
 */

import fs from "node:fs";
import { ExtractionError, InputError } from "../errors.js";
import type { Logger } from "../logger.js";

// local-part@domain.tld with a 2+ letter TLD, after regular-expressions.info
const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi;

/**
 * Returns every address in `text`, in order of appearance. Repeats are kept.
 */
export function extractEmails(text: string): string[] {
  return text.match(EMAIL_PATTERN) ?? [];
}

/**
 * Drops repeated addresses, comparing case-insensitively and keeping the
 * first spelling seen.
 */
export function dedupeEmails(emails: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const email of emails) {
    const key = email.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(email);
  }
  return unique;
}

export async function assertReadable(filePath: string): Promise<void> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) {
      throw new Error(`${filePath} is not a regular file`);
    }
  } catch (err) {
    throw new InputError(filePath, err);
  }
}

/**
 * Reads `filePath` and extracts its addresses. Zero matches is fatal.
 */
export async function findEmails(filePath: string, logger: Logger): Promise<string[]> {
  logger.info(`Processing ${filePath}`);

  let rawText: string;
  try {
    rawText = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    throw new InputError(filePath, err);
  }

  const emails = extractEmails(rawText);
  if (emails.length === 0) {
    throw new ExtractionError(filePath);
  }

  logger.info(`Found ${emails.length} valid email addresses in ${filePath}`);
  return emails;
}
