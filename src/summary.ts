import chalk from "chalk";
import type { RunSummary } from "./types.js";

function supportsColor(): boolean {
  if (process.env.NO_COLOR) return false;
  return Boolean(process.stderr && process.stderr.isTTY);
}

function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 1) return `${ms.toFixed(0)} ms`;
  if (seconds < 60) return `${seconds.toFixed(1)} s`;
  const total = Math.round(seconds);
  return `${Math.floor(total / 60)}m ${total % 60}s`;
}

export function computeStatus(summary: RunSummary): "Dry run" | "No breaches found" | "Breaches found" {
  if (summary.dryRun) return "Dry run";
  if (summary.breaches === 0) return "No breaches found";
  return "Breaches found";
}

export function renderSummaryBox(summary: RunSummary, color: boolean = supportsColor()): string {
  const status = computeStatus(summary);
  const content = [
    "SUMMARY",
    `Status: ${status}`,
    `Addresses found: ${summary.addressesFound}`
  ];

  if (!summary.dryRun) {
    content.push(
      `Addresses checked: ${summary.addressesChecked}`,
      `Breached accounts: ${summary.accountsBreached}`,
      `Distinct breaches: ${summary.breaches}`,
      `Unexpected responses: ${summary.unexpectedResponses}`
    );
  }
  if (summary.outPath) {
    content.push(`Report: ${summary.outPath}`);
  }
  content.push(`Duration: ${formatDuration(summary.endedAt - summary.startedAt)}`);

  const maxLen = content.reduce((m, s) => Math.max(m, s.length), 0);
  const horizontal = "─".repeat(maxLen + 2);
  const top = `┌${horizontal}┐`;
  const bottom = `└${horizontal}┘`;
  const body = content.map((line) => `│ ${line.padEnd(maxLen, " ")} │`);
  const box = [top, ...body, bottom].join("\n");

  if (!color) return box;
  return status === "Breaches found" ? chalk.red(box) : chalk.green(box);
}
