import chalk from "chalk";
import type { StatusOutput, SyncOutput } from "../types/task";

export type StateColor = "green" | "red" | "yellow";

/**
 * Get color styling for app state
 */
export function colorFor(appState: string): {
  color?: StateColor;
  dimColor?: boolean;
} {
  const v = (appState || "").toLowerCase();
  if (v === "synced" || v === "healthy") return { color: "green" };
  if (v === "outofsync" || v === "degraded" || v === "missing") return { color: "red" };
  if (v === "progressing" || v === "suspended") return { color: "yellow" };
  if (v === "unknown") return { dimColor: true };
  return {};
}

export function paint(appState: string, painter: chalk.Chalk = chalk): string {
  const style = colorFor(appState);
  if (style.color) return painter[style.color](appState);
  if (style.dimColor) return painter.dim(appState);
  return appState;
}

/**
 * Shorten SHA to first 7 characters
 */
export function shortSha(s?: string): string {
  return (s || "").slice(0, 7);
}

/**
 * Convert multiline text to single line
 */
export function singleLine(input?: string): string {
  const s = String(input || "");
  return s
    .replace(/[\r\n\t]+/g, " ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

/**
 * One-line human summary of a task result
 */
export function formatSummary(
  application: string,
  output: SyncOutput | StatusOutput,
  painter: chalk.Chalk = chalk,
): string {
  const parts = [
    `${painter.bold("App:")} ${application}`,
    `${painter.bold("Sync:")} ${output.syncStatus ? paint(output.syncStatus, painter) : "—"}`,
    `${painter.bold("Health:")} ${output.healthStatus ? paint(output.healthStatus, painter) : "—"}`,
  ];
  if ("revision" in output && output.revision) {
    parts.push(`${painter.bold("Revision:")} ${shortSha(output.revision)}`);
  }
  if (output.resources) parts.push(`${painter.bold("Resources:")} ${output.resources.length}`);
  if ("conditions" in output && output.conditions) {
    parts.push(`${painter.bold("Conditions:")} ${output.conditions.length}`);
  }
  if (output.parseWarning) {
    parts.push(painter.yellow(`(unparsed: ${singleLine(output.parseWarning.message)})`));
  }
  return parts.join(" • ");
}
