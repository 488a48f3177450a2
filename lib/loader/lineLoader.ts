/**
 * Reads machine definition files into the trimmed, comment-free lines the
 * parsers consume.
 *
 * @module
 */
import { readFileSync } from "node:fs";

const COMMENT_PREFIX = "//";

function isIgnored(line: string): boolean {
  return line.startsWith(COMMENT_PREFIX) || line.trim().length === 0;
}

export function stripSourceLines(source: string): string[] {
  return source
    .split(/\r?\n/)
    .filter((line) => !isIgnored(line))
    .map((line) => line.trim());
}

export function loadMachineLines(filePath: string): string[] {
  return stripSourceLines(readFileSync(filePath, "utf-8"));
}
