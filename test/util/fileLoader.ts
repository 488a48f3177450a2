import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

export const projectRoot = resolve(
  dirname(fileURLToPath(import.meta.url)),
  "../..",
);

export function inputPath(filename: string): string {
  return resolve(projectRoot, "test", "inputs", filename);
}

export function examplePath(filename: string): string {
  return resolve(projectRoot, "examples", filename);
}

export function loadExample(filename: string): string {
  return readFileSync(examplePath(filename), "utf-8");
}
