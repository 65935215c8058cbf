// src/io/mask-writer.ts
import { writeFile } from "node:fs/promises";

/**
 * Destination for formatted command lines.
 */
export interface MaskWriter {
  write(path: string, lines: readonly string[]): Promise<void>;
}

/**
 * Every command is newline terminated; no lines gives an empty file.
 */
export function joinLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Writes the macro to disk, replacing any existing file at that path.
 * File system errors are passed through to the caller.
 */
export function createFileMaskWriter(): MaskWriter {
  return {
    async write(path, lines) {
      await writeFile(path, joinLines(lines), "utf8");
    },
  };
}
