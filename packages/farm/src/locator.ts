import { existsSync } from "node:fs";
import path from "node:path";
import { debug } from "@renderplan/core";
import { VERSION_PLACEHOLDER } from "./config.js";

/** Existence check used by the locators; swapped out in tests. */
export type ExistsCheck = (candidate: string) => boolean;

/**
 * Substitute the version into a `;`-separated search list and split it.
 * Blank entries are dropped.
 */
export function expandSearchList(searchList: string, version: string): string[] {
  return searchList
    .split(VERSION_PLACEHOLDER)
    .join(version)
    .split(";")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * First existing entry of the search list, or null.
 * Lookup failure is a result, not an error.
 */
export function locateExecutable(
  searchList: string,
  version: string,
  exists: ExistsCheck = existsSync,
): string | null {
  const candidates = expandSearchList(searchList, version);
  const found = candidates.find((candidate) => exists(candidate)) ?? null;
  debug.farm("locate", { version, candidates, found });
  return found;
}

/** `usdcat` in the renderer's directory (`usdcat.exe` on Windows). */
export function locateDumpTool(
  renderExecutable: string,
  platform: NodeJS.Platform = process.platform,
  exists: ExistsCheck = existsSync,
): string | null {
  const paths = platform === "win32" ? path.win32 : path.posix;
  const name = platform === "win32" ? "usdcat.exe" : "usdcat";
  const candidate = paths.join(paths.dirname(renderExecutable), name);
  const found = exists(candidate) ? candidate : null;
  debug.farm("locate.dump-tool", { renderExecutable, candidate, found });
  return found;
}
