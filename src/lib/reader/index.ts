/**
 * Reader module - finds and reads multi-line JSON (NDJSON / JSON Lines) files
 *
 * I/O and JSON errors are logged and skipped rather than raised.
 */

import { createReadStream } from "fs";
import { readdir, stat } from "fs/promises";
import { basename, join, resolve } from "path";
import * as readline from "readline";
import type { Readable } from "stream";
import { createGunzip } from "zlib";
import { logger } from "../../utils/logger.js";
import { isPlainObject } from "../walker/index.js";
import type { ListNdjsonOptions, NdjsonFileIndex } from "./types.js";

export * from "./types.js";

const JSON_LINE_EXTENSIONS = new Set([".ndjson", ".jsonl"]);

/**
 * `Condition.001.ndjson`, `pat.jsonl.gz` and `Obs.NDJSON` qualify
 */
export function isNdjsonFilename(path: string): boolean {
  const parts = basename(path).toLowerCase().split(".").slice(1);
  const last = parts.at(-1);
  if (last === undefined) return false;
  if (last === "gz") {
    const inner = parts.at(-2);
    return inner !== undefined && JSON_LINE_EXTENSIONS.has(`.${inner}`);
  }
  return JSON_LINE_EXTENSIONS.has(`.${last}`);
}

function openText(path: string): Readable {
  const raw = createReadStream(path);
  if (!path.toLowerCase().endsWith(".gz")) {
    return raw;
  }
  const gunzip = createGunzip();
  raw.on("error", (error) => gunzip.destroy(error));
  return raw.pipe(gunzip);
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const full = join(dir, entry.name);
    // stat() follows symlinks
    const info = await stat(full).catch((error: unknown) => {
      logger.warn("Could not stat path", {
        path: full,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    });
    if (info?.isFile()) {
      files.push(full);
    } else if (info?.isDirectory() && recursive) {
      files.push(...(await listFiles(full, recursive)));
    }
  }

  return files;
}

async function readFirstLine(path: string): Promise<string> {
  const input = openText(path);
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      return line;
    }
    return "";
  } finally {
    rl.close();
    input.destroy();
  }
}

/**
 * Resource type of a file's first record, without reading the whole file
 */
async function sniffResourceType(
  path: string,
): Promise<{ ok: true; resourceType: string | null } | { ok: false }> {
  try {
    const line = (await readFirstLine(path)).trim();
    if (!line) return { ok: false };
    const parsed: unknown = JSON.parse(line);
    const resourceType = isPlainObject(parsed) ? parsed.resourceType : undefined;
    return {
      ok: true,
      resourceType: typeof resourceType === "string" ? resourceType : null,
    };
  } catch (error) {
    logger.warn("Could not read from file", {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return { ok: false };
  }
}

/**
 * Multi-line JSON files in `dir`, sorted by path, with the resource type of
 * their first record. A missing directory yields an empty index.
 */
export async function listNdjsonFiles(
  dir: string,
  options: ListNdjsonOptions = {},
): Promise<NdjsonFileIndex> {
  const root = resolve(dir);
  const wanted = options.resourceTypes ? new Set(options.resourceTypes) : undefined;
  const index: NdjsonFileIndex = new Map();

  const rootInfo = await stat(root).catch(() => undefined);
  if (!rootInfo?.isDirectory()) {
    logger.warn("Input directory does not exist", { path: root });
    return index;
  }

  const candidates = (await listFiles(root, options.recursive ?? false))
    .filter(isNdjsonFilename)
    .sort();

  for (const path of candidates) {
    const sniffed = await sniffResourceType(path);
    if (!sniffed.ok) continue;
    if (wanted && (sniffed.resourceType === null || !wanted.has(sniffed.resourceType))) {
      continue;
    }
    index.set(path, sniffed.resourceType);
  }

  logger.debug("NDJSON files listed", { path: root, files: index.size });
  return index;
}

/**
 * Parsed JSON values from one file, line by line. Blank lines are skipped;
 * undecodable lines and read errors are logged.
 */
export async function* readNdjson(path: string): AsyncGenerator<unknown> {
  let input: Readable | undefined;
  let rl: readline.Interface | undefined;
  let lineNumber = 0;

  try {
    await stat(path);
    input = openText(path);
    rl = readline.createInterface({ input, crlfDelay: Infinity });

    for await (const line of rl) {
      lineNumber++;
      const trimmed = line.trim();
      if (trimmed === "") continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch (error) {
        logger.warn("Could not decode line", {
          path,
          line: lineNumber,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }
      yield parsed;
    }
  } catch (error) {
    logger.error("Could not read from file", {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  } finally {
    rl?.close();
    input?.destroy();
  }
}

/**
 * Only the JSON objects from a set of files, in file order
 */
export async function* readNdjsonRecords(
  paths: Iterable<string>,
): AsyncGenerator<Record<string, unknown>> {
  for (const path of paths) {
    for await (const value of readNdjson(path)) {
      if (isPlainObject(value)) {
        yield value;
      } else {
        logger.warn("Skipping non-object JSON line", { path });
      }
    }
  }
}

/**
 * Every JSON object from the matching files in `dir`, file by file in path
 * order
 */
export async function* readNdjsonFromDir(
  dir: string,
  options: ListNdjsonOptions = {},
): AsyncGenerator<Record<string, unknown>> {
  const files = await listNdjsonFiles(dir, options);
  yield* readNdjsonRecords(files.keys());
}
