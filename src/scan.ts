import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { checkpointPath } from "./config.js";
import { ScanError, errorMessage } from "./errors.js";
import { getLog } from "./logger.js";
import type { MirrorRepository, PathFilter } from "./mirror.js";
import type { ClonePosition } from "./types.js";

const log = getLog(import.meta);

export const WATERMARK_PREFIX = "_SCANNED_";

/**
 * A visitor over the files changed on one branch. `scanFile` sees every changed file, with
 * `null` content when the file is gone or could not be parsed; `finish` runs once after the
 * last file. The same file may be seen again after a failed run, so scanners must tolerate
 * re-processing.
 */
export interface Scanner {
  readonly name: string;
  scanFile(path: string, data: unknown): void | Promise<void>;
  finish(): void | Promise<void>;
}

export type BranchScanners = Map<string, Scanner[]>;

export interface ScanOptions {
  fullScan?: boolean;
  filter?: PathFilter;
}

export function watermarkTag(branch: string): string {
  return `${WATERMARK_PREFIX}${branch}`;
}

export function scannableFile(path: string): boolean {
  return path.endsWith(".yaml") || path.endsWith(".yml") || path.endsWith(".json");
}

/**
 * Reads and parses a file of the mirror's work tree: YAML or JSON by extension, raw text
 * otherwise. Missing files and parse failures both yield null.
 */
export function readScannedFile(root: string, path: string): unknown {
  const fullPath = join(root, path);
  if (!existsSync(fullPath)) {
    return null;
  }

  let text: string;
  try {
    text = readFileSync(fullPath, "utf-8");
  } catch (err) {
    log.warn("Cannot read %s: %s", path, errorMessage(err));
    return null;
  }

  try {
    if (path.endsWith(".yaml") || path.endsWith(".yml")) {
      return parseYaml(text) ?? null;
    }
    if (path.endsWith(".json")) {
      return JSON.parse(text);
    }
    return text;
  } catch (err) {
    log.warn("Cannot parse %s: %s", path, errorMessage(err));
    return null;
  }
}

export function readCheckpoint(location: string): number {
  const path = checkpointPath(location);
  if (!existsSync(path)) {
    throw new ScanError(`No upstream push time recorded at ${path}; pull the repo first`);
  }
  const pushedAt = Number.parseInt(readFileSync(path, "ascii").trim(), 10);
  if (!Number.isInteger(pushedAt)) {
    throw new ScanError(`Upstream push time in ${path} is not a number`);
  }
  return pushedAt;
}

/**
 * For each branch with scanners: check it out, find the files changed since its watermark tag
 * (or all files), feed them to the scanners, then move the watermark to the branch tip. A
 * failure leaves that branch's watermark where it was.
 */
export async function configScan(
  mirror: MirrorRepository,
  branchScanners: BranchScanners,
  options: ScanOptions = {},
): Promise<ClonePosition> {
  const filter = options.filter ?? scannableFile;

  return mirror.lock.run(async () => {
    const lastModified = readCheckpoint(mirror.location);

    for (const [branch, scanners] of branchScanners) {
      const ref = `refs/heads/${branch}`;
      if (!mirror.hasRef(ref)) {
        log.debug("Skipping branch %s: not present locally", branch);
        continue;
      }

      try {
        await scanBranch(mirror, branch, scanners, filter, options.fullScan ?? false);
      } catch (err) {
        if (err instanceof ScanError) {
          throw err;
        }
        throw new ScanError(`Scan of branch ${branch} failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }

    return { refPositions: mirror.refPositions(), lastModified };
  });
}

async function scanBranch(
  mirror: MirrorRepository,
  branch: string,
  scanners: Scanner[],
  filter: PathFilter,
  fullScan: boolean,
): Promise<void> {
  const ref = `refs/heads/${branch}`;
  mirror.checkoutAndReset(ref);

  const tag = watermarkTag(branch);
  const since = !fullScan && mirror.hasRef(`refs/tags/${tag}`) ? tag : null;
  const paths = mirror.changedFiles(since, "HEAD", filter, { includeDeleted: true });
  log.info(
    "Scanning %d file(s) on %s %s",
    paths.length,
    branch,
    since === null ? "(full scan)" : `since ${tag}`,
  );

  for (const path of paths) {
    const data = readScannedFile(mirror.location, path);
    log.debug("Scanning file %s", path);
    for (const scanner of scanners) {
      await scanner.scanFile(path, data);
    }
  }

  for (const scanner of scanners) {
    await scanner.finish();
  }

  mirror.createTag(tag, "Scanned to here");
}
