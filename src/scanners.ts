import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ConfigurationError } from "./errors.js";
import { getLog } from "./logger.js";
import type { ObjectStore } from "./objectstore.js";
import { branchPrefix, normalizePrefix, objectKey } from "./reconcile.js";
import type { Scanner } from "./scan.js";

const log = getLog(import.meta);

export interface ChangeSummary {
  repository: string;
  branch: string;
  added: string[];
  updated: string[];
  deleted: string[];
}

/** Records every path it is shown. */
export class FileListScanner implements Scanner {
  readonly name = "file-list";
  readonly visited: string[] = [];
  finished = false;

  constructor(private readonly branch: string) {}

  scanFile(path: string): void {
    this.visited.push(path);
  }

  finish(): void {
    this.finished = true;
    log.info("Visited %d file(s) on %s", this.visited.length, this.branch);
  }
}

/** Reports the files that were missing or could not be parsed. */
export class BadFileScanner implements Scanner {
  readonly name = "bad-files";
  readonly badFiles: string[] = [];

  constructor(
    private readonly branch: string,
    private readonly onBadFiles?: (branch: string, paths: string[]) => void,
  ) {}

  scanFile(path: string, data: unknown): void {
    if (data === null) {
      this.badFiles.push(path);
    }
  }

  finish(): void {
    if (this.badFiles.length > 0) {
      log.warn(
        "%d file(s) on %s were missing or unparseable: %s",
        this.badFiles.length,
        this.branch,
        this.badFiles.join(", "),
      );
    }
    this.onBadFiles?.(this.branch, [...this.badFiles]);
  }
}

/**
 * Mirrors each changed file into `<prefix>/<path>` of an object store: a file present in the
 * work tree is uploaded unless the stored bytes already match, a missing file has its object
 * deleted. The keys touched are handed to `onSummary` when the branch is done.
 *
 * With `ignoreSubdir`, only files below that directory are mirrored and keys are relative to
 * it, matching what reconciling the same prefix would produce.
 */
export class StoreMirrorScanner implements Scanner {
  readonly name = "store-mirror";
  private readonly prefix: string;
  private readonly subdir: string;
  private added: string[] = [];
  private updated: string[] = [];
  private deleted: string[] = [];

  constructor(
    private readonly store: ObjectStore,
    private readonly workTree: string,
    private readonly repository: string,
    private readonly branch: string,
    prefix: string,
    private readonly onSummary: (summary: ChangeSummary) => void,
    ignoreSubdir = "",
  ) {
    this.prefix = normalizePrefix(prefix);
    this.subdir = normalizePrefix(ignoreSubdir);
  }

  async scanFile(path: string): Promise<void> {
    const relative = this.relativePath(path);
    if (relative === undefined) {
      log.debug("Skipping %s: outside %s", path, this.subdir);
      return;
    }
    const localPath = join(this.workTree, path);
    const key = objectKey(this.prefix, relative);

    if (!existsSync(localPath)) {
      log.info("Deleting %s/%s", this.store.bucket, key);
      await this.store.deleteObject(key);
      this.deleted.push(key);
      return;
    }

    const stored = await this.store.getObject(key);
    if (stored !== undefined && stored.equals(readFileSync(localPath))) {
      log.debug("%s/%s is up to date", this.store.bucket, key);
      return;
    }
    log.info("Uploading %s to %s/%s", path, this.store.bucket, key);
    await this.store.putFile(key, localPath);
    (stored === undefined ? this.added : this.updated).push(key);
  }

  private relativePath(path: string): string | undefined {
    if (!this.subdir) {
      return path;
    }
    return path.startsWith(`${this.subdir}/`) ? path.substring(this.subdir.length + 1) : undefined;
  }

  finish(): void {
    this.onSummary({
      repository: this.repository,
      branch: this.branch,
      added: this.added,
      updated: this.updated,
      deleted: this.deleted,
    });
    this.added = [];
    this.updated = [];
    this.deleted = [];
  }
}

export interface ScannerContext {
  repository: string;
  branch: string;
  workTree: string;
  /** Required by store-mirror. */
  store?: { objectStore: ObjectStore; prefix: string; ignoreSubdir?: string };
  onSummary: (summary: ChangeSummary) => void;
  onBadFiles: (branch: string, paths: string[]) => void;
}

type ScannerFactory = (context: ScannerContext) => Scanner;

const REGISTRY: Record<string, ScannerFactory> = {
  "file-list": (ctx) => new FileListScanner(ctx.branch),
  "bad-files": (ctx) => new BadFileScanner(ctx.branch, ctx.onBadFiles),
  "store-mirror": (ctx) => {
    if (!ctx.store) {
      throw new ConfigurationError(`Scanner store-mirror needs a store for ${ctx.repository}`);
    }
    return new StoreMirrorScanner(
      ctx.store.objectStore,
      ctx.workTree,
      ctx.repository,
      ctx.branch,
      branchPrefix(ctx.store.prefix, ctx.branch),
      ctx.onSummary,
      ctx.store.ignoreSubdir,
    );
  },
};

export function scannerNames(): string[] {
  return Object.keys(REGISTRY).sort();
}

export function createScanner(name: string, context: ScannerContext): Scanner {
  const factory = REGISTRY[name];
  if (!factory) {
    throw new ConfigurationError(
      `Unknown scanner '${name}'. Known scanners: ${scannerNames().join(", ")}`,
    );
  }
  return factory(context);
}
