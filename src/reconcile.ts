import { existsSync, readdirSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join, posix } from "node:path";
import { ReconcileError, errorMessage } from "./errors.js";
import { getLog } from "./logger.js";
import type { ObjectStore } from "./objectstore.js";
import type { ReconcileResult } from "./types.js";

const log = getLog(import.meta);

export interface ReconcileOptions {
  /** Logical folder in the store; empty means the top level of the bucket. */
  prefix?: string;
  /** Subdirectory of the local root that maps onto the prefix. */
  ignoreSubdir?: string;
  /** Top-level names below the prefix whose objects are never deleted. */
  exclude?: Iterable<string>;
}

export interface LocalEntry {
  path: string;
  isDirectory: boolean;
}

export interface ReconciliationPlan {
  toAdd: string[];
  toUpdate: string[];
  toDelete: string[];
  /** Local file for every key in toAdd and toUpdate. */
  sources: Map<string, string>;
}

/**
 * Every entry below `root`, as "/"-separated paths relative to it. Git's own `.git` entries
 * and symbolic links are skipped; other dot entries are listed like any file.
 */
export function listLocalTree(root: string): LocalEntry[] {
  const entries: LocalEntry[] = [];

  const walk = (dir: string, rel: string): void => {
    const children = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
    for (const child of children) {
      if (child.name === ".git") {
        continue;
      }
      const childRel = rel ? posix.join(rel, child.name) : child.name;
      if (child.isDirectory()) {
        entries.push({ path: childRel, isDirectory: true });
        walk(join(dir, child.name), childRel);
      } else if (child.isFile()) {
        entries.push({ path: childRel, isDirectory: false });
      }
    }
  };

  walk(root, "");
  return entries;
}

export function normalizePrefix(prefix: string | undefined): string {
  return (prefix ?? "").replace(/^\/+|\/+$/g, "");
}

export function objectKey(prefix: string, path: string): string {
  return prefix ? `${prefix}/${path}` : path;
}

/** Each branch of a repository gets its own folder below the configured prefix. */
export function branchPrefix(prefix: string, branch: string): string {
  return objectKey(normalizePrefix(prefix), branch);
}

/**
 * Works out which keys under the prefix must be uploaded or deleted so the store holds exactly
 * the local files. Existing objects are fetched and compared byte for byte.
 *
 * With an empty prefix, only single-segment keys are deletion candidates; nested keys may
 * belong to other prefixes sharing the bucket.
 */
export async function planReconciliation(
  localRoot: string,
  store: ObjectStore,
  options: ReconcileOptions = {},
): Promise<ReconciliationPlan> {
  const prefix = normalizePrefix(options.prefix);
  const base = options.ignoreSubdir ? join(localRoot, options.ignoreSubdir) : localRoot;
  if (!existsSync(base) || !statSync(base).isDirectory()) {
    throw new ReconcileError(`Local directory ${base} does not exist`);
  }
  const exclude = new Set(options.exclude ?? []);

  const remaining = new Set(await store.listKeys(prefix ? `${prefix}/` : ""));
  const plan: ReconciliationPlan = { toAdd: [], toUpdate: [], toDelete: [], sources: new Map() };

  for (const entry of listLocalTree(base)) {
    // The store creates "folders" implicitly from nested keys.
    if (entry.isDirectory) {
      continue;
    }
    const key = objectKey(prefix, entry.path);
    const localPath = join(base, entry.path);

    if (!remaining.has(key)) {
      plan.toAdd.push(key);
      plan.sources.set(key, localPath);
      continue;
    }
    remaining.delete(key);

    const stored = await store.getObject(key);
    if (stored === undefined) {
      plan.toAdd.push(key);
      plan.sources.set(key, localPath);
    } else if (!stored.equals(await readFile(localPath))) {
      plan.toUpdate.push(key);
      plan.sources.set(key, localPath);
    }
  }

  for (const key of remaining) {
    const rel = prefix ? key.substring(prefix.length + 1) : key;
    // Zero-byte "folder" placeholders are not files.
    if (rel === "" || rel.endsWith("/")) {
      continue;
    }
    if (!prefix && rel.includes("/")) {
      continue;
    }
    if (exclude.has(rel.split("/")[0])) {
      continue;
    }
    plan.toDelete.push(key);
  }

  plan.toDelete.sort();
  return plan;
}

/** Uploads and deletes are independent per object, so order does not matter. */
export async function applyReconciliation(
  plan: ReconciliationPlan,
  store: ObjectStore,
): Promise<ReconcileResult> {
  for (const key of [...plan.toAdd, ...plan.toUpdate]) {
    const localPath = plan.sources.get(key);
    if (localPath === undefined) {
      throw new ReconcileError(`No local file planned for ${key}`);
    }
    log.info("Uploading %s to %s/%s", localPath, store.bucket, key);
    await store.putFile(key, localPath);
  }

  for (const key of plan.toDelete) {
    log.info("Deleting %s/%s", store.bucket, key);
    await store.deleteObject(key);
  }

  return { added: [...plan.toAdd], updated: [...plan.toUpdate], deleted: [...plan.toDelete] };
}

export async function reconcileTree(
  localRoot: string,
  store: ObjectStore,
  options: ReconcileOptions = {},
): Promise<ReconcileResult> {
  try {
    const plan = await planReconciliation(localRoot, store, options);
    log.info(
      "Reconciling %s into %s/%s: %d to add, %d to update, %d to delete",
      localRoot,
      store.bucket,
      normalizePrefix(options.prefix),
      plan.toAdd.length,
      plan.toUpdate.length,
      plan.toDelete.length,
    );
    return await applyReconciliation(plan, store);
  } catch (err) {
    if (err instanceof ReconcileError) {
      throw err;
    }
    throw new ReconcileError(`Reconciling ${localRoot} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
