import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { checkpointPath, ensureDir } from "./config.js";
import { MirrorUpdateError, ReconcileError, errorMessage } from "./errors.js";
import type { RemoteHost } from "./github.js";
import { getLog } from "./logger.js";
import type { MirrorRepository } from "./mirror.js";
import type { ObjectStore } from "./objectstore.js";
import { branchPrefix, reconcileTree } from "./reconcile.js";
import { type BranchScanners, type ScanOptions, configScan, watermarkTag } from "./scan.js";
import type {
  BranchPointer,
  ClonePosition,
  CredentialProvider,
  ReconcileResult,
  RefPositions,
  StoreConfig,
} from "./types.js";

const log = getLog(import.meta);

export interface MirrorStatus {
  name: string;
  url: string;
  location: string;
  cloned: boolean;
  refPositions: RefPositions;
  /** Upstream push time recorded by the last pull. */
  lastModified?: number;
  /** Commit each tracked branch was last scanned to, null if never. */
  scannedTo: Record<string, string | null>;
}

export type StoreResult = Record<string, ReconcileResult>;

function writeCheckpoint(location: string, pushedAt: number): void {
  const checkpoint = checkpointPath(location);
  const staging = `${checkpoint}.tmp`;
  ensureDir(dirname(checkpoint));
  writeFileSync(staging, `${pushedAt}\n`, "ascii");
  renameSync(staging, checkpoint);
}

/**
 * Bring the mirror up to date with upstream. The whole sequence runs under the repository lock
 * so no scan can observe a half-updated clone.
 */
export async function pull(
  mirror: MirrorRepository,
  host: RemoteHost,
  credentials: CredentialProvider,
): Promise<ClonePosition> {
  const { identity } = mirror;

  return mirror.lock.run(async () => {
    let token: string | undefined;
    let pushedAt: number;
    try {
      token = await credentials(identity);
      pushedAt = await host.pushedAt(identity);
    } catch (err) {
      throw new MirrorUpdateError(
        `Cannot get ${identity.org}/${identity.name} from ${identity.host}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    // Read before the fetch so a push landing in between is never reported as seen, but
    // recorded only once the fetch succeeded.
    await mirror.authenticate(token).update();
    writeCheckpoint(mirror.location, pushedAt);
    log.debug("Upstream of %s last pushed at %d", identity.url, pushedAt);

    return { refPositions: mirror.refPositions(), lastModified: pushedAt };
  });
}

export async function scan(
  mirror: MirrorRepository,
  branchScanners: BranchScanners,
  options: ScanOptions = {},
): Promise<ClonePosition> {
  return configScan(mirror, branchScanners, options);
}

export async function status(mirror: MirrorRepository, name: string): Promise<MirrorStatus> {
  return mirror.lock.run(() => {
    const checkpoint = checkpointPath(mirror.location);
    const recorded = existsSync(checkpoint)
      ? Number.parseInt(readFileSync(checkpoint, "ascii").trim(), 10)
      : Number.NaN;

    const scannedTo: Record<string, string | null> = {};
    for (const branch of mirror.trackedBranches) {
      scannedTo[branch] = mirror.resolve(`refs/tags/${watermarkTag(branch)}`) ?? null;
    }

    return {
      name,
      url: mirror.identity.url,
      location: mirror.location,
      cloned: mirror.exists,
      refPositions: mirror.refPositions(),
      lastModified: Number.isInteger(recorded) ? recorded : undefined,
      scannedTo,
    };
  });
}

/**
 * Make `<prefix>/<branch>` in the store match the working tree of each tracked branch that
 * has been pulled.
 */
export async function syncStore(
  mirror: MirrorRepository,
  store: ObjectStore,
  config: StoreConfig,
): Promise<StoreResult> {
  return mirror.lock.run(async () => {
    const results: StoreResult = {};

    for (const branch of mirror.trackedBranches) {
      const ref = `refs/heads/${branch}`;
      if (!mirror.hasRef(ref)) {
        log.debug("Skipping branch %s: not present locally", branch);
        continue;
      }
      try {
        mirror.checkoutAndReset(ref);
      } catch (err) {
        throw new ReconcileError(`Cannot check out ${branch}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      results[branch] = await reconcileTree(mirror.location, store, {
        prefix: branchPrefix(config.prefix, branch),
        ignoreSubdir: config.ignoreSubdir || undefined,
        exclude: config.exclude,
      });
    }

    return results;
  });
}

/** Delete the clone and its recorded push time. Returns whether there was a clone. */
export async function clean(mirror: MirrorRepository): Promise<boolean> {
  return mirror.lock.run(async () => {
    const existed = existsSync(mirror.location);
    await mirror.remove();
    rmSync(checkpointPath(mirror.location), { force: true });
    return existed;
  });
}

export function formatBranchPointer(
  ref: string,
  pointer: BranchPointer,
  scannedTo?: string | null,
): string {
  const branch = ref.startsWith("refs/heads/") ? ref.substring("refs/heads/".length) : ref;
  const line = `  ${branch}: ${pointer.hash.substring(0, 7)} ${pointer.summary}`;
  if (scannedTo === undefined) {
    return line;
  }
  if (scannedTo === null) {
    return `${line} (not scanned)`;
  }
  if (scannedTo === pointer.hash) {
    return `${line} (scanned ✓)`;
  }
  return `${line} (scanned to ${scannedTo.substring(0, 7)})`;
}

export function formatRefPositions(positions: RefPositions): string {
  const refs = Object.keys(positions).sort();
  if (refs.length === 0) {
    return "  (no branches)";
  }
  return refs.map((ref) => formatBranchPointer(ref, positions[ref])).join("\n");
}

export function formatReconcileResult(label: string, result: ReconcileResult): string {
  const { added, updated, deleted } = result;
  if (added.length === 0 && updated.length === 0 && deleted.length === 0) {
    return `  ${label}: up to date ✓`;
  }
  return `  ${label}: ${added.length} added, ${updated.length} updated, ${deleted.length} deleted`;
}

export function formatStatus(s: MirrorStatus): string {
  const lines: string[] = [];

  lines.push(`\n${s.name}`);
  lines.push(`  Upstream: ${s.url}`);
  lines.push(`  Clone:    ${s.location}`);

  if (!s.cloned) {
    lines.push("  Status:   Not pulled yet");
    return lines.join("\n");
  }

  if (s.lastModified !== undefined) {
    lines.push(`  Pushed:   ${new Date(s.lastModified * 1000).toISOString()}`);
  }

  const refs = Object.keys(s.refPositions).sort();
  if (refs.length === 0) {
    lines.push("  Branches: none");
  } else {
    lines.push("  Branches:");
    for (const ref of refs) {
      const branch = ref.substring("refs/heads/".length);
      lines.push(`  ${formatBranchPointer(ref, s.refPositions[ref], s.scannedTo[branch] ?? null)}`);
    }
  }

  return lines.join("\n");
}
