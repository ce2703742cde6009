import { existsSync, rmSync } from "node:fs";
import { basename, dirname } from "node:path";
import { ensureDir, repoLocation } from "./config.js";
import { ConfigurationError, MirrorUpdateError } from "./errors.js";
import {
  checkout,
  createAnnotatedTag,
  deleteTag as removeTag,
  describeCommit,
  diffTreeFiles,
  type ExecResult,
  fetch,
  initRepository,
  isRepository,
  listLocalBranches,
  listRemoteBranches,
  listTreeFiles,
  refExists,
  resetHard,
  resolveRef,
  setFetchRefspecs,
  setRemote,
  updateRef,
} from "./git.js";
import { RepoLock, type RepoLockOptions, lockPath } from "./lock.js";
import { getLog } from "./logger.js";
import type { RefPositions, RepoIdentity } from "./types.js";

const log = getLog(import.meta);

const REMOTE = "origin";

/** A local git command failed on an existing mirror. */
export class GitError extends Error {
  constructor(
    readonly step: string,
    result: ExecResult,
  ) {
    super(`git ${step} failed: ${result.error ?? "unknown error"}`);
    this.name = "GitError";
  }
}

export interface MirrorOptions {
  branches: Iterable<string>;
  /** Directory holding all mirrors; the clone goes in <parentDir>/<host>/<org>/<name>. */
  parentDir?: string;
  /** Explicit clone location. Must still end in <host>/<org>/<name>. */
  location?: string;
  lock?: RepoLockOptions;
}

export interface ChangedFilesOptions {
  /** Also report paths deleted between the two trees. */
  includeDeleted?: boolean;
}

export type PathFilter = (path: string) => boolean;

/** A mirror bound to one credential; only a session can touch the network. */
export interface MirrorSession {
  readonly mirror: MirrorRepository;
  update(): Promise<void>;
}

export class MirrorRepository {
  private readonly tracked: Set<string>;
  readonly lock: RepoLock;

  private constructor(
    readonly identity: RepoIdentity,
    readonly location: string,
    readonly parentDir: string,
    branches: Set<string>,
    lockOptions: RepoLockOptions | undefined,
  ) {
    this.tracked = branches;
    this.lock = new RepoLock(lockPath(parentDir, identity), lockOptions);
  }

  /** Resolves where the mirror lives. Touches neither the disk nor the network. */
  static open(identity: RepoIdentity, options: MirrorOptions): MirrorRepository {
    const branches = new Set(options.branches);
    if (branches.size === 0) {
      throw new ConfigurationError(`No branches to track for ${identity.org}/${identity.name}`);
    }

    let location: string;
    let parentDir: string;
    if (options.location !== undefined) {
      location = options.location;
      const repoDir = location;
      const orgDir = dirname(repoDir);
      const hostDir = dirname(orgDir);
      if (
        basename(repoDir) !== identity.name ||
        basename(orgDir) !== identity.org ||
        basename(hostDir) !== identity.host
      ) {
        throw new ConfigurationError(
          `Mirror location ${location} must end in ${identity.host}/${identity.org}/${identity.name}`,
        );
      }
      parentDir = options.parentDir ?? dirname(hostDir);
    } else if (options.parentDir !== undefined) {
      parentDir = options.parentDir;
      location = repoLocation(parentDir, identity);
    } else {
      throw new ConfigurationError("Either a mirror location or a parent directory is required");
    }

    return new MirrorRepository(identity, location, parentDir, branches, options.lock);
  }

  get trackedBranches(): string[] {
    return [...this.tracked].sort();
  }

  get exists(): boolean {
    return isRepository(this.location);
  }

  authenticate(token: string | undefined): MirrorSession {
    return { mirror: this, update: () => this.update(token) };
  }

  /**
   * Clone or fetch, then move every tracked local branch to its fetched remote-tracking ref.
   * Branches missing upstream are dropped from the tracked set.
   */
  private async update(token: string | undefined): Promise<void> {
    const { url } = this.identity;
    log.info("Updating repo %s in %s", url, this.location);

    await this.lock.run(() => {
      const { result, branches: available } = listRemoteBranches(url, token);
      if (!result.success) {
        throw new MirrorUpdateError(`Cannot list branches of ${url}: ${result.error}`);
      }
      for (const branch of [...this.tracked]) {
        if (!available.has(branch)) {
          log.warn("Branch %s does not exist in %s; no longer tracking it", branch, url);
          this.tracked.delete(branch);
        }
      }

      if (!isRepository(this.location)) {
        log.info("No usable clone of %s in %s; creating one", url, this.location);
        if (existsSync(this.location)) {
          rmSync(this.location, { recursive: true, force: true });
        }
        ensureDir(this.location);
        this.must(initRepository(this.location), "init");
      }

      const refspecs = this.trackedBranches.map(
        (b) => `refs/heads/${b}:refs/remotes/${REMOTE}/${b}`,
      );
      this.must(setRemote(this.location, REMOTE, url), "remote");
      this.must(setFetchRefspecs(this.location, REMOTE, refspecs), "config");

      if (refspecs.length === 0) {
        log.warn("None of the tracked branches exist in %s; nothing to fetch", url);
        return;
      }

      log.info("Fetching %s", url);
      this.must(fetch(this.location, REMOTE, refspecs, token), "fetch");

      for (const branch of this.trackedBranches) {
        const target = resolveRef(this.location, `refs/remotes/${REMOTE}/${branch}`);
        if (target === undefined) {
          throw new MirrorUpdateError(`Fetched branch ${branch} has no remote-tracking ref`);
        }
        const localRef = `refs/heads/${branch}`;
        if (!refExists(this.location, localRef)) {
          log.info("Creating local branch %s at %s", branch, target);
          this.must(updateRef(this.location, localRef, target), "update-ref");
        } else {
          log.info("Fast-forwarding local branch %s to %s", branch, target);
          this.must(checkout(this.location, branch), "checkout");
          this.must(updateRef(this.location, localRef, target), "update-ref");
          this.must(resetHard(this.location, target), "reset");
        }
      }

      // A fresh clone's HEAD names a branch that was just created without a checkout.
      const head = resolveRef(this.location, "HEAD");
      if (head !== undefined) {
        this.must(resetHard(this.location, head), "reset");
      }
      log.debug({ refPositions: this.refPositions() }, "Updated %s", url);
    });
  }

  private must(result: ExecResult, step: string): void {
    if (!result.success) {
      throw new MirrorUpdateError(`git ${step} failed for ${this.identity.url}: ${result.error}`);
    }
  }

  /** Commit each tracked local branch points at, keyed by full ref name. */
  refPositions(): RefPositions {
    const positions: RefPositions = {};
    if (!this.exists) {
      return positions;
    }
    for (const branch of listLocalBranches(this.location)) {
      if (!this.tracked.has(branch)) {
        continue;
      }
      const ref = `refs/heads/${branch}`;
      const pointer = describeCommit(this.location, ref);
      if (pointer) {
        positions[ref] = pointer;
      }
    }
    return positions;
  }

  /** Commit hash `ref` points at, if the mirror has it. */
  resolve(ref: string): string | undefined {
    return this.exists ? resolveRef(this.location, ref) : undefined;
  }

  /** True if `ref` (eg refs/tags/name) exists in the mirror. */
  hasRef(ref: string): boolean {
    return this.exists && refExists(this.location, ref);
  }

  /** Make the work tree match `ref` exactly, discarding local modifications. */
  checkoutAndReset(ref: string): void {
    const target = ref.startsWith("refs/heads/") ? ref.substring("refs/heads/".length) : ref;
    const checkedOut = checkout(this.location, target);
    if (!checkedOut.success) {
      throw new GitError("checkout", checkedOut);
    }
    const reset = resetHard(this.location, ref);
    if (!reset.success) {
      throw new GitError("reset", reset);
    }
  }

  deleteTag(name: string): void {
    if (!this.hasRef(`refs/tags/${name}`)) {
      return;
    }
    const result = removeTag(this.location, name);
    if (!result.success) {
      throw new GitError("tag --delete", result);
    }
  }

  /** Point tag `name` at HEAD, replacing any existing tag of that name. */
  createTag(name: string, message: string): void {
    this.deleteTag(name);
    const result = createAnnotatedTag(this.location, name, message, "HEAD");
    if (!result.success) {
      throw new GitError("tag", result);
    }
  }

  /**
   * Paths changed between `since` and `until` that pass `filter`. With `since` null, every path
   * in the tree at `until`.
   */
  changedFiles(
    since: string | null,
    until = "HEAD",
    filter: PathFilter = () => true,
    options: ChangedFilesOptions = {},
  ): string[] {
    const listing =
      since === null
        ? listTreeFiles(this.location, until)
        : diffTreeFiles(this.location, since, until, options.includeDeleted ?? false);
    if (!listing.success) {
      throw new GitError(since === null ? "ls-tree" : "diff-tree", listing);
    }
    return [...new Set(listing.paths.filter(filter))].sort();
  }

  /** Delete the clone from disk. */
  async remove(): Promise<void> {
    await this.lock.run(() => {
      if (existsSync(this.location)) {
        log.info("Deleting clone %s", this.location);
        rmSync(this.location, { recursive: true, force: true });
      }
    });
  }
}
