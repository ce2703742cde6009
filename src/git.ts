import { type ExecFileSyncOptions, execFileSync } from "node:child_process";
import { existsSync, realpathSync } from "node:fs";
import { dirname, join } from "node:path";
import type { BranchPointer } from "./types.js";

export interface ExecResult {
  success: boolean;
  output: string;
  error?: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Keep leading/trailing whitespace, needed for NUL-separated output. */
  raw?: boolean;
}

export function exec(command: string, args: string[], options: ExecOptions = {}): ExecResult {
  const execOptions: ExecFileSyncOptions = {
    encoding: "utf-8",
    stdio: "pipe",
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    maxBuffer: 256 * 1024 * 1024,
  };

  try {
    const output = execFileSync(command, args, execOptions);
    const text = typeof output === "string" ? output : output.toString("utf-8");
    return { success: true, output: options.raw ? text : text.trim() };
  } catch (err) {
    const error = err as Error & { stderr?: string | Buffer | null };
    const stderr = error.stderr ? error.stderr.toString().trim() : "";
    return {
      success: false,
      output: "",
      error: stderr || error.message,
    };
  }
}

export function git(args: string[], options: ExecOptions = {}): ExecResult {
  return exec("git", args, options);
}

/**
 * Environment that makes git send the token as HTTP basic auth. Passing it through
 * GIT_CONFIG_* keeps it out of the process arguments and out of .git/config.
 */
export function authEnv(token: string | undefined): Record<string, string> {
  if (!token) {
    return { GIT_TERMINAL_PROMPT: "0" };
  }
  const basic = Buffer.from(`x-access-token:${token}`).toString("base64");
  return {
    GIT_TERMINAL_PROMPT: "0",
    GIT_CONFIG_COUNT: "1",
    GIT_CONFIG_KEY_0: "http.extraHeader",
    GIT_CONFIG_VALUE_0: `Authorization: Basic ${basic}`,
  };
}

/**
 * True only if `repoPath` itself is the top of a git work tree. git is stopped from searching
 * parent directories, so a broken clone nested inside another repository is not mistaken for a
 * valid one.
 */
export function isRepository(repoPath: string): boolean {
  if (!existsSync(join(repoPath, ".git"))) {
    return false;
  }
  const result = git(["rev-parse", "--show-toplevel"], {
    cwd: repoPath,
    env: { GIT_CEILING_DIRECTORIES: dirname(repoPath) },
  });
  if (!result.success) {
    return false;
  }
  return realpathSync(result.output) === realpathSync(repoPath);
}

export function initRepository(repoPath: string): ExecResult {
  return git(["init", "--quiet", "--initial-branch=main", repoPath]);
}

export function setRemote(repoPath: string, name: string, url: string): ExecResult {
  const existing = git(["remote", "get-url", name], { cwd: repoPath });
  if (existing.success) {
    if (existing.output !== url) {
      return git(["remote", "set-url", name, url], { cwd: repoPath });
    }
    return { success: true, output: "" };
  }
  return git(["remote", "add", "--no-tags", name, url], { cwd: repoPath });
}

export function setFetchRefspecs(repoPath: string, remote: string, refspecs: string[]): ExecResult {
  const key = `remote.${remote}.fetch`;
  // Exit code 5 means there was nothing to unset.
  git(["config", "--unset-all", key], { cwd: repoPath });
  for (const refspec of refspecs) {
    const result = git(["config", "--add", key, refspec], { cwd: repoPath });
    if (!result.success) {
      return result;
    }
  }
  return { success: true, output: "" };
}

/** Branch names present on the remote, as reported by ls-remote. */
export function listRemoteBranches(
  url: string,
  token: string | undefined,
): { result: ExecResult; branches: Set<string> } {
  const result = git(["ls-remote", "--heads", url], { env: authEnv(token) });
  const branches = new Set<string>();
  if (result.success) {
    for (const line of result.output.split("\n")) {
      const match = line.match(/^[0-9a-f]+\s+refs\/heads\/(.+)$/);
      if (match) {
        branches.add(match[1]);
      }
    }
  }
  return { result, branches };
}

export function fetch(
  repoPath: string,
  remote: string,
  refspecs: string[],
  token: string | undefined,
): ExecResult {
  return git(["fetch", "--no-tags", "--force", "--prune", remote, ...refspecs], {
    cwd: repoPath,
    env: authEnv(token),
  });
}

export function resolveRef(repoPath: string, ref: string): string | undefined {
  const result = git(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], { cwd: repoPath });
  return result.success && result.output ? result.output : undefined;
}

export function refExists(repoPath: string, ref: string): boolean {
  return git(["show-ref", "--verify", "--quiet", ref], { cwd: repoPath }).success;
}

export function updateRef(repoPath: string, ref: string, target: string): ExecResult {
  return git(["update-ref", ref, target], { cwd: repoPath });
}

export function listLocalBranches(repoPath: string): string[] {
  const result = git(["for-each-ref", "--format=%(refname:strip=2)", "refs/heads/"], {
    cwd: repoPath,
  });
  if (!result.success || !result.output) {
    return [];
  }
  return result.output.split("\n").filter((b) => b !== "");
}

export function describeCommit(repoPath: string, ref: string): BranchPointer | undefined {
  const result = git(["show", "--no-patch", "--format=%H%x00%ct%x00%B", ref], {
    cwd: repoPath,
    raw: true,
  });
  if (!result.success) {
    return undefined;
  }
  const [hash, commitTime, body = ""] = result.output.split("\0");
  return {
    hash: hash.trim(),
    summary: body.split("\n")[0] ?? "",
    commitDate: Number.parseInt(commitTime, 10),
  };
}

export function checkout(repoPath: string, target: string): ExecResult {
  return git(["checkout", "--force", "--quiet", target, "--"], { cwd: repoPath });
}

export function resetHard(repoPath: string, target: string): ExecResult {
  return git(["reset", "--hard", "--quiet", target], { cwd: repoPath });
}

export function createAnnotatedTag(
  repoPath: string,
  name: string,
  message: string,
  target: string,
): ExecResult {
  const args = ["-c", "tag.gpgSign=false", "tag", "--annotate", "--message", message, name, target];
  return git(args, {
    cwd: repoPath,
    env: {
      GIT_COMMITTER_NAME: "mirrorscan",
      GIT_COMMITTER_EMAIL: "mirrorscan@localhost",
    },
  });
}

export function deleteTag(repoPath: string, name: string): ExecResult {
  return git(["tag", "--delete", name], { cwd: repoPath });
}

/** Every file path in the tree of `treeish`. */
export function listTreeFiles(repoPath: string, treeish: string): ExecResult & { paths: string[] } {
  const result = git(["ls-tree", "-r", "-z", "--name-only", `${treeish}^{tree}`], {
    cwd: repoPath,
    raw: true,
  });
  return { ...result, paths: splitNul(result.output) };
}

/**
 * Paths that differ between two tree-ishes. Renames are reported as a delete plus an add.
 * Deleted paths are left out unless `includeDeleted` is set.
 */
export function diffTreeFiles(
  repoPath: string,
  since: string,
  until: string,
  includeDeleted: boolean,
): ExecResult & { paths: string[] } {
  const args = ["diff-tree", "-r", "-z", "--no-commit-id", "--name-only", "--no-renames"];
  if (!includeDeleted) {
    args.push("--diff-filter=d");
  }
  const result = git([...args, `${since}^{tree}`, `${until}^{tree}`], { cwd: repoPath, raw: true });
  return { ...result, paths: splitNul(result.output) };
}

function splitNul(output: string): string[] {
  return output.split("\0").filter((p) => p !== "");
}
