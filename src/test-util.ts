import { execFileSync } from "node:child_process";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { ObjectStore } from "./objectstore.js";
import type { RepoIdentity } from "./types.js";

export const START_TIME = 1_700_000_000;

export function makeTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `mirrorscan-${label}-`));
}

/** In-process stand-in for a bucket. Records every write so tests can assert minimality. */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Buffer>();
  readonly puts: string[] = [];
  readonly deletes: string[] = [];

  constructor(
    readonly bucket = "test-bucket",
    initial: Record<string, string> = {},
  ) {
    for (const [key, body] of Object.entries(initial)) {
      this.objects.set(key, Buffer.from(body));
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  async getObject(key: string): Promise<Buffer | undefined> {
    return this.objects.get(key);
  }

  async putFile(key: string, localPath: string): Promise<void> {
    this.objects.set(key, readFileSync(localPath));
    this.puts.push(key);
  }

  async deleteObject(key: string): Promise<void> {
    this.objects.delete(key);
    this.deletes.push(key);
  }

  text(key: string): string | undefined {
    return this.objects.get(key)?.toString("utf-8");
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(root, path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

/**
 * A local repository standing in for the upstream. Commits get strictly increasing timestamps
 * starting at START_TIME.
 */
export class UpstreamRepo {
  private clock = START_TIME;

  constructor(readonly path: string) {
    mkdirSync(path, { recursive: true });
    this.git(["init", "--quiet", "--initial-branch=main"]);
  }

  git(args: string[]): string {
    const date = `${this.clock} +0000`;
    return execFileSync(
      "git",
      [
        ...["-c", "user.name=Test Author", "-c", "user.email=author@example.com"],
        ...["-c", "commit.gpgSign=false"],
        ...args,
      ],
      {
        cwd: this.path,
        encoding: "utf-8",
        stdio: "pipe",
        env: { ...process.env, GIT_AUTHOR_DATE: date, GIT_COMMITTER_DATE: date },
      },
    ).trim();
  }

  /** Writes the files (null deletes) and commits them on the current branch. Returns the hash. */
  commit(message: string, files: Record<string, string | null>): string {
    for (const [path, content] of Object.entries(files)) {
      const fullPath = join(this.path, path);
      if (content === null) {
        rmSync(fullPath, { force: true });
      } else {
        mkdirSync(dirname(fullPath), { recursive: true });
        writeFileSync(fullPath, content);
      }
    }
    this.git(["add", "--all"]);
    this.git(["commit", "--quiet", "--allow-empty", "--message", message]);
    this.clock++;
    return this.head();
  }

  head(): string {
    return this.git(["rev-parse", "HEAD"]);
  }

  /** The committer time the next commit will get. */
  get nextCommitTime(): number {
    return this.clock;
  }

  switchTo(branch: string, create = false): void {
    this.git(create ? ["checkout", "--quiet", "-b", branch] : ["checkout", "--quiet", branch]);
  }

  deleteBranch(branch: string): void {
    this.git(["branch", "--quiet", "-D", branch]);
  }
}

export function localIdentity(
  upstream: UpstreamRepo,
  org = "example-org",
  name = "catalogue",
): RepoIdentity {
  return { host: "git.example.test", org, name, url: upstream.path };
}
