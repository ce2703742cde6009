#!/usr/bin/env node

import { stringify as stringifyYaml } from "yaml";
import {
  type AppCredentials,
  findRepo,
  loadAppCredentials,
  loadConfig,
  parseRepoUrl,
} from "./config.js";
import { ConfigurationError, PhaseError, RosterError, errorMessage } from "./errors.js";
import {
  authenticateToOrganization,
  createCredentialProvider,
  createGitHubCatalog,
  createGitHubHost,
} from "./github.js";
import { MirrorRepository } from "./mirror.js";
import { type ObjectStore, createS3Client, createS3ObjectStore } from "./objectstore.js";
import { createYamlRecordStore } from "./records.js";
import { type RepoCatalog, transcribe } from "./roster.js";
import type { BranchScanners } from "./scan.js";
import { type ChangeSummary, createScanner } from "./scanners.js";
import {
  clean,
  formatReconcileResult,
  formatRefPositions,
  formatStatus,
  pull,
  scan,
  status,
  syncStore,
} from "./sync.js";
import type { Config, RepoConfig, RosterTarget } from "./types.js";

function printUsage(): void {
  console.error(`
mirrorscan - Mirror git repositories, scan what changed, and keep object stores and rosters in step

Usage:
  mirrorscan pull [repo-name]          Clone or update the local mirrors
  mirrorscan scan [repo-name]          Run the configured scanners over changed files
  mirrorscan status [repo-name]        Show mirror and scan positions
  mirrorscan sync-store [repo-name]    Make each branch's object-store folder match the clone
  mirrorscan clean [repo-name]         Remove local mirrors
  mirrorscan roster                    Record the repositories of the configured organizations

Options:
  -c, --config <path>        Path to config file (default: ~/.mirrorscan/config.yaml)
  --full-scan                Scan every file instead of the changes since the last scan
  --organization <name>      Roster: organization to list (with --namespace)
  --team <name>              Roster: only repositories this team can see
  --namespace <name>         Roster: where the records are written
  -h, --help                 Show this help message

The result of each command is written to stdout as YAML; progress goes to stderr.

Examples:
  mirrorscan pull                      Pull all configured repos
  mirrorscan scan catalogue            Scan one repo
  mirrorscan scan --full-scan          Rescan everything
  mirrorscan roster --organization example-org --namespace workspaces
`);
}

interface CliArgs {
  command: string;
  repoName?: string;
  configPath?: string;
  fullScan: boolean;
  organization?: string;
  team?: string;
  namespace?: string;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { command: "", fullScan: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      parsed.help = true;
    } else if (arg === "--full-scan") {
      parsed.fullScan = true;
    } else if (arg === "-c" || arg === "--config") {
      parsed.configPath = args[++i];
    } else if (arg === "--organization") {
      parsed.organization = args[++i];
    } else if (arg === "--team") {
      parsed.team = args[++i];
    } else if (arg === "--namespace") {
      parsed.namespace = args[++i];
    } else if (!parsed.command) {
      parsed.command = arg;
    } else if (!parsed.repoName) {
      parsed.repoName = arg;
    }
  }

  return parsed;
}

function getRepos(config: Config, repoName: string | undefined): RepoConfig[] {
  if (repoName) {
    const repo = findRepo(config, repoName);
    if (!repo) {
      const available = config.repos.map((r) => r.name).join(", ");
      throw new ConfigurationError(
        `Repository '${repoName}' not found in config. Available repos: ${available}`,
      );
    }
    return [repo];
  }
  return config.repos;
}

function getRosterTargets(config: Config, args: CliArgs): RosterTarget[] {
  if (args.organization === undefined && args.namespace === undefined) {
    return config.rosters;
  }
  if (!args.organization || !args.namespace) {
    throw new ConfigurationError("--organization and --namespace must be given together");
  }
  return [{ organization: args.organization, team: args.team, namespace: args.namespace }];
}

function openMirror(config: Config, repo: RepoConfig): MirrorRepository {
  return MirrorRepository.open(parseRepoUrl(repo.url), {
    branches: repo.branches,
    parentDir: config.workDir,
  });
}

type RepoReport = Record<string, unknown>;

/** Runs `fn` for every repo, recording failures instead of stopping at the first one. */
async function forEachRepo(
  repos: RepoConfig[],
  report: Record<string, RepoReport>,
  fn: (repo: RepoConfig) => Promise<RepoReport>,
): Promise<number> {
  let failed = 0;

  for (const repo of repos) {
    console.error(`${repo.name}:`);
    try {
      report[repo.name] = { status: await fn(repo) };
    } catch (err) {
      const phase = err instanceof PhaseError ? ` (${err.phase})` : "";
      console.error(`  ✗ Error${phase}: ${errorMessage(err)}\n`);
      report[repo.name] = { status: { error: errorMessage(err) } };
      failed++;
    }
  }

  return failed;
}

async function commandPull(
  config: Config,
  repos: RepoConfig[],
  report: Record<string, RepoReport>,
): Promise<number> {
  const app = loadAppCredentials(config.credentials);
  const credentials = createCredentialProvider(app);
  const host = createGitHubHost(app);

  return forEachRepo(repos, report, async (repo) => {
    const clonePosition = await pull(openMirror(config, repo), host, credentials);
    console.error(`${formatRefPositions(clonePosition.refPositions)}\n`);
    return { clonePosition };
  });
}

function storeFor(repo: RepoConfig): ObjectStore | undefined {
  if (!repo.store) {
    return undefined;
  }
  return createS3ObjectStore(createS3Client(repo.store.region), repo.store.bucket);
}

async function commandScan(
  config: Config,
  repos: RepoConfig[],
  fullScan: boolean,
  report: Record<string, RepoReport>,
): Promise<number> {
  return forEachRepo(repos, report, async (repo) => {
    const mirror = openMirror(config, repo);
    const objectStore = storeFor(repo);
    const changes: ChangeSummary[] = [];
    const badFiles: Record<string, string[]> = {};

    const branchScanners: BranchScanners = new Map();
    for (const [branch, names] of Object.entries(repo.scanners)) {
      branchScanners.set(
        branch,
        names.map((name) =>
          createScanner(name, {
            repository: repo.name,
            branch,
            workTree: mirror.location,
            store:
              repo.store && objectStore
                ? { objectStore, prefix: repo.store.prefix, ignoreSubdir: repo.store.ignoreSubdir }
                : undefined,
            onSummary: (summary) => changes.push(summary),
            onBadFiles: (b, paths) => {
              if (paths.length > 0) {
                badFiles[b] = paths;
              }
            },
          }),
        ),
      );
    }

    const configScanPosition = await scan(mirror, branchScanners, { fullScan });
    console.error(`${formatRefPositions(configScanPosition.refPositions)}\n`);

    const result: RepoReport = { configScanPosition };
    if (changes.length > 0) {
      result.changes = changes;
    }
    if (Object.keys(badFiles).length > 0) {
      result.badFiles = badFiles;
    }
    return result;
  });
}

async function commandStatus(
  config: Config,
  repos: RepoConfig[],
  report: Record<string, RepoReport>,
): Promise<number> {
  return forEachRepo(repos, report, async (repo) => {
    const s = await status(openMirror(config, repo), repo.name);
    console.error(formatStatus(s));
    return {
      clonePosition: s.cloned
        ? { refPositions: s.refPositions, lastModified: s.lastModified ?? null }
        : null,
      scannedTo: s.scannedTo,
    };
  });
}

async function commandSyncStore(
  config: Config,
  repos: RepoConfig[],
  report: Record<string, RepoReport>,
): Promise<number> {
  return forEachRepo(repos, report, async (repo) => {
    const objectStore = storeFor(repo);
    if (!repo.store || !objectStore) {
      throw new ConfigurationError(`Repo '${repo.name}' has no 'store' configured`);
    }
    const store = await syncStore(openMirror(config, repo), objectStore, repo.store);
    for (const [branch, result] of Object.entries(store)) {
      console.error(formatReconcileResult(branch, result));
    }
    console.error("");
    return { store };
  });
}

async function commandClean(
  config: Config,
  repos: RepoConfig[],
  report: Record<string, RepoReport>,
): Promise<number> {
  return forEachRepo(repos, report, async (repo) => {
    const removed = await clean(openMirror(config, repo));
    console.error(removed ? "  ✓ Removed\n" : "  - Nothing to remove\n");
    return { removed };
  });
}

async function organizationCatalog(
  app: AppCredentials,
  target: RosterTarget,
): Promise<RepoCatalog> {
  try {
    const octokit = await authenticateToOrganization(app, target.organization);
    return createGitHubCatalog(octokit, target.organization, target.team);
  } catch (err) {
    throw new RosterError(`Cannot authenticate to ${target.organization}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

async function commandRoster(
  config: Config,
  targets: RosterTarget[],
  report: Record<string, RepoReport>,
): Promise<number> {
  const app = loadAppCredentials(config.credentials);
  if (!app) {
    throw new ConfigurationError("The roster command needs GitHub App credentials");
  }
  const records = createYamlRecordStore(config.recordsDir);
  let failed = 0;

  for (const target of targets) {
    const team = target.team ? `/${target.team}` : "";
    const label = `${target.organization}${team} -> ${target.namespace}`;
    console.error(`${label}:`);
    try {
      const catalog = await organizationCatalog(app, target);
      const roster = await transcribe(catalog, records, target);
      console.error(`${formatReconcileResult(target.namespace, roster)}\n`);
      report[label] = { status: { roster } };
    } catch (err) {
      const phase = err instanceof PhaseError ? ` (${err.phase})` : "";
      console.error(`  ✗ Error${phase}: ${errorMessage(err)}\n`);
      report[label] = { status: { error: errorMessage(err) } };
      failed++;
    }
  }

  return failed;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    printUsage();
    return args.help ? 0 : 1;
  }

  try {
    const config = loadConfig(args.configPath);
    const report: Record<string, RepoReport> = {};
    let failed: number;

    switch (args.command) {
      case "pull":
        failed = await commandPull(config, getRepos(config, args.repoName), report);
        break;
      case "scan":
        failed = await commandScan(config, getRepos(config, args.repoName), args.fullScan, report);
        break;
      case "status":
        failed = await commandStatus(config, getRepos(config, args.repoName), report);
        break;
      case "sync-store":
        failed = await commandSyncStore(config, getRepos(config, args.repoName), report);
        break;
      case "clean":
        failed = await commandClean(config, getRepos(config, args.repoName), report);
        break;
      case "roster": {
        const rosters: Record<string, RepoReport> = {};
        failed = await commandRoster(config, getRosterTargets(config, args), rosters);
        process.stdout.write(stringifyYaml({ rosters }));
        return failed > 0 ? 1 : 0;
      }
      default:
        console.error(`Unknown command: ${args.command}`);
        printUsage();
        return 1;
    }

    process.stdout.write(stringifyYaml({ repos: report }));
    return failed > 0 ? 1 : 0;
  } catch (err) {
    const phase = err instanceof PhaseError ? ` (${err.phase})` : "";
    console.error(`Error${phase}: ${errorMessage(err)}`);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
