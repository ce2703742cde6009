import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "./errors.js";
import type {
  Config,
  CredentialsConfig,
  RepoConfig,
  RepoIdentity,
  RosterTarget,
  StoreConfig,
} from "./types.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".mirrorscan");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_BRANCHES = ["main"];

export interface AppCredentials {
  appId: number;
  privateKey: string;
}

export function getConfigPath(customPath?: string): string {
  return customPath || DEFAULT_CONFIG_PATH;
}

export function getDefaultWorkDir(): string {
  return join(DEFAULT_CONFIG_DIR, "repos");
}

export function getDefaultRecordsDir(): string {
  return join(DEFAULT_CONFIG_DIR, "records");
}

export function ensureDir(path: string): void {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
}

/**
 * Splits https://host/org/name(.git) into its parts. Anything else is rejected so that the
 * mirror location and lock name are always derivable.
 */
export function parseRepoUrl(url: string): RepoIdentity {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    throw new ConfigurationError(`Invalid repository URL: ${url}`, { cause: err });
  }
  if (parsed.protocol !== "https:" || !parsed.hostname) {
    throw new ConfigurationError(`Repository URL must be https://<host>/<org>/<name>: ${url}`);
  }
  const parts = parsed.pathname.split("/").filter((p) => p !== "");
  if (parts.length !== 2) {
    throw new ConfigurationError(`Repository URL must be https://<host>/<org>/<name>: ${url}`);
  }
  const [org, rawName] = parts;
  const name = rawName.endsWith(".git") ? rawName.slice(0, -4) : rawName;
  if (!name) {
    throw new ConfigurationError(`Repository URL has an empty repository name: ${url}`);
  }
  return { host: parsed.hostname, org, name, url };
}

export function repoLocation(parentDir: string, identity: RepoIdentity): string {
  return join(parentDir, identity.host, identity.org, identity.name);
}

/** Side file holding the upstream last-push time, next to (not inside) the clone. */
export function checkpointPath(location: string): string {
  return `${location}.upstream_push_time`;
}

export function loadConfig(configPath?: string): Config {
  const path = getConfigPath(configPath);

  if (!existsSync(path)) {
    throw new ConfigurationError(
      [
        `Config file not found: ${path}`,
        "Create it with:",
        "",
        `  mkdir -p ${dirname(path)}`,
        `  cat > ${path} << 'EOF'`,
        "repos:",
        "  - name: catalogue",
        "    url: https://github.com/example-org/catalogue.git",
        "    branches: [main, develop]",
        "    scanners:",
        "      main: [file-list]",
        "EOF",
      ].join("\n"),
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Config file ${path} is not valid YAML`, { cause: err });
  }

  if (!isRecord(raw)) {
    throw new ConfigurationError("Config must be a YAML mapping");
  }
  if (!Array.isArray(raw.repos)) {
    throw new ConfigurationError("Config must have a 'repos' array");
  }

  const repos = raw.repos.map(validateRepoConfig);
  const names = new Set<string>();
  for (const repo of repos) {
    if (names.has(repo.name)) {
      throw new ConfigurationError(`Repo name '${repo.name}' is used more than once`);
    }
    names.add(repo.name);
  }

  const rosters = raw.rosters === undefined ? [] : raw.rosters;
  if (!Array.isArray(rosters)) {
    throw new ConfigurationError("'rosters' must be an array");
  }

  return {
    workDir: optionalString(raw.workDir, "workDir") ?? getDefaultWorkDir(),
    recordsDir: optionalString(raw.recordsDir, "recordsDir") ?? getDefaultRecordsDir(),
    credentials: validateCredentials(raw.credentials),
    repos,
    rosters: rosters.map(validateRosterTarget),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`'${field}' must be a string`);
  }
  return value;
}

function stringList(value: unknown, field: string): string[] {
  const isName = (v: unknown): v is string => typeof v === "string" && v !== "";
  if (!Array.isArray(value) || !value.every(isName)) {
    throw new ConfigurationError(`'${field}' must be a list of non-empty strings`);
  }
  return value;
}

function validateRepoConfig(repo: unknown): RepoConfig {
  if (!isRecord(repo)) {
    throw new ConfigurationError("Each repo must be a mapping");
  }
  if (!repo.name || typeof repo.name !== "string") {
    throw new ConfigurationError("Each repo must have a 'name' string");
  }
  const name = repo.name;
  if (!repo.url || typeof repo.url !== "string") {
    throw new ConfigurationError(`Repo '${name}' must have a 'url'`);
  }
  parseRepoUrl(repo.url);

  const branches =
    repo.branches === undefined
      ? [...DEFAULT_BRANCHES]
      : stringList(repo.branches, `${name}.branches`);
  if (branches.length === 0) {
    throw new ConfigurationError(`Repo '${name}' must track at least one branch`);
  }

  const scanners: Record<string, string[]> = {};
  if (repo.scanners !== undefined) {
    if (!isRecord(repo.scanners)) {
      throw new ConfigurationError(
        `Repo '${name}' 'scanners' must map branch names to scanner lists`,
      );
    }
    for (const [branch, list] of Object.entries(repo.scanners)) {
      scanners[branch] = stringList(list, `${name}.scanners.${branch}`);
    }
  }

  return {
    name,
    url: repo.url,
    branches,
    scanners,
    store: repo.store === undefined ? undefined : validateStoreConfig(repo.store, name),
  };
}

function validateStoreConfig(store: unknown, repoName: string): StoreConfig {
  if (!isRecord(store)) {
    throw new ConfigurationError(`Repo '${repoName}' 'store' must be a mapping`);
  }
  if (!store.bucket || typeof store.bucket !== "string") {
    throw new ConfigurationError(`Repo '${repoName}' store must have a 'bucket'`);
  }
  return {
    bucket: store.bucket,
    prefix: optionalString(store.prefix, `${repoName}.store.prefix`) ?? "",
    ignoreSubdir: optionalString(store.ignoreSubdir, `${repoName}.store.ignoreSubdir`) ?? "",
    exclude:
      store.exclude === undefined ? [] : stringList(store.exclude, `${repoName}.store.exclude`),
    region: optionalString(store.region, `${repoName}.store.region`),
  };
}

function validateCredentials(credentials: unknown): CredentialsConfig {
  if (credentials === undefined || credentials === null) {
    return {};
  }
  if (!isRecord(credentials)) {
    throw new ConfigurationError("'credentials' must be a mapping");
  }
  return {
    appIdFrom: optionalString(credentials.appIdFrom, "credentials.appIdFrom"),
    privateKeyFrom: optionalString(credentials.privateKeyFrom, "credentials.privateKeyFrom"),
  };
}

function validateRosterTarget(target: unknown): RosterTarget {
  if (!isRecord(target)) {
    throw new ConfigurationError("Each roster must be a mapping");
  }
  if (!target.organization || typeof target.organization !== "string") {
    throw new ConfigurationError("Each roster must have an 'organization' string");
  }
  if (!target.namespace || typeof target.namespace !== "string") {
    throw new ConfigurationError(`Roster for '${target.organization}' must have a 'namespace'`);
  }
  return {
    organization: target.organization,
    team: optionalString(target.team, `${target.organization}.team`),
    namespace: target.namespace,
  };
}

export function findRepo(config: Config, name: string): RepoConfig | undefined {
  return config.repos.find((r) => r.name === name);
}

/**
 * Reads the GitHub App id and private key from the configured files, falling back to the
 * GITHUB_APP_ID and GITHUB_APP_PRIVATE_KEY environment variables. Returns undefined when no app
 * id is available, which means anonymous access.
 */
export function loadAppCredentials(
  credentials: CredentialsConfig,
  env: NodeJS.ProcessEnv = process.env,
): AppCredentials | undefined {
  const appIdText = readIfPresent(credentials.appIdFrom) ?? env.GITHUB_APP_ID;
  if (!appIdText || appIdText.trim() === "") {
    return undefined;
  }
  const appId = Number.parseInt(appIdText.trim(), 10);
  if (!Number.isInteger(appId) || appId <= 0) {
    throw new ConfigurationError(`GitHub App id is not a number: ${appIdText.trim()}`);
  }
  const privateKey = readIfPresent(credentials.privateKeyFrom) ?? env.GITHUB_APP_PRIVATE_KEY;
  if (!privateKey) {
    throw new ConfigurationError("GitHub App id given without a private key");
  }
  return { appId, privateKey };
}

function readIfPresent(path: string | undefined): string | undefined {
  if (!path || !existsSync(path)) {
    return undefined;
  }
  return readFileSync(path, "utf-8");
}
