export interface RepoIdentity {
  host: string;
  org: string;
  name: string;
  /** Fetch URL. Usually https://host/org/name.git, but any URL git accepts works. */
  url: string;
}

export interface StoreConfig {
  bucket: string;
  prefix: string;
  ignoreSubdir: string;
  exclude: string[];
  /** Falls back to the AWS SDK's own region resolution when not set. */
  region?: string;
}

export interface RepoConfig {
  name: string;
  url: string;
  branches: string[];
  scanners: Record<string, string[]>;
  store?: StoreConfig;
}

export interface CredentialsConfig {
  appIdFrom?: string;
  privateKeyFrom?: string;
}

export interface RosterTarget {
  organization: string;
  team?: string;
  namespace: string;
}

export interface Config {
  workDir: string;
  recordsDir: string;
  credentials: CredentialsConfig;
  repos: RepoConfig[];
  rosters: RosterTarget[];
}

export interface BranchPointer {
  hash: string;
  summary: string;
  /** Committer time, epoch seconds. */
  commitDate: number;
}

/** Keyed by full ref name, eg refs/heads/main. */
export type RefPositions = Record<string, BranchPointer>;

export interface ClonePosition {
  refPositions: RefPositions;
  /** Upstream last-push time recorded at the last pull, epoch seconds. */
  lastModified: number;
}

export interface ReconcileResult {
  added: string[];
  updated: string[];
  deleted: string[];
}

export interface HostRepo {
  name: string;
  /** Last push, epoch seconds. Unset when the host has none. */
  pushedAt?: number;
  httpsUrl: string;
  sshUrl: string;
  organization: string | null;
}

export interface RepoRecord {
  name: string;
  namespace: string;
  source: string;
  spec: {
    httpsUrl: string;
    sshUrl: string;
    organization: string | null;
  };
  lastModified?: number;
}

export type CredentialProvider = (identity: RepoIdentity) => Promise<string | undefined>;
