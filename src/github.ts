import { createAppAuth } from "@octokit/auth-app";
import { Octokit } from "@octokit/rest";
import type { AppCredentials } from "./config.js";
import type { RepoCatalog } from "./roster.js";
import type { CredentialProvider, HostRepo, RepoIdentity } from "./types.js";

/** Facts about a repository that only the host's API knows. */
export interface RemoteHost {
  /** Last push to any branch, epoch seconds. */
  pushedAt(identity: RepoIdentity): Promise<number>;
}

export function apiBaseUrl(host: string): string {
  return host === "github.com" ? "https://api.github.com" : `https://${host}/api/v3`;
}

/** Undefined when the host reports no push time (an empty repository) or an unreadable one. */
export function toEpochSeconds(timestamp: string | null | undefined): number | undefined {
  if (!timestamp) {
    return undefined;
  }
  const millis = Date.parse(timestamp);
  return Number.isNaN(millis) ? undefined : Math.floor(millis / 1000);
}

async function appOctokit(app: AppCredentials, host: string): Promise<Octokit> {
  const auth = createAppAuth({ appId: app.appId, privateKey: app.privateKey });
  const { token } = await auth({ type: "app" });
  return new Octokit({ auth: token, baseUrl: apiBaseUrl(host) });
}

function installationOctokit(app: AppCredentials, host: string, installationId: number): Octokit {
  return new Octokit({
    authStrategy: createAppAuth,
    auth: { appId: app.appId, privateKey: app.privateKey, installationId },
    baseUrl: apiBaseUrl(host),
  });
}

async function repoInstallationId(app: AppCredentials, identity: RepoIdentity): Promise<number> {
  const octokit = await appOctokit(app, identity.host);
  const { data } = await octokit.rest.apps.getRepoInstallation({
    owner: identity.org,
    repo: identity.name,
  });
  return data.id;
}

/**
 * Returns an installation token for the app installation that covers the repository, or
 * nothing when no app credentials are configured (public repositories only).
 */
export function createCredentialProvider(app: AppCredentials | undefined): CredentialProvider {
  return async (identity) => {
    if (!app) {
      return undefined;
    }
    const installationId = await repoInstallationId(app, identity);
    const auth = createAppAuth({ appId: app.appId, privateKey: app.privateKey });
    const { token } = await auth({ type: "installation", installationId });
    return token;
  };
}

export function createGitHubHost(app: AppCredentials | undefined): RemoteHost {
  return {
    async pushedAt(identity) {
      const octokit = app
        ? installationOctokit(app, identity.host, await repoInstallationId(app, identity))
        : new Octokit({ baseUrl: apiBaseUrl(identity.host) });
      return repoPushedAt(octokit, identity);
    },
  };
}

export async function repoPushedAt(octokit: Octokit, identity: RepoIdentity): Promise<number> {
  const { data } = await octokit.rest.repos.get({ owner: identity.org, repo: identity.name });
  const pushedAt = toEpochSeconds(data.pushed_at);
  if (pushedAt === undefined) {
    throw new Error(`${identity.org}/${identity.name} has no usable push time: ${data.pushed_at}`);
  }
  return pushedAt;
}

/** An Octokit acting as the app installation of `organization`. */
export async function authenticateToOrganization(
  app: AppCredentials,
  organization: string,
  host = "github.com",
): Promise<Octokit> {
  const octokit = await appOctokit(app, host);
  const { data } = await octokit.rest.apps.getOrgInstallation({ org: organization });
  return installationOctokit(app, host, data.id);
}

/**
 * Repositories the installation can see. With a team, only those the team has access to;
 * the organization admin may have limited the app to fewer repositories than exist.
 */
export function createGitHubCatalog(
  octokit: Octokit,
  organization: string,
  team?: string,
): RepoCatalog {
  return { listRepos };

  async function listRepos(): Promise<HostRepo[]> {
    const repos = await octokit.paginate(octokit.rest.apps.listReposAccessibleToInstallation, {
      per_page: 100,
    });

    const result: HostRepo[] = [];
    for (const repo of repos) {
      if (repo.owner.login !== organization) {
        continue;
      }
      if (team !== undefined && !(await teamCanSee(repo.owner.login, repo.name))) {
        continue;
      }
      result.push({
        name: repo.name,
        pushedAt: toEpochSeconds(repo.pushed_at),
        httpsUrl: repo.clone_url,
        sshUrl: repo.ssh_url,
        organization: repo.owner.type === "Organization" ? repo.owner.login : null,
      });
    }
    return result;
  }

  async function teamCanSee(owner: string, repo: string): Promise<boolean> {
    const teams = await octokit.paginate(octokit.rest.repos.listTeams, {
      owner,
      repo,
      per_page: 100,
    });
    return teams.some((t) => t.name === team || t.slug === team);
  }
}
