import type { Octokit } from "@octokit/rest";
import {
  apiBaseUrl,
  createCredentialProvider,
  createGitHubCatalog,
  repoPushedAt,
  toEpochSeconds,
} from "./github.js";
import type { RepoIdentity } from "./types.js";

const identity: RepoIdentity = {
  host: "github.com",
  org: "example-org",
  name: "catalogue",
  url: "https://github.com/example-org/catalogue.git",
};

function repo(
  name: string,
  login: string,
  type = "Organization",
  pushedAt: string | null = "2023-11-14T22:13:20Z",
) {
  return {
    name,
    pushed_at: pushedAt,
    clone_url: `https://github.com/${login}/${name}.git`,
    ssh_url: `git@github.com:${login}/${name}.git`,
    owner: { login, type },
  };
}

describe("github", () => {
  describe("apiBaseUrl", () => {
    it("should use the public API for github.com", () => {
      expect(apiBaseUrl("github.com")).toBe("https://api.github.com");
    });

    it("should use /api/v3 on other hosts", () => {
      expect(apiBaseUrl("git.example.test")).toBe("https://git.example.test/api/v3");
    });
  });

  describe("toEpochSeconds", () => {
    it("should convert ISO timestamps", () => {
      expect(toEpochSeconds("2023-11-14T22:13:20Z")).toBe(1_700_000_000);
    });

    it("should leave missing or invalid timestamps unset", () => {
      expect(toEpochSeconds(null)).toBeUndefined();
      expect(toEpochSeconds(undefined)).toBeUndefined();
      expect(toEpochSeconds("not a date")).toBeUndefined();
    });
  });

  describe("repoPushedAt", () => {
    function octokitReturning(pushedAt: string | null): Octokit {
      const get = vi.fn(async () => ({ data: { pushed_at: pushedAt } }));
      return { rest: { repos: { get } } } as unknown as Octokit;
    }

    it("should read the repository's last push", async () => {
      await expect(repoPushedAt(octokitReturning("2023-11-14T22:13:20Z"), identity)).resolves.toBe(
        1_700_000_000,
      );
    });

    it("should fail when the repository has never been pushed", async () => {
      await expect(repoPushedAt(octokitReturning(null), identity)).rejects.toThrow(
        "example-org/catalogue has no usable push time: null",
      );
    });
  });

  describe("createCredentialProvider", () => {
    it("should give no token without app credentials", async () => {
      const provider = createCredentialProvider(undefined);

      await expect(provider(identity)).resolves.toBeUndefined();
    });
  });

  describe("createGitHubCatalog", () => {
    const listReposAccessibleToInstallation = vi.fn();
    const listTeams = vi.fn();
    const teams: Record<string, Array<{ name: string; slug: string }>> = {
      alpha: [{ name: "Platform", slug: "platform" }],
      beta: [{ name: "Docs", slug: "docs" }],
      gamma: [],
    };
    const repos = [
      repo("alpha", "example-org"),
      repo("beta", "example-org", "Organization", null),
      repo("gamma", "example-org"),
      repo("outsider", "someone-else", "User"),
    ];
    const paginate = vi.fn(async (method: unknown, params: { repo?: string }) => {
      if (method === listReposAccessibleToInstallation) {
        return repos;
      }
      return teams[params.repo ?? ""] ?? [];
    });
    const octokit = {
      paginate,
      rest: {
        apps: { listReposAccessibleToInstallation },
        repos: { listTeams },
      },
    } as unknown as Octokit;

    beforeEach(() => {
      paginate.mockClear();
    });

    it("should list the organization's repositories", async () => {
      const result = await createGitHubCatalog(octokit, "example-org").listRepos();

      expect(result.map((r) => r.name)).toEqual(["alpha", "beta", "gamma"]);
      expect(result[0]).toEqual({
        name: "alpha",
        pushedAt: 1_700_000_000,
        httpsUrl: "https://github.com/example-org/alpha.git",
        sshUrl: "git@github.com:example-org/alpha.git",
        organization: "example-org",
      });
      expect(result[1].pushedAt).toBeUndefined();
      expect(paginate).toHaveBeenCalledTimes(1);
    });

    it("should keep only repositories the team can see", async () => {
      const byName = await createGitHubCatalog(octokit, "example-org", "Platform").listRepos();
      const bySlug = await createGitHubCatalog(octokit, "example-org", "docs").listRepos();

      expect(byName.map((r) => r.name)).toEqual(["alpha"]);
      expect(bySlug.map((r) => r.name)).toEqual(["beta"]);
      expect(paginate).toHaveBeenCalledWith(listTeams, {
        owner: "example-org",
        repo: "alpha",
        per_page: 100,
      });
    });

    it("should report a user-owned repository without an organization", async () => {
      const result = await createGitHubCatalog(octokit, "someone-else").listRepos();

      expect(result).toHaveLength(1);
      expect(result[0].organization).toBeNull();
    });
  });
});
