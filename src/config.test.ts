import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  checkpointPath,
  findRepo,
  getDefaultWorkDir,
  loadAppCredentials,
  loadConfig,
  parseRepoUrl,
  repoLocation,
} from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { Config } from "./types.js";

describe("config", () => {
  const testDir = join(tmpdir(), `mirrorscan-config-test-${Date.now()}`);
  const testConfigPath = join(testDir, "config.yaml");

  beforeAll(() => {
    mkdirSync(testDir, { recursive: true });
  });

  afterAll(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe("loadConfig", () => {
    it("should load a valid config file", () => {
      writeFileSync(
        testConfigPath,
        `workDir: /srv/mirrors
repos:
  - name: catalogue
    url: https://github.com/example-org/catalogue.git
    branches: [main, develop]
    scanners:
      main: [file-list, store-mirror]
    store:
      bucket: test-bucket
      prefix: catalogue
      exclude: [generated]
      region: eu-central-1
  - name: docs
    url: https://github.com/example-org/docs
rosters:
  - organization: example-org
    team: platform
    namespace: workspaces
`,
      );

      const config = loadConfig(testConfigPath);

      expect(config.workDir).toBe("/srv/mirrors");
      expect(config.repos).toHaveLength(2);
      expect(config.repos[0]).toEqual({
        name: "catalogue",
        url: "https://github.com/example-org/catalogue.git",
        branches: ["main", "develop"],
        scanners: { main: ["file-list", "store-mirror"] },
        store: {
          bucket: "test-bucket",
          prefix: "catalogue",
          ignoreSubdir: "",
          exclude: ["generated"],
          region: "eu-central-1",
        },
      });
      expect(config.repos[1].branches).toEqual(["main"]);
      expect(config.repos[1].store).toBeUndefined();
      expect(config.rosters).toEqual([
        { organization: "example-org", team: "platform", namespace: "workspaces" },
      ]);
      expect(config.credentials).toEqual({});
    });

    it("should default workDir under the home directory", () => {
      writeFileSync(testConfigPath, "repos: []\n");

      const config = loadConfig(testConfigPath);

      expect(config.workDir).toBe(getDefaultWorkDir());
      expect(config.workDir).toContain(".mirrorscan");
      expect(config.rosters).toEqual([]);
    });

    it("should throw if config file does not exist", () => {
      expect(() => loadConfig("/nonexistent/path.yaml")).toThrow("Config file not found");
    });

    it("should throw if repos array is missing", () => {
      writeFileSync(testConfigPath, "something: else\n");

      expect(() => loadConfig(testConfigPath)).toThrow("Config must have a 'repos' array");
    });

    it("should throw if repo is missing name", () => {
      writeFileSync(
        testConfigPath,
        `repos:
  - url: https://github.com/example-org/catalogue.git
`,
      );

      expect(() => loadConfig(testConfigPath)).toThrow("must have a 'name' string");
    });

    it("should throw if repo is missing url", () => {
      writeFileSync(
        testConfigPath,
        `repos:
  - name: catalogue
`,
      );

      expect(() => loadConfig(testConfigPath)).toThrow("Repo 'catalogue' must have a 'url'");
    });

    it("should reject an empty branch list", () => {
      writeFileSync(
        testConfigPath,
        `repos:
  - name: catalogue
    url: https://github.com/example-org/catalogue.git
    branches: []
`,
      );

      expect(() => loadConfig(testConfigPath)).toThrow("must track at least one branch");
    });

    it("should reject duplicate repo names", () => {
      writeFileSync(
        testConfigPath,
        `repos:
  - name: catalogue
    url: https://github.com/example-org/catalogue.git
  - name: catalogue
    url: https://github.com/example-org/other.git
`,
      );

      expect(() => loadConfig(testConfigPath)).toThrow("used more than once");
    });

    it("should reject a store without a bucket", () => {
      writeFileSync(
        testConfigPath,
        `repos:
  - name: catalogue
    url: https://github.com/example-org/catalogue.git
    store:
      prefix: catalogue
`,
      );

      expect(() => loadConfig(testConfigPath)).toThrow("store must have a 'bucket'");
    });

    it("should reject a roster without a namespace", () => {
      writeFileSync(
        testConfigPath,
        `repos: []
rosters:
  - organization: example-org
`,
      );

      expect(() => loadConfig(testConfigPath)).toThrow(
        "Roster for 'example-org' must have a 'namespace'",
      );
    });

    it("should throw ConfigurationError for invalid YAML", () => {
      writeFileSync(testConfigPath, "repos: [\n");

      expect(() => loadConfig(testConfigPath)).toThrow(ConfigurationError);
    });
  });

  describe("parseRepoUrl", () => {
    it("should split host, org and name", () => {
      expect(parseRepoUrl("https://github.com/example-org/catalogue.git")).toEqual({
        host: "github.com",
        org: "example-org",
        name: "catalogue",
        url: "https://github.com/example-org/catalogue.git",
      });
    });

    it("should accept a URL without .git", () => {
      expect(parseRepoUrl("https://git.example.test/org/repo").name).toBe("repo");
    });

    it("should reject non-https URLs", () => {
      expect(() => parseRepoUrl("git@github.com:example-org/catalogue.git")).toThrow(
        ConfigurationError,
      );
      expect(() => parseRepoUrl("http://github.com/example-org/catalogue.git")).toThrow(
        "must be https://<host>/<org>/<name>",
      );
    });

    it("should reject URLs with the wrong number of path parts", () => {
      expect(() => parseRepoUrl("https://github.com/example-org")).toThrow(ConfigurationError);
      expect(() => parseRepoUrl("https://github.com/a/b/c")).toThrow(ConfigurationError);
    });
  });

  describe("paths", () => {
    it("should place the clone at parent/host/org/name", () => {
      const identity = parseRepoUrl("https://github.com/example-org/catalogue.git");

      expect(repoLocation("/srv/mirrors", identity)).toBe(
        "/srv/mirrors/github.com/example-org/catalogue",
      );
    });

    it("should keep the checkpoint file beside the clone", () => {
      expect(checkpointPath("/srv/mirrors/github.com/example-org/catalogue")).toBe(
        "/srv/mirrors/github.com/example-org/catalogue.upstream_push_time",
      );
    });
  });

  describe("findRepo", () => {
    const config: Config = {
      workDir: "/srv/mirrors",
      recordsDir: "/srv/records",
      credentials: {},
      repos: [
        { name: "repo-a", url: "https://github.com/o/a.git", branches: ["main"], scanners: {} },
        { name: "repo-b", url: "https://github.com/o/b.git", branches: ["main"], scanners: {} },
      ],
      rosters: [],
    };

    it("should find a repo by name", () => {
      const repo = findRepo(config, "repo-b");

      expect(repo).toBeDefined();
      expect(repo?.name).toBe("repo-b");
    });

    it("should return undefined for unknown repo", () => {
      expect(findRepo(config, "unknown")).toBeUndefined();
    });
  });

  describe("loadAppCredentials", () => {
    it("should return undefined without an app id", () => {
      expect(loadAppCredentials({}, {})).toBeUndefined();
    });

    it("should read the id and key from files", () => {
      const idFile = join(testDir, "app-id");
      const keyFile = join(testDir, "app-key");
      writeFileSync(idFile, "12345\n");
      writeFileSync(keyFile, "test-private-key");

      expect(loadAppCredentials({ appIdFrom: idFile, privateKeyFrom: keyFile }, {})).toEqual({
        appId: 12345,
        privateKey: "test-private-key",
      });
    });

    it("should fall back to the environment", () => {
      const env = { GITHUB_APP_ID: "42", GITHUB_APP_PRIVATE_KEY: "test-private-key" };

      expect(loadAppCredentials({ appIdFrom: join(testDir, "missing") }, env)).toEqual({
        appId: 42,
        privateKey: "test-private-key",
      });
    });

    it("should reject a non-numeric app id", () => {
      const env = { GITHUB_APP_ID: "abc", GITHUB_APP_PRIVATE_KEY: "k" };

      expect(() => loadAppCredentials({}, env)).toThrow("GitHub App id is not a number: abc");
    });

    it("should require a private key with an app id", () => {
      expect(() => loadAppCredentials({}, { GITHUB_APP_ID: "42" })).toThrow(
        "without a private key",
      );
    });
  });
});
