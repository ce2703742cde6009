import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ConfigurationError, MirrorUpdateError } from "./errors.js";
import { MirrorRepository } from "./mirror.js";
import { START_TIME, UpstreamRepo, localIdentity, makeTempDir, writeFiles } from "./test-util.js";

describe("MirrorRepository", () => {
  let testDir: string;
  let parentDir: string;
  let upstream: UpstreamRepo;

  beforeEach(() => {
    testDir = makeTempDir("mirror");
    parentDir = join(testDir, "mirrors");
    upstream = new UpstreamRepo(join(testDir, "upstream"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  async function pulled(branches: string[]): Promise<MirrorRepository> {
    const mirror = MirrorRepository.open(localIdentity(upstream), { branches, parentDir });
    await mirror.authenticate(undefined).update();
    return mirror;
  }

  describe("open", () => {
    it("should place the clone under host/org/name", () => {
      const mirror = MirrorRepository.open(localIdentity(upstream), {
        branches: ["main"],
        parentDir,
      });

      expect(mirror.location).toBe(join(parentDir, "git.example.test", "example-org", "catalogue"));
      expect(mirror.lock.path).toBe(
        join(parentDir, "_LOCK_git.example.test+example-org+catalogue"),
      );
      expect(mirror.exists).toBe(false);
    });

    it("should accept an explicit location ending in host/org/name", () => {
      const location = join(testDir, "elsewhere", "git.example.test", "example-org", "catalogue");
      const mirror = MirrorRepository.open(localIdentity(upstream), {
        branches: ["main"],
        location,
      });

      expect(mirror.location).toBe(location);
      expect(mirror.parentDir).toBe(join(testDir, "elsewhere"));
    });

    it("should reject a location that does not end in host/org/name", () => {
      expect(() =>
        MirrorRepository.open(localIdentity(upstream), {
          branches: ["main"],
          location: join(testDir, "git.example.test", "example-org", "other"),
        }),
      ).toThrow(ConfigurationError);
    });

    it("should reject an empty branch set", () => {
      const open = () =>
        MirrorRepository.open(localIdentity(upstream), { branches: [], parentDir });

      expect(open).toThrow("No branches to track");
    });

    it("should require a location or parent directory", () => {
      const open = () => MirrorRepository.open(localIdentity(upstream), { branches: ["main"] });

      expect(open).toThrow(ConfigurationError);
    });
  });

  describe("update", () => {
    it("should clone only the tracked branches", async () => {
      const head = upstream.commit("first", { "a.yaml": "a: 1\n" });
      upstream.switchTo("dev", true);
      upstream.commit("on dev", { "dev.yaml": "d: 1\n" });
      upstream.switchTo("main");

      const mirror = await pulled(["main"]);

      expect(mirror.exists).toBe(true);
      expect(mirror.refPositions()).toEqual({
        "refs/heads/main": { hash: head, summary: "first", commitDate: START_TIME },
      });
      expect(readFileSync(join(mirror.location, "a.yaml"), "utf-8")).toBe("a: 1\n");
      expect(mirror.hasRef("refs/heads/dev")).toBe(false);
    });

    it("should track several branches", async () => {
      const main = upstream.commit("first", { "a.yaml": "a: 1\n" });
      upstream.switchTo("dev", true);
      const dev = upstream.commit("on dev", { "dev.yaml": "d: 1\n" });
      upstream.switchTo("main");

      const mirror = await pulled(["main", "dev"]);
      const positions = mirror.refPositions();

      expect(Object.keys(positions).sort()).toEqual(["refs/heads/dev", "refs/heads/main"]);
      expect(positions["refs/heads/main"].hash).toBe(main);
      expect(positions["refs/heads/dev"].hash).toBe(dev);
    });

    it("should fast-forward to new upstream commits", async () => {
      upstream.commit("first", { "a.yaml": "a: 1\n" });
      const mirror = await pulled(["main"]);

      const second = upstream.commit("second\n\nWith a body.", { "a.yaml": "a: 2\n" });
      await mirror.authenticate(undefined).update();

      expect(mirror.refPositions()["refs/heads/main"]).toEqual({
        hash: second,
        summary: "second",
        commitDate: START_TIME + 1,
      });
      expect(readFileSync(join(mirror.location, "a.yaml"), "utf-8")).toBe("a: 2\n");
    });

    it("should follow a force-pushed branch", async () => {
      const first = upstream.commit("first", { "a.yaml": "a: 1\n" });
      upstream.commit("second", { "a.yaml": "a: 2\n" });
      const mirror = await pulled(["main"]);

      upstream.git(["reset", "--hard", "--quiet", first]);
      await mirror.authenticate(undefined).update();

      expect(mirror.refPositions()["refs/heads/main"].hash).toBe(first);
      expect(readFileSync(join(mirror.location, "a.yaml"), "utf-8")).toBe("a: 1\n");
    });

    it("should change nothing when run twice", async () => {
      upstream.commit("first", { "a.yaml": "a: 1\n" });
      const mirror = await pulled(["main"]);
      const before = mirror.refPositions();

      await mirror.authenticate(undefined).update();

      expect(mirror.refPositions()).toEqual(before);
    });

    it("should discard local modifications", async () => {
      upstream.commit("first", { "a.yaml": "a: 1\n" });
      const mirror = await pulled(["main"]);
      writeFileSync(join(mirror.location, "a.yaml"), "tampered\n");

      await mirror.authenticate(undefined).update();

      expect(readFileSync(join(mirror.location, "a.yaml"), "utf-8")).toBe("a: 1\n");
    });

    it("should stop tracking branches missing upstream", async () => {
      const head = upstream.commit("first", { "a.yaml": "a: 1\n" });

      const mirror = await pulled(["main", "gone"]);

      expect(mirror.trackedBranches).toEqual(["main"]);
      expect(Object.keys(mirror.refPositions())).toEqual(["refs/heads/main"]);
      expect(mirror.refPositions()["refs/heads/main"].hash).toBe(head);
    });

    it("should drop a branch deleted upstream after it was cloned", async () => {
      upstream.commit("first", { "a.yaml": "a: 1\n" });
      upstream.switchTo("dev", true);
      upstream.switchTo("main");
      const mirror = await pulled(["main", "dev"]);
      expect(mirror.trackedBranches).toEqual(["dev", "main"]);

      upstream.deleteBranch("dev");
      await mirror.authenticate(undefined).update();

      expect(mirror.trackedBranches).toEqual(["main"]);
      expect(Object.keys(mirror.refPositions())).toEqual(["refs/heads/main"]);
    });

    it("should rebuild a clone whose .git is gone", async () => {
      const head = upstream.commit("first", { "a.yaml": "a: 1\n" });
      const mirror = await pulled(["main"]);
      rmSync(join(mirror.location, ".git"), { recursive: true, force: true });
      expect(mirror.exists).toBe(false);

      await mirror.authenticate(undefined).update();

      expect(mirror.exists).toBe(true);
      expect(mirror.refPositions()["refs/heads/main"].hash).toBe(head);
    });

    it("should replace a directory that is not a clone", async () => {
      const head = upstream.commit("first", { "a.yaml": "a: 1\n" });
      const mirror = MirrorRepository.open(localIdentity(upstream), {
        branches: ["main"],
        parentDir,
      });
      writeFiles(mirror.location, { "junk.txt": "junk" });

      await mirror.authenticate(undefined).update();

      expect(existsSync(join(mirror.location, "junk.txt"))).toBe(false);
      expect(mirror.refPositions()["refs/heads/main"].hash).toBe(head);
    });

    it("should fail with MirrorUpdateError when the upstream is unreachable", async () => {
      const mirror = MirrorRepository.open(
        { ...localIdentity(upstream), url: join(testDir, "nowhere") },
        { branches: ["main"], parentDir },
      );

      await expect(mirror.authenticate(undefined).update()).rejects.toBeInstanceOf(
        MirrorUpdateError,
      );
      expect(existsSync(mirror.lock.path)).toBe(false);
    });
  });

  describe("changedFiles", () => {
    let first: string;
    let mirror: MirrorRepository;

    beforeEach(async () => {
      first = upstream.commit("first", {
        "a.yaml": "a: 1\n",
        "b.yaml": "b: 1\n",
        "notes.txt": "n",
      });
      upstream.commit("second", { "a.yaml": "a: 2\n", "b.yaml": null, "conf/c.json": "{}" });
      mirror = await pulled(["main"]);
    });

    it("should list every file without a starting point", () => {
      expect(mirror.changedFiles(null)).toEqual(["a.yaml", "conf/c.json", "notes.txt"]);
    });

    it("should list added and modified files since a commit", () => {
      expect(mirror.changedFiles(first)).toEqual(["a.yaml", "conf/c.json"]);
    });

    it("should include deletions when asked", () => {
      expect(mirror.changedFiles(first, "HEAD", () => true, { includeDeleted: true })).toEqual([
        "a.yaml",
        "b.yaml",
        "conf/c.json",
      ]);
    });

    it("should report a subset of the full listing", () => {
      const all = new Set(mirror.changedFiles(null));

      expect(mirror.changedFiles(first).every((p) => all.has(p))).toBe(true);
    });

    it("should apply the filter", () => {
      expect(mirror.changedFiles(null, "HEAD", (p) => p.endsWith(".yaml"))).toEqual(["a.yaml"]);
    });

    it("should be empty between equal trees", () => {
      mirror.createTag("here", "marker");

      expect(mirror.changedFiles("here")).toEqual([]);
    });
  });

  describe("tags", () => {
    it("should create, move and delete an annotated tag", async () => {
      const first = upstream.commit("first", { "a.yaml": "a: 1\n" });
      const mirror = await pulled(["main"]);

      mirror.createTag("_SCANNED_main", "Scanned to here");
      expect(mirror.hasRef("refs/tags/_SCANNED_main")).toBe(true);
      expect(mirror.resolve("refs/tags/_SCANNED_main")).toBe(first);

      const second = upstream.commit("second", { "a.yaml": "a: 2\n" });
      await mirror.authenticate(undefined).update();
      mirror.createTag("_SCANNED_main", "Scanned to here");
      expect(mirror.resolve("refs/tags/_SCANNED_main")).toBe(second);

      mirror.deleteTag("_SCANNED_main");
      expect(mirror.hasRef("refs/tags/_SCANNED_main")).toBe(false);
      mirror.deleteTag("_SCANNED_main");
    });
  });

  describe("checkoutAndReset", () => {
    it("should switch the work tree to another branch", async () => {
      upstream.commit("first", { "a.yaml": "a: 1\n" });
      upstream.switchTo("dev", true);
      upstream.commit("on dev", { "a.yaml": "a: dev\n" });
      upstream.switchTo("main");
      const mirror = await pulled(["main", "dev"]);

      mirror.checkoutAndReset("refs/heads/dev");
      expect(readFileSync(join(mirror.location, "a.yaml"), "utf-8")).toBe("a: dev\n");

      mirror.checkoutAndReset("refs/heads/main");
      expect(readFileSync(join(mirror.location, "a.yaml"), "utf-8")).toBe("a: 1\n");
    });
  });

  describe("remove", () => {
    it("should delete the clone", async () => {
      upstream.commit("first", { "a.yaml": "a: 1\n" });
      const mirror = await pulled(["main"]);

      await mirror.remove();

      expect(existsSync(mirror.location)).toBe(false);
      expect(mirror.refPositions()).toEqual({});
    });
  });
});
