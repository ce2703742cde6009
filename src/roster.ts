import { RosterError, errorMessage } from "./errors.js";
import { getLog } from "./logger.js";
import type { RecordStore } from "./records.js";
import type { HostRepo, ReconcileResult, RepoRecord, RosterTarget } from "./types.js";

const log = getLog(import.meta);

export const SOURCE_PREFIX = "github:";

/** The live repository list of one organization (and team) at the remote host. */
export interface RepoCatalog {
  listRepos(): Promise<HostRepo[]>;
}

export function sourceTag(target: RosterTarget): string {
  return `${SOURCE_PREFIX}${target.organization}:${target.team ?? ""}`;
}

/**
 * Makes the records in the target namespace match the catalog: records for repositories gone
 * from the host are deleted, new repositories get a record, and records whose last-push time
 * differs are patched. Records from other sources are left alone. Re-running after a partial
 * failure converges; re-running with nothing changed upstream does nothing.
 */
export async function transcribe(
  catalog: RepoCatalog,
  records: RecordStore,
  target: RosterTarget,
): Promise<ReconcileResult> {
  const { namespace } = target;
  const result: ReconcileResult = { added: [], updated: [], deleted: [] };

  try {
    const live = new Map<string, HostRepo>();
    for (const repo of await catalog.listRepos()) {
      live.set(repo.name, repo);
    }
    log.info(
      "Got %d repo(s) from %s:%s",
      live.size,
      target.organization,
      target.team ?? "",
    );

    const existing = new Map<string, RepoRecord>();
    for (const record of await records.list(namespace)) {
      if (record.source.startsWith(SOURCE_PREFIX)) {
        existing.set(record.name, record);
      }
    }
    log.info("Got %d repo record(s) from namespace %s", existing.size, namespace);

    for (const name of [...existing.keys()].sort()) {
      if (!live.has(name)) {
        log.info("Removing repo %s from namespace %s", name, namespace);
        await records.delete(namespace, name);
        result.deleted.push(name);
      }
    }

    for (const [name, repo] of [...live].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      const record = existing.get(name);
      if (record === undefined) {
        log.info("Adding repo %s to namespace %s", name, namespace);
        await records.create({
          name,
          namespace,
          source: sourceTag(target),
          spec: {
            httpsUrl: repo.httpsUrl,
            sshUrl: repo.sshUrl,
            organization: repo.organization,
          },
          lastModified: repo.pushedAt,
        });
        result.added.push(name);
      } else if (repo.pushedAt !== undefined && record.lastModified !== repo.pushedAt) {
        log.info(
          "Updating repo %s, last push changed to %d from %s",
          name,
          repo.pushedAt,
          record.lastModified ?? "unset",
        );
        await records.patchLastModified(namespace, name, repo.pushedAt);
        result.updated.push(name);
      }
    }
  } catch (err) {
    const source = `${target.organization}:${target.team ?? ""}`;
    throw new RosterError(
      `Transcribing ${source} into ${namespace} failed: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return result;
}
