import { existsSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ensureDir } from "./config.js";
import type { RepoRecord } from "./types.js";

/** Where repository records live. Writes are single-record; there are no transactions. */
export interface RecordStore {
  list(namespace: string): Promise<RepoRecord[]>;
  create(record: RepoRecord): Promise<void>;
  delete(namespace: string, name: string): Promise<void>;
  patchLastModified(namespace: string, name: string, lastModified: number): Promise<void>;
}

export class RecordNotFoundError extends Error {
  constructor(namespace: string, name: string) {
    super(`No record ${name} in namespace ${namespace}`);
    this.name = "RecordNotFoundError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRepoRecord(value: unknown, file: string): RepoRecord {
  if (!isRecord(value) || typeof value.name !== "string" || typeof value.namespace !== "string") {
    throw new Error(`Record file ${file} has no name or namespace`);
  }
  const spec = isRecord(value.spec) ? value.spec : {};
  return {
    name: value.name,
    namespace: value.namespace,
    source: typeof value.source === "string" ? value.source : "",
    spec: {
      httpsUrl: typeof spec.httpsUrl === "string" ? spec.httpsUrl : "",
      sshUrl: typeof spec.sshUrl === "string" ? spec.sshUrl : "",
      organization: typeof spec.organization === "string" ? spec.organization : null,
    },
    lastModified: typeof value.lastModified === "number" ? value.lastModified : undefined,
  };
}

/** One YAML document per record, at <root>/<namespace>/<name>.yaml. */
export function createYamlRecordStore(root: string): RecordStore {
  const recordPath = (namespace: string, name: string) => join(root, namespace, `${name}.yaml`);

  const read = (path: string): RepoRecord =>
    toRepoRecord(parseYaml(readFileSync(path, "utf-8")), path);

  const write = (record: RepoRecord): void => {
    ensureDir(join(root, record.namespace));
    const { lastModified, ...rest } = record;
    const document = lastModified === undefined ? rest : { ...rest, lastModified };
    writeFileSync(recordPath(record.namespace, record.name), stringifyYaml(document));
  };

  return {
    async list(namespace) {
      const dir = join(root, namespace);
      if (!existsSync(dir)) {
        return [];
      }
      return readdirSync(dir)
        .filter((f) => f.endsWith(".yaml"))
        .sort()
        .map((f) => read(join(dir, f)));
    },

    async create(record) {
      write(record);
    },

    async delete(namespace, name) {
      rmSync(recordPath(namespace, name), { force: true });
    },

    async patchLastModified(namespace, name, lastModified) {
      const path = recordPath(namespace, name);
      if (!existsSync(path)) {
        throw new RecordNotFoundError(namespace, name);
      }
      write({ ...read(path), lastModified });
    },
  };
}
