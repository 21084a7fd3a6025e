// services/snapshotStore.ts
import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { FinalCatalog, RawSnapshot, RawSnapshotDocument } from "../types.js";
import type { PriorSnapshotState } from "./diffService.js";
import { errorMessage } from "./errors.js";

export const RAW_SNAPSHOT_FILE = "editions_raw.json";
export const PREVIOUS_SNAPSHOT_FILE = "editions_raw.previous.json";
export const CATALOG_FILE = "editions.json";
export const CHANGELOG_FILE = "changelog.md";

export interface RunArtifacts {
  catalog: FinalCatalog;
  changelog: string;
}

/**
 * Persisted state of the pipeline. The staged snapshot only becomes the
 * previous one through publish, after both artifacts are in place.
 */
export interface SnapshotStore {
  readPrevious(): Promise<PriorSnapshotState>;
  stageCurrent(snapshot: RawSnapshot): Promise<void>;
  discardCurrent(): Promise<void>;
  // Nothing is replaced unless every artifact was written first
  publish(artifacts: RunArtifacts, options: { promoteCurrent: boolean }): Promise<void>;
  readCatalog(): Promise<string | null>;
  readChangelog(): Promise<string | null>;
}

const rawEditionSchema = z.object({
  id: z.string(),
  name: z.string().nullable(),
  flavor: z.string().nullable(),
  standfirst: z.string().nullable(),
  color: z.string().nullable(),
  image_url: z.string().nullable(),
  alt_text: z.string().nullable(),
  product_url: z.string().nullable()
});

const rawSnapshotDocumentSchema = z.object({
  raw_data_by_locale: z.record(
    z.string(),
    z.object({
      flag: z.string(),
      editions: z.array(rawEditionSchema),
      flag_url: z.string().nullable()
    })
  )
});

export function parseSnapshotDocument(text: string): RawSnapshot {
  const document: RawSnapshotDocument = rawSnapshotDocumentSchema.parse(JSON.parse(text));
  return document.raw_data_by_locale;
}

export function serializeSnapshot(snapshot: RawSnapshot): string {
  const document: RawSnapshotDocument = { raw_data_by_locale: snapshot };
  return JSON.stringify(document, null, 4);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

export function stagedPath(filePath: string): string {
  return `${filePath}.${process.pid}.tmp`;
}

async function writeStaged(filePath: string, contents: string): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = stagedPath(filePath);
  await fs.writeFile(tmpPath, contents, "utf8");
  return tmpPath;
}

// Whole-document replace: readers see the old file or the new one, never a mix.
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.rename(await writeStaged(filePath, contents), filePath);
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly outputDir: string) {}

  private file(name: string): string {
    return path.join(this.outputDir, name);
  }

  async readPrevious(): Promise<PriorSnapshotState> {
    let text: string | null;
    try {
      text = await readOptional(this.file(PREVIOUS_SNAPSHOT_FILE));
    } catch (err) {
      return { status: "unreadable", error: errorMessage(err) };
    }
    if (text === null) return { status: "missing" };

    try {
      return { status: "loaded", snapshot: parseSnapshotDocument(text) };
    } catch (err) {
      return { status: "unreadable", error: errorMessage(err) };
    }
  }

  async stageCurrent(snapshot: RawSnapshot): Promise<void> {
    await writeFileAtomic(this.file(RAW_SNAPSHOT_FILE), serializeSnapshot(snapshot));
  }

  async discardCurrent(): Promise<void> {
    await fs.rm(this.file(RAW_SNAPSHOT_FILE), { force: true });
  }

  async promoteCurrent(): Promise<void> {
    await fs.rename(this.file(RAW_SNAPSHOT_FILE), this.file(PREVIOUS_SNAPSHOT_FILE));
  }

  async publish(artifacts: RunArtifacts, options: { promoteCurrent: boolean }): Promise<void> {
    const targets: Array<[string, string]> = [
      [this.file(CATALOG_FILE), JSON.stringify(artifacts.catalog, null, 4)],
      [this.file(CHANGELOG_FILE), artifacts.changelog]
    ];

    const staged: Array<{ tmpPath: string; target: string }> = [];
    try {
      for (const [target, contents] of targets) {
        staged.push({ tmpPath: await writeStaged(target, contents), target });
      }
    } catch (err) {
      await Promise.all(staged.map(({ tmpPath }) => fs.rm(tmpPath, { force: true })));
      throw err;
    }

    for (const { tmpPath, target } of staged) {
      await fs.rename(tmpPath, target);
    }
    if (options.promoteCurrent) {
      await this.promoteCurrent();
    }
  }

  async readCatalog(): Promise<string | null> {
    return readOptional(this.file(CATALOG_FILE));
  }

  async readChangelog(): Promise<string | null> {
    return readOptional(this.file(CHANGELOG_FILE));
  }
}
