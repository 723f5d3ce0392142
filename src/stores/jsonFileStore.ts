// src/stores/jsonFileStore.ts
import fs from "fs";
import path from "path";
import { IOError, NotFoundError } from "../lib/errors";
import { fromYearDocument, toYearDocument } from "../lib/yearDocument";
import type { YearStore } from "../services/yearStore";
import type { RecordStore } from "./recordStore";

const YEAR_FILE = /^(\d{4})\.json$/;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * One `<year>.json` per academic year under `dataDir`. Saves write a
 * sibling temp file and rename it over the target, so a crash leaves either
 * the previous or the new document on disk.
 */
export class JsonFileRecordStore implements RecordStore {
  readonly driver = "json" as const;

  constructor(private readonly dataDir: string) {}

  filePath(year: string): string {
    return path.join(this.dataDir, `${year}.json`);
  }

  async listYears(): Promise<string[]> {
    try {
      const files = await fs.promises.readdir(this.dataDir);
      return files
        .map((file) => YEAR_FILE.exec(file)?.[1])
        .filter((year): year is string => year !== undefined)
        .sort();
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
  }

  async exists(year: string): Promise<boolean> {
    try {
      await fs.promises.access(this.filePath(year));
      return true;
    } catch {
      return false;
    }
  }

  async load(year: string): Promise<YearStore> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath(year), "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        throw new NotFoundError(`No data saved for ${year}`);
      }
      throw new IOError(year, "load", err);
    }

    try {
      return fromYearDocument(year, JSON.parse(text));
    } catch (err) {
      throw new IOError(year, "load", err);
    }
  }

  async save(store: YearStore): Promise<void> {
    const target = this.filePath(store.year);
    const temp = `${target}.${process.pid}.tmp`;
    const body = JSON.stringify(toYearDocument(store), null, 4);

    try {
      await fs.promises.mkdir(this.dataDir, { recursive: true });
      await fs.promises.writeFile(temp, body, "utf8");
      await fs.promises.rename(temp, target);
    } catch (err) {
      await fs.promises.rm(temp, { force: true }).catch((cleanupErr: unknown) =>
        console.warn(`Could not remove ${temp}:`, cleanupErr)
      );
      throw new IOError(store.year, "save", err);
    }
  }
}
