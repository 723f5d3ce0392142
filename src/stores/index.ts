// src/stores/index.ts
import path from "path";
import type { AppConfig } from "../config/config";
import { JsonFileRecordStore } from "./jsonFileStore";
import { MemoryRecordStore } from "./memoryStore";
import { MongoRecordStore } from "./mongoStore";
import type { RecordStore } from "./recordStore";

export function createRecordStore(config: Pick<AppConfig, "storeDriver" | "dataDir">): RecordStore {
  switch (config.storeDriver) {
    case "mongo":
      return new MongoRecordStore();
    case "memory":
      return new MemoryRecordStore();
    case "json":
      return new JsonFileRecordStore(path.resolve(config.dataDir));
  }
}

export { JsonFileRecordStore, MemoryRecordStore, MongoRecordStore };
export type { RecordStore };
