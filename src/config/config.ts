// src/config/config.ts
import dotenv from "dotenv";
import { STORE_DRIVERS, StoreDriver } from "../stores/recordStore";

dotenv.config();

function storeDriver(value: string | undefined): StoreDriver {
  const driver = (value || "json").toLowerCase();
  const known = STORE_DRIVERS.find((d) => d === driver);
  if (!known) {
    console.warn(`Unknown STORE_DRIVER "${value}", falling back to json`);
    return "json";
  }
  return known;
}

const config = Object.freeze({
  port: Number(process.env.PORT) || 8000,
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  storeDriver: storeDriver(process.env.STORE_DRIVER),
  dataDir: process.env.DATA_DIR || "data",
  databaseURI: process.env.MONGODB_URI || "mongodb://localhost:27017/marks-ledger",
  enforceWeightCap: process.env.ENFORCE_WEIGHT_CAP === "true",
});

export type AppConfig = typeof config;

export default config;
