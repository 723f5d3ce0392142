// src/server.ts
import { createApp } from "./app";
import connectDB from "./config/db";
import config from "./config/config";
import { MarkEngine } from "./services/markEngine";
import { YearService } from "./services/yearService";
import { createRecordStore } from "./stores";

const startServer = async () => {
  try {
    const records = createRecordStore(config);
    if (records.driver === "mongo") {
      await connectDB();
    }
    console.log(`Record store: ${records.driver}`);

    const engine = new MarkEngine(records, { enforceWeightCap: config.enforceWeightCap });
    const app = createApp(new YearService(records, engine));

    app.listen(config.port, () => {
      console.log(`Server running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Weight cap: ${config.enforceWeightCap ? "enforced" : "off"}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
