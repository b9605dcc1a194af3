import dotenv from "dotenv";
import { createApp } from "./app.js";
import { loadConfig } from "./config/app.config.js";
import { createPool, createQuery } from "./database/connection.js";
import { ConfigError } from "./errors/app.errors.js";
import { SalesDataRepository } from "./repositories/sales-data.repository.js";
import { DashboardService } from "./services/dashboard.service.js";
import { SalesDataService } from "./services/sales-data.service.js";

dotenv.config();

function start() {
  const config = loadConfig();
  const pool = createPool(config.database);

  const salesDataService = new SalesDataService(
    new SalesDataRepository(createQuery(pool)),
  );
  const app = createApp(new DashboardService(salesDataService));

  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });
}

try {
  start();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error("❌ Configuration error:");
    error.problems.forEach((problem) => console.error(`   - ${problem}`));
  } else {
    console.error("❌ Failed to start server:", error);
  }
  process.exit(1);
}
