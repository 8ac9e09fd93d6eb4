import { config } from "../shared/config.js";
import { connectRunLog } from "../shared/runLog.js";
import { createApp } from "./app.js";

const start = async () => {
  const runLog = await connectRunLog(config.dbUrl);

  const app = createApp({ runLog });
  app.listen(config.port, () => {
    console.log(`API listening on http://localhost:${config.port}`);
  });
};

start().catch((error) => {
  console.error("Server failed to start:", error instanceof Error ? error.message : error);
  process.exit(1);
});
