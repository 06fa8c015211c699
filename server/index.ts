import express from "express";
import { config } from "./config";
import { registerRoutes } from "./routes";

async function main(): Promise<void> {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  const server = await registerRoutes(app);
  server.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port}`);
  });
}

main().catch((err: unknown) => {
  console.error("[server] failed to start:", err);
  process.exit(1);
});
