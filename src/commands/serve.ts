import { Command } from "commander";
import { CONFIG } from "../config";
import { close, listen } from "../lib/demo/server";
import { createDispatcher } from "../lib/dispatch/dispatcher";
import { createServiceServer, ServiceApp } from "../lib/service/app";
import { gracefulExit } from "../lib/utils/exit";

export const serve = new Command("serve")
  .description("Run the answer and provision HTTP service")
  .option("-p, --port <port>", "Port to listen on", String(CONFIG.PORT))
  .action(async (_args, cmd) => {
    const options: { port: string } = cmd.optsWithGlobals();
    const port = Number.parseInt(options.port, 10);

    // The service always answers from local pipelines.
    const app = new ServiceApp(createDispatcher({ delegate: "direct" }));
    const server = createServiceServer(app);

    try {
      const actualPort = await listen(server, port);
      console.log(`consulta service listening on http://localhost:${actualPort}`);
      console.log(`  POST /answer   {"question": "..."}`);
      console.log(`  POST /biblioteca/provision, /compras/provision   {"query": "..."}`);
    } catch (err) {
      console.error("[serve] server error:", err);
      await gracefulExit(1);
      return;
    }

    const shutdown = async () => {
      try {
        await close(server);
      } catch (err) {
        console.error("Error closing server:", err);
      }
      await gracefulExit();
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
