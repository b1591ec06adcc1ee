import { Command } from "commander";
import { createFixtureRepositories } from "../lib/demo/repository";
import { createDemoBackends } from "../lib/demo/routes";
import { close, createDemoServer, listen } from "../lib/demo/server";
import { registerCleanup } from "../lib/utils/cleanup";
import { gracefulExit } from "../lib/utils/exit";

export const demo = new Command("demo")
  .description("Serve fixture data on the library and purchases REST contracts")
  .option("--library-port <port>", "Port for the library API", "8000")
  .option("--purchases-port <port>", "Port for the purchases API", "8200")
  .action(async (_args, cmd) => {
    const options: { libraryPort: string; purchasesPort: string } =
      cmd.optsWithGlobals();
    const backends = createDemoBackends(createFixtureRepositories());

    try {
      for (const [backend, port] of [
        [backends.library, options.libraryPort],
        [backends.purchases, options.purchasesPort],
      ] as const) {
        const server = createDemoServer(backend);
        const actualPort = await listen(server, Number.parseInt(port, 10));
        registerCleanup(() => close(server));
        console.log(`${backend.domain} API on http://127.0.0.1:${actualPort}`);
      }
    } catch (err) {
      console.error("[demo] could not start:", err);
      await gracefulExit(1);
      return;
    }

    const shutdown = async () => {
      await gracefulExit();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
