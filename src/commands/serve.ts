import { Command } from "commander";
import { CONFIG } from "../config";
import { describeCause } from "../lib/errors";
import { createHttpServer } from "../lib/server/http";
import { ConversionService } from "../lib/service";
import { ExpirySweeper } from "../lib/session/sweeper";

/** Signal listeners ignore returned promises, so failures are reported here. */
export function signalHandler(shutdown: () => Promise<void>): () => void {
  return () => {
    shutdown().catch((err: unknown) => {
      console.error(`[serve] Shutdown failed: ${describeCause(err)}`);
      process.exitCode = 1;
    });
  };
}

export const serve = new Command("serve")
  .description("Run the conversion API over HTTP")
  .option("-p, --port <port>", "Port to listen on", String(CONFIG.PORT))
  .action(async (_args, cmd) => {
    const options: { port: string } = cmd.optsWithGlobals();
    const port = parseInt(options.port, 10);

    try {
      if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid port: ${options.port}`);
      }

      const service = new ConversionService();
      const sweeper = new ExpirySweeper(service.store);
      const server = createHttpServer(service);

      sweeper.start();
      server.listen(port, () => {
        console.log(`[serve] doc2ai listening on http://localhost:${port}`);
      });

      const shutdown = async () => {
        sweeper.stop();
        server.close();
        await service.close();
        process.exit(0);
      };

      process.on("SIGINT", signalHandler(shutdown));
      process.on("SIGTERM", signalHandler(shutdown));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Serve failed:", message);
      process.exitCode = 1;
    }
  });
