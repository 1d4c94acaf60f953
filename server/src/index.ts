import { startChessServer } from "./app.ts";
import { loadConfig } from "./config.ts";

const config = loadConfig();

startChessServer(config)
  .then(({ url, close }) => {
    // eslint-disable-next-line no-console
    console.log(`[chess-server] listening on ${url}`);
    // eslint-disable-next-line no-console
    console.log(
      `[chess-server] engine=${config.enginePath} pool=${config.poolSize} depth=${config.defaultDepth} busyPolicy=${config.sessionBusyPolicy}`
    );

    const stop = (signal: NodeJS.Signals) => {
      // eslint-disable-next-line no-console
      console.log(`[chess-server] ${signal} received; shutting down`);
      void close().then(
        () => {
          process.exitCode = 0;
        },
        (err: unknown) => {
          // eslint-disable-next-line no-console
          console.error("[chess-server] shutdown failed", err);
          process.exitCode = 1;
        }
      );
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("[chess-server] failed to start", err);
    process.exitCode = 1;
  });
