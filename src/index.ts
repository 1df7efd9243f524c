#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for dashgeo.
 */
import { LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { environmentText, parseArgs, usageText } from "./cli.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import { initializeDataDir } from "./config/paths.js";
import { runBatch } from "./app.js";

/* These handlers log anything that escapes the batch runner. Per-video failures are already turned into outcomes, so reaching one of these means a bug, and we exit
 * with a failure code after logging it.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));

  process.exitCode = 1;
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));

  process.exit(1);
});

// The 'exit' event runs synchronously, so only the synchronous flush is safe here. It catches entries still buffered when a fatal error ends the process early.
process.on("exit", (): void => {

  flushLogBufferSync();
});

/**
 * Prints lines to stdout or stderr.
 */
function print(lines: string[], toStderr = false): void {

  /* eslint-disable no-console */
  for(const line of lines) {

    if(toStderr) {

      console.error(line);
    } else {

      console.log(line);
    }
  }
  /* eslint-enable no-console */
}

const parsedArgs = parseArgs(process.argv.slice(2));

switch(parsedArgs.kind) {

  case "help": {

    print(usageText());

    break;
  }

  case "version": {

    print([ "dashgeo v" + getPackageVersion() ]);

    break;
  }

  case "listEnv": {

    print(environmentText());

    break;
  }

  case "error": {

    print([ "Error: " + parsedArgs.message, "Run 'dashgeo --help' for usage." ], true);

    process.exitCode = 1;

    break;
  }

  case "run": {

    // DASHGEO_DEBUG takes precedence over --debug, allowing fine-grained category selection.
    const debugEnv = process.env.DASHGEO_DEBUG;

    if(debugEnv) {

      initDebugFilter(debugEnv);
    } else if(parsedArgs.debugLogging) {

      setDebugLogging(true);
    }

    try {

      initializeDataDir(parsedArgs.dataDir);
    } catch(error) {

      print([ "Error: " + formatError(error) ], true);

      process.exit(1);
    }

    runBatch({ overrides: parsedArgs.overrides, videos: parsedArgs.videos }).then((exitCode) => {

      process.exitCode = exitCode;
    }).catch((error: unknown): void => {

      LOG.error("Fatal error: %s.", formatError(error));

      process.exitCode = 1;
    });

    break;
  }
}
