#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { Logger } from "@nestjs/common";

import { parseCliArgs, USAGE } from "./cli.js";
import { enabledLogLevels, loadSettings } from "./config.js";
import type { Settings } from "./config.js";
import { createDlpServiceClient, DlpInspectionClient } from "./dlpClient.js";
import type { DlpContentInspector } from "./dlpClient.js";
import { describeCause, InspectorError, UsageError } from "./errors.js";
import { StderrLogger } from "./logger.js";
import { present, stdoutWriter } from "./presenter.js";
import type { LineWriter } from "./presenter.js";
import { buildRequest } from "./request.js";
import { ImageInspectionService } from "./service.js";

const logger = new Logger("DlpInspectImage");

export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  createClient?: (settings: Settings) => DlpContentInspector;
  stdout?: LineWriter;
  stderr?: LineWriter;
}

const stderrWriter: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

function reportFailure(error: unknown, stderr: LineWriter): number {
  stderr(`Error: ${describeCause(error)}`);
  if (error instanceof UsageError) {
    stderr("");
    stderr(USAGE);
    return 2;
  }
  if (error instanceof InspectorError) {
    if (error.cause !== undefined) {
      logger.debug(`Caused by: ${describeCause(error.cause)}`);
    }
  } else if (error instanceof Error) {
    logger.debug(error.stack ?? error.message);
  }
  return 1;
}

/** Runs one inspection and resolves with the process exit code. */
export async function run(argv: string[], deps: RunDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? stdoutWriter;
  const stderr = deps.stderr ?? stderrWriter;
  let inspector: DlpContentInspector | undefined;

  try {
    const command = parseCliArgs(argv);
    if (command.help) {
      stdout(USAGE);
      return 0;
    }

    const settings = loadSettings(deps.env ?? process.env);
    Logger.overrideLogger(new StderrLogger("DlpInspectImage", enabledLogLevels(settings.logLevel)));

    const { project, filename, infoTypes, includeQuote } = command.options;
    const request = await buildRequest(project, filename, infoTypes, includeQuote);

    inspector = (deps.createClient ?? createDlpServiceClient)(settings);
    const service = new ImageInspectionService(new DlpInspectionClient(inspector, settings));
    const result = await service.inspect(request);

    present(result, includeQuote, stdout);
    return 0;
  } catch (error) {
    return reportFailure(error, stderr);
  } finally {
    if (inspector) {
      await inspector.close().catch((error: unknown) => {
        logger.warn(`Failed to close DLP client: ${describeCause(error)}`);
      });
    }
  }
}

export function isEntryPoint(script: string | undefined = process.argv[1]): boolean {
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    // Loaded through a wrapper whose argv[1] is not a file.
    return false;
  }
}

if (isEntryPoint()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      // eslint-disable-next-line no-console
      console.error(error);
      process.exitCode = 1;
    });
}
