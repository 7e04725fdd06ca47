#!/usr/bin/env node
import { buildApplication, buildCommand, buildRouteMap, run } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import type { CliFlags } from "./config/types.js";
import { describeAudio } from "./audio/audio.js";
import { formatDescriptor } from "./output/presenter.js";
import { retagBatch, retagFile } from "./retag.js";
import { ConfigError, errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

function reportFatal(e: unknown): void {
  console.error(`\nFATAL: ${errorMessage(e)}`);
  if (e instanceof ConfigError) {
    console.error("Check the config file and naming rules; no files were processed.");
  }
  process.exitCode = 1;
}

const infoCommand = buildCommand({
  docs: {
    brief: "Print what tapetag reads from an audio file (format, duration, tags)",
  },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "Path to audio file",
          parse: String,
          placeholder: "file",
        },
      ],
    },
    flags: {
      debug: {
        kind: "boolean",
        brief: "Verbose logging",
        default: false,
      },
    },
  },
  async func(
    this: CommandContext,
    flags: { debug: boolean },
    filePath: string
  ): Promise<void> {
    logger.setDebug(flags.debug);
    try {
      const descriptor = await describeAudio(filePath);
      for (const line of formatDescriptor(descriptor)) {
        console.log(line);
      }
    } catch (e) {
      reportFatal(e);
    }
  },
});

/** tag and batch share the pipeline flags */
function buildPipelineCommand(
  brief: string,
  target: { brief: string; placeholder: string },
  handler: (flags: CliFlags, target: string) => Promise<void>
) {
  return buildCommand({
    docs: { brief },
    parameters: {
      positional: {
        kind: "tuple",
        parameters: [
          {
            brief: target.brief,
            parse: String,
            placeholder: target.placeholder,
          },
        ],
      },
      flags: {
        config: {
          kind: "parsed",
          brief: "Path to config JSON file",
          parse: String,
          optional: true,
        },
        "copy-place": {
          kind: "boolean",
          brief: "Write a tagged copy at the destination instead of retagging in place",
          default: false,
        },
        quarantine: {
          kind: "parsed",
          brief: "Directory for files that cannot be resolved",
          parse: String,
          optional: true,
        },
        "dry-run": {
          kind: "boolean",
          brief: "Show proposals without prompting or writing",
          default: false,
        },
        debug: {
          kind: "boolean",
          brief: "Verbose logging, including API calls and fused rankings",
          default: false,
        },
      },
    },
    async func(this: CommandContext, flags: CliFlags, targetPath: string): Promise<void> {
      logger.setDebug(flags.debug);
      console.log(`Mode: ${flags["dry-run"] ? "DRY RUN" : flags["copy-place"] ? "COPY+PLACE" : "TAG-ONLY"}`);
      try {
        await handler(flags, targetPath);
      } catch (e) {
        reportFatal(e);
      }
    },
  });
}

const tagCommand = buildPipelineCommand(
  "Identify one file, propose tags and a destination, and apply after approval",
  { brief: "Path to audio file", placeholder: "file" },
  async (flags, filePath) => {
    await retagFile(filePath, flags);
  }
);

const batchCommand = buildPipelineCommand(
  "Propose for every audio file under a directory, then review them one at a time",
  { brief: "Directory to scan", placeholder: "dir" },
  async (flags, dir) => {
    await retagBatch(dir, flags);
  }
);

const routes = buildRouteMap({
  routes: {
    info: infoCommand,
    tag: tagCommand,
    batch: batchCommand,
  },
  docs: {
    brief: "Identify, normalize and retag live and bootleg audio recordings",
  },
});

const app = buildApplication(routes, {
  name: "tapetag",
  versionInfo: {
    currentVersion: "0.1.0",
  },
});

void run(app, process.argv.slice(2), { process });
