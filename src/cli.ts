#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import packageJson from "../package.json";
import { CHUNK_SIZE_ENV, DEFAULT_CHUNK_SIZE, resolveChunkSize, resolveLogLevel } from "./config";
import { ChunkDocumentTool, ConvertDocumentTool, ConvertFormat } from "./tools";
import { LogLevel, setLogLevel } from "./utils/logger";
import { formatChunks } from "./utils/string";

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

async function main() {
  try {
    const envLogLevel = resolveLogLevel();
    if (envLogLevel !== undefined) {
      setLogLevel(envLogLevel);
    }

    const tools = {
      chunk: new ChunkDocumentTool(),
      convert: new ConvertDocumentTool(),
    };

    const program = new Command();

    program
      .name("mdchunk")
      .description("Split markdown documents into structure-preserving chunks")
      .version(packageJson.version)
      // Add global options for logging level
      .option("--verbose", "Enable verbose (debug) logging", false)
      .option("--silent", "Disable all logging except errors", false);

    program
      .command("chunk <file>")
      .description(
        "Split a markdown file into chunks, each followed by a '--- CHUNK BREAK ---' line",
      )
      .option(
        "-s, --chunk-size <number>",
        `Maximum characters per chunk (default: $${CHUNK_SIZE_ENV} or ${DEFAULT_CHUNK_SIZE})`,
      )
      .option("--images", "Print the image URL list as JSON after the chunks", false)
      .action(async (file: string, options: { chunkSize?: string; images: boolean }) => {
        const result = await tools.chunk.execute({
          filePath: file,
          chunkSize: resolveChunkSize(options.chunkSize),
        });
        process.stdout.write(formatChunks(result.chunks));
        if (options.images) {
          process.stdout.write(`${formatOutput(result.images)}\n`);
        }
      });

    program
      .command("json <file>")
      .description("Print the document tree of a markdown file as JSON")
      .action(async (file: string) => {
        const json = await tools.convert.execute({ filePath: file, format: ConvertFormat.Json });
        process.stdout.write(`${json}\n`);
      });

    program
      .command("render <file>")
      .description("Print a markdown file re-serialized with normalized formatting")
      .action(async (file: string) => {
        const markdown = await tools.convert.execute({
          filePath: file,
          format: ConvertFormat.Markdown,
        });
        process.stdout.write(markdown);
      });

    // Hook to set log level after parsing global options but before executing command action
    program.hook("preAction", (thisCommand) => {
      const options = thisCommand.opts();
      if (options.silent) {
        // If silent is true, it overrides verbose
        setLogLevel(LogLevel.ERROR);
      } else if (options.verbose) {
        setLogLevel(LogLevel.DEBUG);
      }
    });

    await program.parseAsync();
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
