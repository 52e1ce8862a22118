#!/usr/bin/env node
/**
 * sprocgen CLI
 *
 * Generates C# data-access method bodies from a declaration manifest.
 *
 * Log verbosity is controlled via the built-in --log-level flag:
 *   --log-level debug   Show detailed output (strategies, file paths)
 *   --log-level info    Default - show progress messages
 *   --log-level none    Suppress all output except errors
 */
import { Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Option } from "effect";
import { runGenerate, type GenerateError, type GenerateResult } from "./generate.js";
import { runInit } from "./init.js";

const VERSION = "0.1.0";

// ============================================================================
// Options
// ============================================================================

const configPath = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to config file"),
  Options.optional,
);

const outputDir = Options.directory("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Override output directory"),
  Options.optional,
);

const dryRun = Options.boolean("dry-run").pipe(
  Options.withAlias("n"),
  Options.withDescription("Show what would be generated without writing files"),
  Options.withDefault(false),
);

// ============================================================================
// Generate Command Logic
// ============================================================================

interface GenerateArgs {
  readonly configPath: Option.Option<string>;
  readonly outputDir: Option.Option<string>;
  readonly dryRun: boolean;
}

/** Log an error with a list of detail messages */
const logErrorWithDetails = (error: GenerateError, details: readonly string[]) =>
  Console.error(`\n✗ Error: ${error._tag}`).pipe(
    Effect.andThen(Console.error(`  ${error.message}`)),
    Effect.andThen(Effect.forEach(details, e => Console.error(`    - ${e}`))),
    Effect.andThen(Effect.fail(error)),
  );

const runGenerateCommand = (args: GenerateArgs) => {
  const logSuccess = (result: GenerateResult) => {
    const written = result.writeResults.filter(r => r.written).length;
    const total = result.writeResults.length;
    const suffix = args.dryRun ? " (dry run)" : "";
    return Console.log(`\n✓ Generated ${args.dryRun ? total : written} files${suffix}`);
  };

  return runGenerate({
    configPath: Option.getOrUndefined(args.configPath),
    outputDir: Option.getOrUndefined(args.outputDir),
    dryRun: args.dryRun,
  }).pipe(
    Effect.tap(logSuccess),
    Effect.catchTags({
      ConfigInvalid: error => logErrorWithDetails(error, error.errors),
      ManifestInvalid: error => logErrorWithDetails(error, error.errors),
      ConfigNotFound: error =>
        logErrorWithDetails(error, error.searchPaths).pipe(
          Effect.tapError(() => Console.error("  Run 'sprocgen init' to create one.")),
        ),
      MarkerSymbolMissing: error =>
        Console.error(`\n✗ ${error.id}: ${error.message}`).pipe(Effect.andThen(Effect.fail(error))),
    }),
    // Remaining tagged errors
    Effect.tapError(error =>
      error._tag === "ConfigInvalid" ||
      error._tag === "ManifestInvalid" ||
      error._tag === "ConfigNotFound" ||
      error._tag === "MarkerSymbolMissing"
        ? Effect.void
        : Console.error(`\n✗ Error: ${error._tag}`).pipe(Effect.andThen(Console.error(`  ${error.message}`))),
    ),
  );
};

// ============================================================================
// Commands
// ============================================================================

const generateCommand = Command.make("generate", { configPath, outputDir, dryRun }, runGenerateCommand);

/**
 * Init command - runs prompts and writes the config file.
 */
const initCommand = Command.make("init", {}, () =>
  runInit.pipe(
    Effect.tap(() => Console.log("\nRun 'sprocgen' to generate code.")),
    Effect.asVoid,
  ),
);

// Root command runs generate by default
const rootCommand = Command.make("sprocgen", { configPath, outputDir, dryRun }, runGenerateCommand).pipe(
  Command.withSubcommands([generateCommand, initCommand]),
);

// ============================================================================
// CLI App
// ============================================================================

const cli = Command.run(rootCommand, {
  name: "sprocgen",
  version: VERSION,
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
