/**
 * Config Loader Service
 *
 * Loads and validates sprocgen.config.{js,mjs,cjs,json} using lilconfig.
 * Wraps the async config loading in Effect for proper error handling.
 */
import { dirname, resolve } from "node:path";
import { Context, Effect, Layer, Schema as S, ParseResult, pipe } from "effect";
import { lilconfig } from "lilconfig";
import { Config, type ConfigInput, type ResolvedConfig } from "../config.js";
import { ConfigNotFound, ConfigInvalid } from "../errors.js";
import { DEFAULT_MARKERS } from "../synth/signature.js";

/**
 * Config Loader service interface
 */
export interface ConfigLoader {
  /**
   * Load configuration from file.
   * @param configPath - Optional explicit path to config file
   * @param searchFrom - Directory to search from (default: cwd)
   */
  readonly load: (options?: {
    readonly configPath?: string | undefined;
    readonly searchFrom?: string | undefined;
  }) => Effect.Effect<ResolvedConfig, ConfigNotFound | ConfigInvalid>;
}

/**
 * ConfigLoader service tag
 */
export class ConfigLoaderService extends Context.Tag("ConfigLoader")<
  ConfigLoaderService,
  ConfigLoader
>() {}

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  "sprocgen.config.js",
  "sprocgen.config.mjs",
  "sprocgen.config.cjs",
  "sprocgen.config.json",
];

function createLilconfig() {
  return lilconfig("sprocgen", {
    searchPlaces: CONFIG_FILE_NAMES,
  });
}

/**
 * Format Schema decode errors into readable strings
 */
function formatSchemaErrors(error: ParseResult.ParseError): readonly string[] {
  return ParseResult.ArrayFormatter.formatErrorSync(error).map(
    issue => `${issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""}${issue.message}`,
  );
}

/**
 * Apply defaults and resolve paths against the config file's directory.
 */
export function resolveConfig(config: Config, configDir: string): ResolvedConfig {
  return {
    manifests: config.manifests.map(manifest => resolve(configDir, manifest)),
    outputDir: resolve(configDir, config.outputDir),
    ...(config.nullable !== undefined ? { nullable: config.nullable } : {}),
    markers: {
      method: config.markers?.method ?? DEFAULT_MARKERS.method,
      rawCommand: config.markers?.rawCommand ?? DEFAULT_MARKERS.rawCommand,
    },
    banner: config.banner,
    emitAttributes: config.emitAttributes,
    defaultContext: config.defaultContext,
    ...(config.inflection !== undefined ? { inflection: config.inflection } : {}),
    configDir,
  };
}

/**
 * Create a ConfigLoader implementation
 */
export function createConfigLoader(): ConfigLoader {
  const lc = createLilconfig();

  return {
    load: options =>
      Effect.gen(function* () {
        const searchFrom = options?.searchFrom ?? process.cwd();
        const configPath = options?.configPath;

        // Search for or load specific config file
        const result = yield* Effect.tryPromise({
          try: async () => {
            if (configPath) {
              return await lc.load(configPath);
            }
            return await lc.search(searchFrom);
          },
          catch: error =>
            new ConfigInvalid({
              message: `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
              path: configPath ?? searchFrom,
              errors: [String(error)],
            }),
        });

        if (!result || result.isEmpty) {
          return yield* Effect.fail(
            new ConfigNotFound({
              message: "No configuration file found",
              searchPaths: CONFIG_FILE_NAMES.map(name => `${searchFrom}/${name}`),
            }),
          );
        }

        const filepath = result.filepath;

        const parsed = yield* pipe(
          S.decodeUnknown(Config)(result.config),
          Effect.mapError(
            parseError =>
              new ConfigInvalid({
                message: `Invalid configuration in ${filepath}`,
                path: filepath,
                errors: formatSchemaErrors(parseError),
              }),
          ),
        );

        yield* Effect.logDebug(`Loaded config from ${filepath}`);
        return resolveConfig(parsed, dirname(filepath));
      }),
  };
}

/**
 * Live layer for ConfigLoader
 */
export const ConfigLoaderLive = Layer.succeed(ConfigLoaderService, createConfigLoader());

/**
 * Helper to define a config (provides type safety for users)
 */
export function defineConfig(config: ConfigInput): ConfigInput {
  return config;
}
