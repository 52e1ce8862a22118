/**
 * Configuration schema for sprocgen
 */
import { Schema as S } from "effect";
import { NullableContext } from "./ir/manifest.js";
import { TRANSFORM_NAMES, type InflectionConfig, type TransformName } from "./services/inflection.js";
import type { MarkerNames } from "./synth/signature.js";

const TransformChain = S.Array(S.Literal(...TRANSFORM_NAMES));

/**
 * Main configuration schema
 */
export const Config = S.Struct({
  /** Declaration manifests, relative to the config file */
  manifests: S.propertySignature(S.NonEmptyArray(S.String)).annotations({
    missingMessage: () => "is required - list at least one declaration manifest",
  }),

  /** Output directory root */
  outputDir: S.optionalWith(S.String, { default: () => "generated" }),

  /** Overrides the nullable context recorded in the manifests */
  nullable: S.optional(NullableContext),

  /** Marker attribute names */
  markers: S.optional(
    S.Struct({
      method: S.optional(S.String),
      rawCommand: S.optional(S.String),
    }),
  ),

  /** Generator name written into file headers */
  banner: S.optionalWith(S.String, { default: () => "sprocgen" }),

  /** Also write the marker attribute classes */
  emitAttributes: S.optionalWith(S.Boolean, { default: () => false }),

  /** Context field assumed when a type declares neither a connection nor a context */
  defaultContext: S.optionalWith(S.String, { default: () => "dbContext" }),

  inflection: S.optional(
    S.Struct({
      parameterName: S.optional(TransformChain),
      entitySet: S.optional(TransformChain),
    }),
  ),
});

export type Config = S.Schema.Type<typeof Config>;

/**
 * User-facing configuration input type.
 * Use this type with `defineConfig()` for autocomplete.
 */
export interface ConfigInput {
  /** Declaration manifests, relative to the config file */
  readonly manifests: readonly [string, ...string[]];

  /** Output directory root (default: "generated") */
  readonly outputDir?: string;

  /** Overrides the nullable context recorded in the manifests */
  readonly nullable?: NullableContext;

  /**
   * Marker attribute names (default: `SqlProcedure` and `RawCommand`).
   * The `Attribute` suffix is optional.
   */
  readonly markers?: Partial<MarkerNames>;

  /** Generator name written into file headers (default: "sprocgen") */
  readonly banner?: string;

  /** Also write the marker attribute classes (default: false) */
  readonly emitAttributes?: boolean;

  /** Context field assumed by convention (default: "dbContext") */
  readonly defaultContext?: string;

  /**
   * Naming transform chains.
   *
   * @example
   * ```typescript
   * inflection: {
   *   parameterName: ["snakeCase"],           // clientId → client_id
   *   entitySet: ["pascalCase", "pluralize"], // item → Items
   * }
   * ```
   */
  readonly inflection?: {
    readonly parameterName?: readonly TransformName[];
    readonly entitySet?: readonly TransformName[];
  };
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
  /** Absolute manifest paths */
  readonly manifests: readonly string[];
  readonly outputDir: string;
  readonly nullable?: NullableContext;
  readonly markers: MarkerNames;
  readonly banner: string;
  readonly emitAttributes: boolean;
  readonly defaultContext: string;
  readonly inflection?: InflectionConfig;
  /**
   * Directory containing the config file.
   * Relative paths in the config resolve against it.
   */
  readonly configDir?: string;
}
