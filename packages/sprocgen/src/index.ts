/**
 * sprocgen - data-access method generation for C#
 *
 * Main entry point
 */

// Config
export { Config, type ResolvedConfig, type ConfigInput } from "./config.js"

// Config Loader Service
export {
  type ConfigLoader,
  ConfigLoaderService,
  ConfigLoaderLive,
  CONFIG_FILE_NAMES,
  createConfigLoader,
  defineConfig,
  resolveConfig,
} from "./services/config-loader.js"

// Errors
export * from "./errors.js"

// Input model
export {
  Manifest,
  TypeDeclaration,
  MethodDeclaration,
  ParameterDeclaration,
  MemberDeclaration,
  AttributeUsage,
  NullableContext,
  Accessibility,
  type ManifestInput,
} from "./ir/manifest.js"
export {
  makeCompilation,
  normalizeAttributeName,
  type Compilation,
  type DeclaredType,
  type MethodSymbol,
  type ParameterSymbol,
} from "./ir/compilation.js"
export {
  parseTypeExpression,
  formatTypeExpression,
  type TypeExpression,
  type NamedTypeExpression,
  type ArrayTypeExpression,
} from "./ir/type-expression.js"
export type { TypeDescriptor, MemberDescriptor, SpecialType } from "./ir/type-descriptor.js"

// Manifest Loader
export { loadManifest, loadCompilation, mergeManifests } from "./services/manifest-loader.js"

// Inflection
export {
  Inflection,
  InflectionLive,
  makeInflectionLayer,
  createInflection,
  defaultInflection,
  applyTransformChain,
  TRANSFORM_NAMES,
  type CoreInflection,
  type InflectionConfig,
  type TransformName,
  type TransformChain,
} from "./services/inflection.js"

// Synthesis
export { synthesize, checkMarkers, type SynthesisOptions, type SynthesisResult } from "./synth/index.js"
export {
  extractBinding,
  DEFAULT_MARKERS,
  type MarkerNames,
  type ProcedureBinding,
  type ParameterSpec,
  type ParameterDirection,
  type CommandSource,
} from "./synth/signature.js"
export { classifyType, getDbType, canHaveNullValue, DbTypeTag, type TypeClassification } from "./synth/classify.js"
export { ConnectionStrategy, resolveConnectionStrategy } from "./synth/connection.js"
export { emitUnit, planMethod, unitFileName, type GeneratedUnit, type MethodPlan } from "./synth/emit.js"
export { emitAttributeSource } from "./synth/attributes.js"
export { CodeBuilder } from "./lib/code-builder.js"

// File Writer
export {
  type FileWriter,
  type WriteResult,
  type WriteOptions,
  FileWriterSvc,
  createFileWriter,
  FileWriterLive,
} from "./services/file-writer.js"

// Generate
export {
  generate,
  generateWith,
  checkConflicts,
  runGenerate,
  GenerateLive,
  type GenerateOptions,
  type GenerateResult,
  type GenerateError,
} from "./generate.js"
