/**
 * sprocgen init command
 *
 * Interactive config generator using @effect/cli Prompt.
 */
import { Prompt } from "@effect/cli";
import { FileSystem, Path } from "@effect/platform";
import { Console, Effect } from "effect";
import type { ConfigInput } from "./config.js";

export const CONFIG_FILENAME = "sprocgen.config.json";

const manifestPrompt = Prompt.text({
  message: "Declaration manifest path",
  default: "declarations.json",
  validate: (value) =>
    value.trim().length === 0 ? Effect.fail("A manifest path is required") : Effect.succeed(value.trim()),
});

const outputDirPrompt = Prompt.text({
  message: "Output directory",
  default: "generated",
});

const nullablePrompt = Prompt.select<"manifest" | "disable" | "enable">({
  message: "Nullable reference types",
  choices: [
    { title: "Use the manifest's setting", value: "manifest" },
    { title: "disable", value: "disable" },
    { title: "enable", value: "enable" },
  ],
});

const emitAttributesPrompt = Prompt.confirm({
  message: "Generate the marker attribute classes?",
  initial: true,
});

export interface InitAnswers {
  readonly manifest: string;
  readonly outputDir: string;
  readonly nullable: ConfigInput["nullable"];
  readonly emitAttributes: boolean;
}

/**
 * Only non-default settings are written.
 */
export const generateConfigContent = (answers: InitAnswers): string => {
  const config: ConfigInput = {
    manifests: [answers.manifest],
    ...(answers.outputDir.trim() !== "" && answers.outputDir.trim() !== "generated"
      ? { outputDir: answers.outputDir.trim() }
      : {}),
    ...(answers.nullable !== undefined ? { nullable: answers.nullable } : {}),
    ...(answers.emitAttributes ? { emitAttributes: true } : {}),
  };
  return `${JSON.stringify(config, null, 2)}\n`;
};

export const runInit = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const path = yield* Path.Path;
  const configPath = path.join(process.cwd(), CONFIG_FILENAME);

  const exists = yield* fs.exists(configPath);
  if (exists) {
    yield* Console.error(`\n✗ ${CONFIG_FILENAME} already exists`);
    yield* Console.log("  Edit it directly or delete it to start fresh.");
    return yield* Effect.fail(new Error("Config already exists"));
  }

  yield* Console.log("\nsprocgen config generator\n");

  const manifest = yield* manifestPrompt;
  const outputDir = yield* outputDirPrompt;
  const nullableChoice = yield* nullablePrompt;
  const nullable = nullableChoice === "manifest" ? undefined : nullableChoice;
  const emitAttributes = yield* emitAttributesPrompt;

  yield* fs.writeFileString(
    configPath,
    generateConfigContent({ manifest, outputDir, nullable, emitAttributes }),
  );

  yield* Console.log(`\n✓ Created ${CONFIG_FILENAME}`);

  return { configPath };
});
