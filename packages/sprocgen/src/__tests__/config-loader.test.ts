/**
 * Config Loader Tests
 *
 * Loads real config files from temp directories through lilconfig.
 */
import { describe, it, expect } from "@effect/vitest";
import { Effect, Schema as S } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Config } from "../config.js";
import { createConfigLoader, defineConfig, resolveConfig } from "../services/config-loader.js";

describe("resolveConfig", () => {
  it("applies defaults and resolves paths against the config directory", () => {
    const config = S.decodeUnknownSync(Config)({ manifests: ["obj/declarations.json"] });
    expect(resolveConfig(config, "/work/project")).toEqual({
      manifests: ["/work/project/obj/declarations.json"],
      outputDir: "/work/project/generated",
      markers: { method: "SqlProcedure", rawCommand: "RawCommand" },
      banner: "sprocgen",
      emitAttributes: false,
      defaultContext: "dbContext",
      configDir: "/work/project",
    });
  });

  it("keeps explicit settings", () => {
    const config = S.decodeUnknownSync(Config)({
      manifests: ["a.json"],
      outputDir: "/abs/out",
      nullable: "enable",
      markers: { method: "Proc" },
      inflection: { parameterName: [] },
    });
    const resolved = resolveConfig(config, "/work");
    expect(resolved.outputDir).toBe("/abs/out");
    expect(resolved.nullable).toBe("enable");
    expect(resolved.markers).toEqual({ method: "Proc", rawCommand: "RawCommand" });
    expect(resolved.inflection).toEqual({ parameterName: [] });
  });
});

describe("Config schema", () => {
  it("rejects unknown transform names", () => {
    expect(() =>
      S.decodeUnknownSync(Config)({ manifests: ["a.json"], inflection: { entitySet: ["shout"] } }),
    ).toThrow();
  });

  it("requires at least one manifest", () => {
    expect(() => S.decodeUnknownSync(Config)({ manifests: [] })).toThrow();
  });
});

describe("defineConfig", () => {
  it("returns its input", () => {
    const config = defineConfig({ manifests: ["a.json"], emitAttributes: true });
    expect(config).toEqual({ manifests: ["a.json"], emitAttributes: true });
  });
});

describe("ConfigLoader", () => {
  it.effect("loads a JSON config found from a directory", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "config-loader-test-" });

      try {
        yield* fs.writeFileString(
          path.join(tmpDir, "sprocgen.config.json"),
          JSON.stringify({ manifests: ["decl.json"], outputDir: "out", emitAttributes: true }),
        );
        const config = yield* createConfigLoader().load({ searchFrom: tmpDir });
        expect(config.manifests).toEqual([path.join(tmpDir, "decl.json")]);
        expect(config.outputDir).toBe(path.join(tmpDir, "out"));
        expect(config.emitAttributes).toBe(true);
        expect(config.configDir).toBe(tmpDir);
      } finally {
        yield* fs.remove(tmpDir, { recursive: true });
      }
    }).pipe(Effect.provide(NodeContext.layer)),
  );

  it.effect("loads an explicit config path", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "config-loader-test-" });
      const file = path.join(tmpDir, "custom.json");

      try {
        yield* fs.writeFileString(file, JSON.stringify({ manifests: ["decl.json"], banner: "acme-gen" }));
        const config = yield* createConfigLoader().load({ configPath: file });
        expect(config.banner).toBe("acme-gen");
      } finally {
        yield* fs.remove(tmpDir, { recursive: true });
      }
    }).pipe(Effect.provide(NodeContext.layer)),
  );

  it.effect("reports schema errors with their path", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      const tmpDir = yield* fs.makeTempDirectory({ prefix: "config-loader-test-" });
      const file = path.join(tmpDir, "sprocgen.config.json");

      try {
        yield* fs.writeFileString(file, JSON.stringify({ outputDir: "out" }));
        const error = yield* Effect.flip(createConfigLoader().load({ configPath: file }));
        expect(error._tag).toBe("ConfigInvalid");
        if (error._tag === "ConfigInvalid") {
          expect(error.path).toBe(file);
          expect(error.errors).toEqual([
            "manifests: is required - list at least one declaration manifest",
          ]);
        }
      } finally {
        yield* fs.remove(tmpDir, { recursive: true });
      }
    }).pipe(Effect.provide(NodeContext.layer)),
  );
});
