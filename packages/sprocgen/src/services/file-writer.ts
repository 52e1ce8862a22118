/**
 * File Writer Service
 *
 * Writes generated units under the output directory. Files whose content is
 * already current are left alone so build tools do not see spurious changes.
 */
import { Context, Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { WriteError } from "../errors.js"

/** Anything with a relative path and content */
export interface OutputFile {
  readonly fileName: string
  readonly content: string
}

export interface WriteOptions {
  readonly outputDir: string
  /** Compute paths without touching the file system */
  readonly dryRun?: boolean
}

export interface WriteResult {
  /** Absolute path of the target file */
  readonly path: string
  readonly written: boolean
  /** Why nothing was written */
  readonly reason?: "dry-run" | "unchanged"
}

export interface FileWriter {
  readonly writeAll: (
    files: readonly OutputFile[],
    options: WriteOptions,
  ) => Effect.Effect<readonly WriteResult[], WriteError, FileSystem.FileSystem | Path.Path>
}

export class FileWriterSvc extends Context.Tag("FileWriter")<FileWriterSvc, FileWriter>() {}

const writeOne = (
  file: OutputFile,
  options: WriteOptions,
): Effect.Effect<WriteResult, WriteError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const target = path.join(options.outputDir, file.fileName)

    if (options.dryRun) {
      return { path: target, written: false, reason: "dry-run" } satisfies WriteResult
    }

    const wrap = (cause: unknown) =>
      new WriteError({ message: `Failed to write ${target}`, path: target, cause })

    const exists = yield* fs.exists(target).pipe(Effect.mapError(wrap))
    if (exists) {
      const current = yield* fs.readFileString(target).pipe(Effect.mapError(wrap))
      if (current === file.content) {
        return { path: target, written: false, reason: "unchanged" } satisfies WriteResult
      }
    }

    yield* fs.makeDirectory(path.dirname(target), { recursive: true }).pipe(Effect.mapError(wrap))
    yield* fs.writeFileString(target, file.content).pipe(Effect.mapError(wrap))
    return { path: target, written: true } satisfies WriteResult
  })

export function createFileWriter(): FileWriter {
  return {
    writeAll: (files, options) => Effect.forEach(files, (file) => writeOne(file, options)),
  }
}

export const FileWriterLive = Layer.succeed(FileWriterSvc, createFileWriter())
