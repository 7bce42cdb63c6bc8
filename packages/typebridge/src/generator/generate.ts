/**
 * @module typebridge/generator/generate
 *
 * The generation pipeline:
 *
 * ```
 * options ─► resolveConfig ─► freeze registry ─► extract ─► resolve
 *                                                   │
 *        ┌──────────────┬──────────────┬────────────┴─┬──────────────┐
 *     types.ts    schemas.*.ts    manifest.ts     client.ts   discovery.json
 * ```
 *
 * Every file is rendered in memory before any is written, so a failing run
 * leaves the output directory untouched.
 *
 * @since 0.1.0
 */

import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import type { PlatformError } from "@effect/platform/Error"
import * as Clock from "effect/Clock"
import * as Effect from "effect/Effect"
import type { Registry } from "../core/registry/Registry.js"
import type { GenerationError } from "../errors/index.js"
import { logEvent } from "../shared/logging.js"
import { resolveConfig, type EnumStyle, type Flavor, type GeneratorConfig, type GeneratorOptions } from "./config.js"
import { collectWarnings, renderTypesFile, type GenerationWarning } from "./emit/declarations.js"
import { renderClientFile } from "./emit/client.js"
import { renderDiscoveryFile, renderManifestFile } from "./emit/manifest.js"
import type { RenderContext } from "./emit/render.js"
import { renderSchemasFile, schemaFileName } from "./emit/schemas.js"
import { extract } from "./extract.js"
import { resolve } from "./resolve.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 * @category models
 */
export interface GeneratedFile {
  /** Relative to `config.outDir`. */
  readonly path: string
  readonly content: string
}

/**
 * @since 0.1.0
 * @category models
 */
export interface GenerateResult {
  readonly config: GeneratorConfig
  readonly files: ReadonlyArray<GeneratedFile>
  /** Emitted type names, sorted. */
  readonly types: ReadonlyArray<string>
  readonly warnings: ReadonlyArray<GenerationWarning>
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Render every output file for `registry`. Freezes the registry.
 *
 * @since 0.1.0
 */
export const generate = (
  registry: Registry,
  options: GeneratorOptions = {},
): Effect.Effect<GenerateResult, GenerationError> =>
  Effect.gen(function* () {
    const startTime = yield* Clock.currentTimeMillis
    const config = yield* resolveConfig(options, registry.wire)

    yield* registry.freeze
    const methods = yield* registry.methods
    yield* logEvent({ _tag: "GenerateStart", methods: methods.length })

    const graph = yield* extract(methods, registry.wire)
    const names = yield* resolve(graph.nodes, config.stripPrefix)
    const ctx: RenderContext = { config, names }

    const files: Array<GeneratedFile> = [{ path: "types.ts", content: renderTypesFile(graph.nodes, ctx) }]
    if (config.flavor !== "none") {
      files.push({ path: schemaFileName(config.flavor), content: renderSchemasFile(graph.nodes, config.flavor, ctx) })
    }
    files.push(
      { path: "manifest.ts", content: renderManifestFile(methods, ctx) },
      { path: "client.ts", content: renderClientFile(methods, ctx) },
    )
    if (config.discovery) {
      files.push({ path: "discovery.json", content: renderDiscoveryFile(methods, ctx) })
    }

    const warnings = collectWarnings(graph.nodes)
    yield* Effect.forEach(
      warnings,
      (warning) => logEvent({ _tag: "GenerateWarning", code: warning.code, message: warning.message }),
      { discard: true },
    )

    const endTime = yield* Clock.currentTimeMillis
    const types = graph.nodes.map((node) => names.nameOf(node.origin)).sort()
    yield* logEvent({
      _tag: "GenerateComplete",
      files: files.map((file) => file.path),
      types: types.length,
      durationMs: Number(endTime - startTime),
    })
    return { config, files, types, warnings }
  }).pipe(
    Effect.tapError((error) => logEvent({ _tag: "GenerateFailed", error })),
  )

/**
 * Write a generation result under `result.config.outDir`.
 *
 * @since 0.1.0
 */
export const writeFiles = (
  result: GenerateResult,
): Effect.Effect<ReadonlyArray<string>, PlatformError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    yield* fs.makeDirectory(result.config.outDir, { recursive: true })
    return yield* Effect.forEach(result.files, (file) => {
      const target = path.join(result.config.outDir, file.path)
      return Effect.as(fs.writeFileString(target, file.content), target)
    })
  })

/**
 * Generate and write in one step.
 *
 * @since 0.1.0
 */
export const generateToDir = (
  registry: Registry,
  options: GeneratorOptions = {},
): Effect.Effect<GenerateResult, GenerationError | PlatformError, FileSystem.FileSystem | Path.Path> =>
  Effect.tap(generate(registry, options), writeFiles)

// ─────────────────────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Chainable front end over {@link GeneratorOptions}.
 *
 * @example
 * ```ts
 * Generator.fromRegistry(registry)
 *   .stripPrefix("acme/api")
 *   .withFlavor("zod")
 *   .toDir("src/generated")
 * ```
 *
 * @since 0.1.0
 */
export class Generator {
  private constructor(
    readonly registry: Registry,
    readonly options: GeneratorOptions,
  ) {}

  static fromRegistry(registry: Registry): Generator {
    return new Generator(registry, {})
  }

  with(options: GeneratorOptions): Generator {
    return new Generator(this.registry, { ...this.options, ...options })
  }

  stripPrefix(prefix: string): Generator {
    return this.with({ stripPrefix: prefix })
  }

  withFlavor(flavor: Flavor): Generator {
    return this.with({ flavor })
  }

  withEnumStyle(enumStyle: EnumStyle): Generator {
    return this.with({ enumStyle })
  }

  withFrontmatter(frontmatter: string): Generator {
    return this.with({ frontmatter })
  }

  withoutDiscovery(): Generator {
    return this.with({ discovery: false })
  }

  generate(): Effect.Effect<GenerateResult, GenerationError> {
    return generate(this.registry, this.options)
  }

  toDir(outDir: string): Effect.Effect<GenerateResult, GenerationError | PlatformError, FileSystem.FileSystem | Path.Path> {
    return generateToDir(this.registry, { ...this.options, outDir })
  }
}
