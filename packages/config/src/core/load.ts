import { BaseError } from "@keyline/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources },
      isOperational: false,
    })
  }
}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Defaults to a single unprefixed {@link EnvSource}. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      z.prettifyError(result.error),
      resolvedSources.map((s) => s.name),
    )
  }

  const schemaKeys = new Set(Object.keys(result.data))
  const resolvedProvenance: Record<string, string> = {}

  for (const key of schemaKeys) {
    resolvedProvenance[key] = provenance[key] ?? "default"
  }

  return new Config<T>(result.data, resolvedProvenance, new Set(Object.keys(merged)))
}
