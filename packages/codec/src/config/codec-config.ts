import { type ConfigSource, EnvSource, type IConfig, loadConfig, ObjectSource } from "@idpack/config"
import { logLevelNames } from "@idpack/logger"
import { z } from "zod"
import { DEFAULT_MAX_LENGTH } from "../core/custom-id-codec"
import { DEFAULT_RESOLUTION_CACHE_SIZE } from "../core/registry/converter-registry"

export const CODEC_ENV_PREFIX = "IDPACK_"

const flag = z.union([z.boolean(), z.stringbool()])

export const codecConfigSchema = z.object({
  MAX_LENGTH: z.coerce.number().int().positive().default(DEFAULT_MAX_LENGTH),
  RESOLUTION_CACHE_SIZE: z.coerce.number().int().positive().default(DEFAULT_RESOLUTION_CACHE_SIZE),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
  SERVICE_NAME: z.string().min(1).default("idpack"),
})

export type CodecConfig = z.output<typeof codecConfigSchema>

export type LoadCodecConfigOptions = {
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
  overrides?: Record<string, unknown>
}

/**
 * Reads `IDPACK_*` variables, then applies `overrides` on top.
 */
export async function loadCodecConfig(
  options: LoadCodecConfigOptions = {},
): Promise<IConfig<CodecConfig>> {
  const sources: ConfigSource[] = [new EnvSource({ prefix: CODEC_ENV_PREFIX, env: options.env })]

  if (options.overrides) {
    sources.push(new ObjectSource(options.overrides))
  }

  return loadConfig({ schema: codecConfigSchema, sources })
}
