import type { IConfig } from "@idpack/config"
import { createPinoLogger, type Logger, type PinoLoggerDeps } from "@idpack/logger"
import type { CodecConfig } from "./config/codec-config"
import { createDefaultRegistry } from "./core/converters/defaults"
import { CustomIdCodec } from "./core/custom-id-codec"
import type { ConverterRegistry } from "./core/registry/converter-registry"

export type CodecContext = {
  logger: Logger
  registry: ConverterRegistry
  codec: CustomIdCodec
}

export type CodecContextDeps = Pick<PinoLoggerDeps, "destination">

export function createCodecContext(
  config: IConfig<CodecConfig>,
  deps: CodecContextDeps = {},
): CodecContext {
  const logger = createPinoLogger(
    { destination: deps.destination },
    { level: config.get("LOG_LEVEL"), prettify: config.get("LOG_PRETTY") },
    { service: config.get("SERVICE_NAME") },
  )

  const registry = createDefaultRegistry({
    cacheSize: config.get("RESOLUTION_CACHE_SIZE"),
    logger,
  })

  const codec = new CustomIdCodec({ registry, logger }, { maxLength: config.get("MAX_LENGTH") })

  return { logger, registry, codec }
}
