import { NullLogger } from "@rotolog/logger"
import { LoggerConfigBuilder } from "../../../config/logger-config-builder"
import { createLoggerRegistry } from "../../logger-registry"

// Usage: fatal-app <log dir>
async function main(): Promise<void> {
  const dir = process.argv[2]
  if (!dir) throw new Error("missing log directory argument")

  const registry = createLoggerRegistry({ logger: new NullLogger() })
  const logger = await registry.register(
    new LoggerConfigBuilder()
      .withPath(dir)
      .withSubdir("")
      .withFileName("fatal")
      .withInstanceName("fatal")
      .build(),
  )

  await logger.info("starting")
  await logger.fatal("cannot continue: %s", "disk full")

  // unreachable: fatal exits
  await logger.info("still running")
  process.exitCode = 3
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(2)
})
