export {
  loadScene,
  loadSceneFile,
  readSceneSource,
  type LoadOptions,
  type ReadFile,
} from "./loader.js";
export { SceneBuilder, type SceneBuilderOptions } from "./builder.js";
export {
  GraphicsState,
  ATTRIBUTE_TARGETS,
  isAttributeTarget,
  type AttributeTarget,
  type AttributeTables,
} from "./state.js";
export { translation, scaling, rotation, lookAt, fromElements, toElements, inverseOf } from "./transform.js";
export {
  Logger,
  LogLevel,
  LogSource,
  LOG_LEVEL_ENV,
  createLogger,
  logger,
  parseLogLevel,
  type LogEntry,
  type LogLevelName,
  type LogSink,
  type LogSourceName,
  type LogSubscriber,
  type LogThreshold,
  type LoggerOptions,
} from "./logger.js";
export * from "./convert/index.js";
