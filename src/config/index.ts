export {
  type LoggerSettings,
  CONFIG_ENV_VARS,
  parseConfig,
  loadConfigFile,
  loadConfigFromEnv,
  resolveSettings,
  isRecognizedLevel,
} from './loggerConfig.js';
