export {
  ConfigError,
  loadAutomatorConfig,
  loadDispatcherConfig,
  loadDotEnv,
  loadUploaderConfig,
} from './env.js';
export type {
  AutomatorConfig,
  BackendConfig,
  DispatcherConfig,
  JobSliceWindow,
  LogLevelSetting,
  UploaderConfig,
} from './env.js';
export * from './constants.js';
