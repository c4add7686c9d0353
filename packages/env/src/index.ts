export {
  getDataDirectory,
  getLogLevel,
  parseEnv,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
