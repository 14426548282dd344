export {
  getDataDirectory,
  getDatabasePath,
  getTerminatedStoneUsagePolicy,
  parseEnv,
  resetEnvCache,
  TerminatedStoneUsagePolicySchema,
  type TerminatedStoneUsagePolicy,
} from './config.js';
