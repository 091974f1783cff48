export {
  DEFAULT_MAX_CONCURRENT_RECONCILES,
  DEFAULT_RESYNC_PERIOD_SECONDS,
  OperatorConfigSchema,
  loadOperatorConfig,
} from './operator-config.js';
export type { OperatorConfig } from './operator-config.js';
