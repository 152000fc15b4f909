export { BusHost, STORE_REFERENCE } from './host';
export type { BusHostOptions } from './host';
export type { BusApplication } from './types';
export {
  DEFAULT_HOST_CONFIG,
  configFromEnv,
  loadHostConfig,
  mergeHostConfig,
  parseHostYaml
} from './config';
export type { HostConfig, LoadHostConfigOptions } from './config';
