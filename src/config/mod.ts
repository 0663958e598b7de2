// Config module exports

export { RasterConfig, type ConfigInitOptions, type ConfigSource, type ConfigSchema, type ConfigProperty } from './config.ts';
